import { loadConfig } from "@chomp/config";
import { createLogger } from "@chomp/logger";

import { createAppContext } from "../apps/api/src/context.js";
import {
  SINGLE_SOURCE_CATEGORY,
  isCategory,
  sourcesForCategory
} from "../apps/api/src/lib/discovery/categories.js";
import { SeenSet } from "../apps/api/src/lib/discovery/seen-set.js";

const logger = createLogger({ name: "discover-once" });

async function main() {
  const [target = "world", query] = process.argv.slice(2);
  const config = loadConfig();
  const context = createAppContext(config, logger);

  const source = context.registry.get(target);
  const category = isCategory(target) ? target : SINGLE_SOURCE_CATEGORY;
  const sourceKeys = isCategory(target)
    ? sourcesForCategory(target)
    : source
      ? [source.key]
      : [];

  if (sourceKeys.length === 0) {
    logger.error({ target }, "Unknown category or source key");
    process.exit(1);
  }

  const article = await context.discovery.next({
    category,
    sourceKeys,
    seen: new SeenSet(config.sessions.seenCapacity),
    query
  });

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(article, null, 2));
  process.exit(article ? 0 : 2);
}

void main();
