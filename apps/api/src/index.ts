import { loadConfig } from "@chomp/config";
import { createLogger } from "@chomp/logger";

import { createAppContext } from "./context.js";
import { buildServer } from "./server.js";

const logger = createLogger({ name: "api" }).child({ service: "api" });

async function main() {
  const config = loadConfig();
  const context = createAppContext(config, logger);
  const server = await buildServer(context);

  if (config.discovery.skipCrawl) {
    logger.warn("SKIP_CRAWL is set, serving fixture articles");
  }

  try {
    await server.listen({
      port: config.server.port,
      host: config.server.host
    });
    logger.info(
      { port: config.server.port, host: config.server.host },
      "API server started"
    );
  } catch (error) {
    logger.error(error, "Failed to start API server");
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, "API server crashed during startup");
  process.exit(1);
});
