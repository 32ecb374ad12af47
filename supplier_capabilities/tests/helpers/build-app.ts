import Fastify from "fastify";
import { createLogger } from "@chomp/logger";
import { SourceRegistry, type NewsSource } from "@chomp/sources";

import { DiscoveryPipeline } from "../../../apps/api/src/lib/discovery/pipeline.js";
import { SessionStore } from "../../../apps/api/src/lib/discovery/session-store.js";
import { DiscoveryService } from "../../../apps/api/src/modules/articles/service.js";
import { registerArticleRoutes } from "../../../apps/api/src/modules/articles/routes.js";
import { registerSourceRoutes } from "../../../apps/api/src/modules/sources/routes.js";
import discoveryPlugin from "../../../apps/api/src/plugins/discovery.js";
import sessionPlugin from "../../../apps/api/src/plugins/sessions.js";

export const silentLogger = createLogger({ name: "endpoint-test", level: "silent" });

export type TestAppOptions = {
  sources: { source: NewsSource; domains: string[] }[];
  skipCrawl?: boolean;
};

export async function buildTestApp(options: TestAppOptions) {
  const registry = new SourceRegistry(options.sources);
  const store = new SessionStore({ createId: () => "minted-session-id" });
  const pipeline = new DiscoveryPipeline({
    registry,
    logger: silentLogger,
    random: () => 0.99
  });

  const app = Fastify();
  await app.register(sessionPlugin, { store });
  await app.register(discoveryPlugin, {
    discovery: new DiscoveryService({
      pipeline,
      registry,
      skipCrawl: options.skipCrawl,
      random: () => 0
    }),
    sources: registry
  });
  await registerArticleRoutes(app);
  await registerSourceRoutes(app);

  return { app, store, registry };
}
