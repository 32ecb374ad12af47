import Fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest
} from "fastify";
import cors from "@fastify/cors";

import type { AppContext } from "./context.js";
import { metrics } from "./metrics/registry.js";
import { registerArticleRoutes } from "./modules/articles/routes.js";
import { registerSourceRoutes } from "./modules/sources/routes.js";
import discoveryPlugin from "./plugins/discovery.js";
import sessionPlugin, { SESSION_HEADER } from "./plugins/sessions.js";

declare module "fastify" {
  interface FastifyRequest {
    metricsStopTimer?: ReturnType<typeof metrics.httpRequestDuration.startTimer>;
  }
}

export async function buildServer(context: AppContext) {
  const server = Fastify({
    logger: false,
    loggerInstance: context.logger
  }) as unknown as FastifyInstance;

  await server.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Session-Id"],
    exposedHeaders: [SESSION_HEADER],
    credentials: false
  });
  await server.register(sessionPlugin, { store: context.sessions });
  await server.register(discoveryPlugin, {
    discovery: context.discovery,
    sources: context.registry
  });

  if (context.config.monitoring.enabled) {
    registerMetricsHooks(server);

    server.get("/metrics", async (_, reply) => {
      reply.header("Content-Type", metrics.registry.contentType);
      return metrics.registry.metrics();
    });
  }

  server.get("/health", async () => ({
    status: "ok",
    service: "api",
    timestamp: new Date().toISOString()
  }));

  await registerArticleRoutes(server);
  await registerSourceRoutes(server);

  return server;
}

function registerMetricsHooks(server: FastifyInstance) {
  server.addHook("onRequest", (request, _reply, done) => {
    const route = request.routeOptions.url ?? request.url;
    request.metricsStopTimer = metrics.httpRequestDuration.startTimer({
      method: request.method,
      route
    });
    done();
  });

  server.addHook(
    "onResponse",
    (request: FastifyRequest, reply: FastifyReply, done) => {
      const statusCode = reply.statusCode.toString();
      const route = request.routeOptions.url ?? request.url;

      metrics.httpRequestCounter.inc({
        method: request.method,
        route,
        status_code: statusCode
      });

      if (request.metricsStopTimer) {
        request.metricsStopTimer({ status_code: statusCode });
      }

      done();
    }
  );
}
