import type { FastifyInstance } from "fastify";
import { findNearestSource } from "@chomp/sources";

import { SINGLE_SOURCE_CATEGORY } from "../../lib/discovery/categories.js";
import { requireSession } from "../../plugins/sessions.js";
import { nextArticleQuerySchema } from "../articles/schemas.js";
import { NO_NEW_ARTICLES_MESSAGE } from "../articles/service.js";
import {
  nearestSourceBodySchema,
  nearestSourceResponseSchema,
  sourceKeyParamsSchema,
  sourceResponseSchema
} from "./schemas.js";

export async function registerSourceRoutes(app: FastifyInstance) {
  app.get("/sources", async () => {
    return {
      data: app.sources.list().map((source) => sourceResponseSchema.parse(source))
    };
  });

  app.post("/sources/nearest", async (request, reply) => {
    const body = nearestSourceBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      reply.code(400).send({
        error: "BadRequest",
        message: "latitude must be between -90 and 90 and longitude between -180 and 180"
      });
      return reply;
    }

    const nearest = findNearestSource(
      app.sources,
      body.data.latitude,
      body.data.longitude
    );

    if (!nearest) {
      reply.code(404).send({
        error: "NotFound",
        message: "No local sources available"
      });
      return reply;
    }

    return {
      data: nearestSourceResponseSchema.parse({
        key: nearest.source.key,
        name: nearest.source.name,
        city: nearest.source.location.city,
        latitude: nearest.source.location.latitude,
        longitude: nearest.source.location.longitude,
        distanceKm: Math.round(nearest.distanceKm * 10) / 10
      })
    };
  });

  app.post("/sources/:key/next", async (request, reply) => {
    const params = sourceKeyParamsSchema.safeParse(request.params);
    const source = params.success ? app.sources.get(params.data.key) : undefined;
    if (!params.success || !source) {
      reply.code(404).send({
        error: "NotFound",
        message: "Source not found"
      });
      return reply;
    }

    const query = nextArticleQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(400).send({
        error: "BadRequest",
        message: query.error.issues[0]?.message ?? "Invalid query"
      });
      return reply;
    }

    const article = await app.discovery.next({
      category: SINGLE_SOURCE_CATEGORY,
      sourceKeys: [source.key],
      seen: requireSession(request).seen,
      query: query.data.q
    });

    if (!article) {
      return { data: null, message: NO_NEW_ARTICLES_MESSAGE };
    }

    return { data: article };
  });
}
