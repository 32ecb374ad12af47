import type { FastifyInstance } from "fastify";

import {
  isCategory,
  sourcesForCategory
} from "../../lib/discovery/categories.js";
import { requireSession } from "../../plugins/sessions.js";
import {
  categoryParamsSchema,
  inspectBodySchema,
  nextArticleQuerySchema
} from "./schemas.js";
import { NO_NEW_ARTICLES_MESSAGE, toArticleResponse } from "./service.js";

export async function registerArticleRoutes(app: FastifyInstance) {
  app.post("/articles/:category/next", async (request, reply) => {
    const params = categoryParamsSchema.safeParse(request.params);
    if (!params.success || !isCategory(params.data.category)) {
      const category = params.success ? params.data.category : "";
      reply.code(400).send({
        error: "BadRequest",
        message: `Invalid category: ${category}`
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

    const category = params.data.category;
    const article = await app.discovery.next({
      category,
      sourceKeys: sourcesForCategory(category),
      seen: requireSession(request).seen,
      query: query.data.q
    });

    if (!article) {
      return { data: null, message: NO_NEW_ARTICLES_MESSAGE };
    }

    return { data: article };
  });

  app.post("/articles/inspect", async (request, reply) => {
    const body = inspectBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      reply.code(400).send({
        error: "BadRequest",
        message: body.error.issues[0]?.message ?? "Invalid body"
      });
      return reply;
    }

    const outcome = await app.discovery.inspect(body.data.url);

    switch (outcome.status) {
      case "invalid_url":
        reply.code(400).send({ error: "BadRequest", message: outcome.message });
        return reply;
      case "unsupported_source":
        reply.code(404).send({
          error: "NotFound",
          message: `No source handles ${outcome.url}`
        });
        return reply;
      case "fetch_failed":
        reply.code(502).send({
          error: "BadGateway",
          message: "Failed to fetch article"
        });
        return reply;
      case "extract_failed":
        reply.code(422).send({
          error: "UnprocessableEntity",
          message: `Could not extract an article with ${outcome.source.name}`
        });
        return reply;
      case "ok":
        return {
          data: toArticleResponse(outcome.record),
          source: { key: outcome.source.key, name: outcome.source.name },
          category: outcome.category
        };
    }
  });
}
