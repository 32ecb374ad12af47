import fp from "fastify-plugin";
import type { FastifyInstance, FastifyRequest } from "fastify";

import type { SeenSet } from "../lib/discovery/seen-set.js";
import type { SessionStore } from "../lib/discovery/session-store.js";

export const SESSION_HEADER = "x-session-id";

export type RequestSession = {
  id: string;
  seen: SeenSet;
};

declare module "fastify" {
  interface FastifyRequest {
    session: RequestSession | null;
  }
}

type SessionPluginOptions = {
  store: SessionStore;
};

async function sessionPlugin(
  fastify: FastifyInstance,
  options: SessionPluginOptions
) {
  fastify.decorateRequest("session", null);

  fastify.addHook("onRequest", async (request, reply) => {
    const rawHeader = request.headers[SESSION_HEADER];
    const headerValue = Array.isArray(rawHeader) ? rawHeader[0] : rawHeader;

    request.session = options.store.open(headerValue);
    reply.header(SESSION_HEADER, request.session.id);
  });
}

export function requireSession(request: FastifyRequest): RequestSession {
  if (!request.session) {
    throw new Error("Session plugin is not registered");
  }
  return request.session;
}

export default fp(sessionPlugin, {
  name: "sessions"
});
