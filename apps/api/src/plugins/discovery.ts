import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { SourceRegistry } from "@chomp/sources";

import type { DiscoveryService } from "../modules/articles/service.js";

declare module "fastify" {
  interface FastifyInstance {
    discovery: DiscoveryService;
    sources: SourceRegistry;
  }
}

type DiscoveryPluginOptions = {
  discovery: DiscoveryService;
  sources: SourceRegistry;
};

async function discoveryPlugin(
  fastify: FastifyInstance,
  options: DiscoveryPluginOptions
) {
  fastify.decorate("discovery", options.discovery);
  fastify.decorate("sources", options.sources);
}

export default fp(discoveryPlugin, {
  name: "discovery"
});
