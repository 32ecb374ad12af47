import type { AppConfig } from "@chomp/config";
import type { Logger } from "@chomp/logger";
import { createDefaultRegistry, type SourceRegistry } from "@chomp/sources";

import { CircuitBreaker } from "./lib/enrichment/circuit-breaker.js";
import { LlmSummarizer } from "./lib/enrichment/summarizer.js";
import { createTextGenerator, type TextGenerator } from "./lib/enrichment/text-generator.js";
import { LlmTopicTagger } from "./lib/enrichment/topics.js";
import { DiscoveryPipeline } from "./lib/discovery/pipeline.js";
import { SessionStore } from "./lib/discovery/session-store.js";
import { DiscoveryService } from "./modules/articles/service.js";

export type AppContext = {
  config: AppConfig;
  logger: Logger;
  registry: SourceRegistry;
  pipeline: DiscoveryPipeline;
  discovery: DiscoveryService;
  sessions: SessionStore;
};

export type AppContextOverrides = {
  registry?: SourceRegistry;
  generator?: TextGenerator | null;
};

export function createAppContext(
  config: AppConfig,
  logger: Logger,
  overrides: AppContextOverrides = {}
): AppContext {
  const registry =
    overrides.registry ??
    createDefaultRegistry({ fetchTimeoutMs: config.discovery.fetchTimeoutMs });

  const generator =
    overrides.generator === undefined
      ? createTextGenerator(config.openai)
      : overrides.generator;

  if (!generator) {
    logger.warn("OPENAI_API_KEY not set, articles will be returned without summaries");
  }

  // summaries and topics share one provider, so they share one breaker
  const breaker = new CircuitBreaker({
    failureThreshold: config.summarizer.failureThreshold,
    resetTimeoutMs: config.summarizer.resetTimeoutMs
  });

  const enrichmentLogger = logger.child({ component: "enrichment" });

  const pipeline = new DiscoveryPipeline({
    registry,
    logger: logger.child({ component: "discovery" }),
    summarizer: new LlmSummarizer(generator, {
      logger: enrichmentLogger,
      maxInputChars: config.summarizer.maxInputChars,
      breaker
    }),
    topicTagger: new LlmTopicTagger(generator, {
      logger: enrichmentLogger,
      maxInputChars: config.summarizer.topicInputChars,
      breaker
    }),
    maxCandidatesPerSource: config.discovery.maxCandidatesPerSource
  });

  return {
    config,
    logger,
    registry,
    pipeline,
    discovery: new DiscoveryService({
      pipeline,
      registry,
      skipCrawl: config.discovery.skipCrawl
    }),
    sessions: new SessionStore({
      maxSessions: config.sessions.maxSessions,
      seenCapacity: config.sessions.seenCapacity
    })
  };
}
