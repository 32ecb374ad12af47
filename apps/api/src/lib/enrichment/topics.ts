import type { Logger } from "@chomp/logger";

import { metrics } from "../../metrics/registry.js";
import { CircuitBreaker, CircuitBreakerOpenError } from "./circuit-breaker.js";
import type { TextGenerator } from "./text-generator.js";

export const DEFAULT_TOPIC_INPUT_CHARS = 2_000;

const TOPIC_PROMPT = `You are a news article topic tagger.
Extract 4-6 keyword tags that categorize this article for comparison with other articles.
Tags should be REUSABLE - the same tag should appear across many different articles on similar subjects.
Specific names are OK for locations, major figures and organizations.
Categories should be general: Natural Disaster, Weather, Humanitarian Aid, Tech Industry, Climate, Crime.
Avoid subjective or interpretive tags. Keep tags to 1-2 words each.
Return only the tags, one per line, no numbering or bullets.`;

export interface TopicTagger {
  extractTopics(content: string | null | undefined): Promise<string[]>;
}

export class LlmTopicTagger implements TopicTagger {
  private readonly maxInputChars: number;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(
    private readonly generator: TextGenerator | null,
    options: { logger: Logger; maxInputChars?: number; breaker?: CircuitBreaker }
  ) {
    this.logger = options.logger;
    this.maxInputChars = options.maxInputChars ?? DEFAULT_TOPIC_INPUT_CHARS;
    this.breaker = options.breaker ?? new CircuitBreaker();
  }

  async extractTopics(content: string | null | undefined): Promise<string[]> {
    const generator = this.generator;
    if (!content || content.trim().length === 0 || !generator) {
      return [];
    }

    const input = content.slice(0, this.maxInputChars);

    try {
      const raw = await this.breaker.execute(() =>
        generator.generate({
          system: TOPIC_PROMPT,
          user: `Extract topics from this article:\n\n${input}`,
          temperature: 0.3,
          maxTokens: 100
        })
      );
      metrics.enrichmentCalls.inc({ operation: "topics", status: "success" });
      return parseTopics(raw);
    } catch (error) {
      const status =
        error instanceof CircuitBreakerOpenError ? "circuit_open" : "failure";
      metrics.enrichmentCalls.inc({ operation: "topics", status });
      if (status === "failure") {
        this.logger.warn({ error }, "Failed to extract topics");
      }
      return [];
    }
  }
}

export function parseTopics(raw: string): string[] {
  return [
    ...new Set(
      raw
        .split("\n")
        .map((line) => line.trim().replace(/^(?:[-*•]|\d+[.)])\s*/, "").trim())
        .filter(Boolean)
    )
  ];
}
