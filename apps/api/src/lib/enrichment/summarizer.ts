import type { Logger } from "@chomp/logger";

import { metrics } from "../../metrics/registry.js";
import { CircuitBreaker, CircuitBreakerOpenError } from "./circuit-breaker.js";
import type { TextGenerator } from "./text-generator.js";

export const TITLE_PREFIX = "TITLE:";
export const DEFAULT_SUMMARY_INPUT_CHARS = 4_000;

const SUMMARY_PROMPT = `You are a news article condenser.
Summarize the article into 3 concise lines.
Include specific details: people, places, things.
Express the main idea of the article in those three lines.
Cut filler. Be direct and objective.
Finally, provide a unique, 4 word title.
Present the news as an original source. Do not reference 'the article' explicitly.

Output format:
${TITLE_PREFIX} <4 word title>
<summary line 1>
<summary line 2>
<summary line 3>`;

export type Summary = {
  aiTitle: string;
  summary: string;
};

export interface Summarizer {
  summarize(content: string | null | undefined): Promise<Summary | null>;
}

export type LlmSummarizerOptions = {
  logger: Logger;
  maxInputChars?: number;
  breaker?: CircuitBreaker;
};

/**
 * Short title and three-line summary for an article body. Resolves to null
 * whenever enrichment is unavailable; callers carry on without it.
 */
export class LlmSummarizer implements Summarizer {
  private readonly maxInputChars: number;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(
    private readonly generator: TextGenerator | null,
    options: LlmSummarizerOptions
  ) {
    this.logger = options.logger;
    this.maxInputChars = options.maxInputChars ?? DEFAULT_SUMMARY_INPUT_CHARS;
    this.breaker = options.breaker ?? new CircuitBreaker();
  }

  async summarize(content: string | null | undefined): Promise<Summary | null> {
    if (!content || content.trim().length === 0) {
      return null;
    }

    const generator = this.generator;
    if (!generator) {
      this.logger.debug("No text generator configured, skipping summary");
      metrics.enrichmentCalls.inc({ operation: "summary", status: "disabled" });
      return null;
    }

    const input = content.slice(0, this.maxInputChars);

    try {
      const raw = await this.breaker.execute(() =>
        generator.generate({
          system: SUMMARY_PROMPT,
          user: `Summarize this article:\n\n${input}`,
          temperature: 0.7,
          maxTokens: 250
        })
      );
      metrics.enrichmentCalls.inc({ operation: "summary", status: "success" });
      return parseSummary(raw);
    } catch (error) {
      if (error instanceof CircuitBreakerOpenError) {
        metrics.enrichmentCalls.inc({ operation: "summary", status: "circuit_open" });
        this.logger.debug("Summary skipped while circuit is open");
        return null;
      }

      metrics.enrichmentCalls.inc({ operation: "summary", status: "failure" });
      this.logger.warn(
        { error, contentLength: content.length },
        "Failed to generate summary"
      );
      return null;
    }
  }
}

/**
 * The `TITLE:` line becomes the title; every other non-blank line is part of
 * the summary, in the order received.
 */
export function parseSummary(raw: string): Summary {
  let aiTitle = "";
  const summaryLines: string[] = [];

  for (const rawLine of raw.split("\n")) {
    const line = rawLine.trim();
    if (line.startsWith(TITLE_PREFIX)) {
      aiTitle = line.slice(TITLE_PREFIX.length).trim();
    } else if (line) {
      summaryLines.push(line);
    }
  }

  return { aiTitle, summary: summaryLines.join("\n") };
}
