import type { Logger } from "@chomp/logger";
import {
  isExtractionSuccess,
  shuffled,
  tryCanonicalize,
  type ExtractedArticle,
  type NewsSource,
  type SourceRegistry
} from "@chomp/sources";

import { metrics } from "../../metrics/registry.js";
import type { Summarizer } from "../enrichment/summarizer.js";
import type { TopicTagger } from "../enrichment/topics.js";
import type { SeenSet } from "./seen-set.js";

export type ArticleRecord = {
  url: string;
  title: string;
  publishedAt: Date | null;
  content: string | null;
  imageUrl: string | null;
  topics: string[];
  aiTitle: string;
  summary: string;
  source: string;
};

export type DiscoveryRequest = {
  category: string;
  sourceKeys: readonly string[];
  seen: SeenSet;
  query?: string;
};

export type InspectResult =
  | { status: "ok"; record: ArticleRecord }
  | { status: "fetch_failed"; error: unknown }
  | { status: "extract_failed" };

export type DiscoveryPipelineOptions = {
  registry: Pick<SourceRegistry, "get">;
  logger: Logger;
  summarizer?: Summarizer | null;
  topicTagger?: TopicTagger | null;
  /** Candidates tried per source before moving on; 0 tries them all. */
  maxCandidatesPerSource?: number;
  random?: () => number;
};

type CandidateOutcome =
  | "invalid_url"
  | "seen"
  | "fetch_failed"
  | "extract_failed"
  | "duplicate_after_extract"
  | "returned";

/**
 * Finds one article the client has not seen yet. Sources are tried in random
 * order and candidates in the order their source ranked them; the first
 * success wins. Nothing here runs concurrently.
 */
export class DiscoveryPipeline {
  private readonly registry: Pick<SourceRegistry, "get">;
  private readonly logger: Logger;
  private readonly summarizer: Summarizer | null;
  private readonly topicTagger: TopicTagger | null;
  private readonly maxCandidatesPerSource: number;
  private readonly random: () => number;

  constructor(options: DiscoveryPipelineOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
    this.summarizer = options.summarizer ?? null;
    this.topicTagger = options.topicTagger ?? null;
    this.maxCandidatesPerSource = options.maxCandidatesPerSource ?? 0;
    this.random = options.random ?? Math.random;
  }

  /**
   * Resolves to null when every source is exhausted. The seen-set is only
   * read; marking the returned URL is left to the caller.
   */
  async run(request: DiscoveryRequest): Promise<ArticleRecord | null> {
    const stopTimer = metrics.discoveryDuration.startTimer();

    try {
      for (const key of shuffled(request.sourceKeys, this.random)) {
        const source = this.registry.get(key);
        if (!source) {
          this.logger.warn({ source: key }, "Unknown source key, skipping");
          continue;
        }

        const record = await this.scanSource(source, request);
        if (record) {
          metrics.discoveryRuns.inc({ outcome: "found" });
          this.logger.info(
            { category: request.category, source: source.key, url: record.url },
            "Discovered unseen article"
          );
          return record;
        }
      }

      metrics.discoveryRuns.inc({ outcome: "exhausted" });
      this.logger.info(
        { category: request.category, sources: request.sourceKeys.length },
        "No unseen article available"
      );
      return null;
    } finally {
      stopTimer();
    }
  }

  /**
   * Fetches and extracts one URL with its owning source, bypassing the
   * seen-set.
   */
  async inspect(source: NewsSource, url: string): Promise<InspectResult> {
    let article: ExtractedArticle;
    try {
      article = source.extract(await source.fetch(url));
    } catch (error) {
      this.logger.warn({ source: source.key, url, error }, "Failed to fetch article");
      return { status: "fetch_failed", error };
    }

    if (!article.title) {
      return { status: "extract_failed" };
    }

    const canonicalUrl =
      tryCanonicalize(resolveAgainst(article.url, url)) ?? tryCanonicalize(url) ?? url;

    return {
      status: "ok",
      record: await this.buildRecord(source.key, canonicalUrl, {
        ...article,
        title: article.title
      })
    };
  }

  private async scanSource(
    source: NewsSource,
    request: DiscoveryRequest
  ): Promise<ArticleRecord | null> {
    const candidates = await this.discoverCandidates(source, request.query);
    if (candidates.length === 0) {
      this.logger.debug({ source: source.key }, "Source has no candidates");
      return null;
    }

    const limited =
      this.maxCandidatesPerSource > 0
        ? candidates.slice(0, this.maxCandidatesPerSource)
        : candidates;

    for (const candidate of limited) {
      const record = await this.tryCandidate(source, candidate, request);
      if (record) {
        return record;
      }
    }

    return null;
  }

  private async discoverCandidates(source: NewsSource, query?: string) {
    try {
      return await source.discover(query);
    } catch (error) {
      // adapters should not reject here; treat a stray rejection as "nothing"
      this.logger.warn({ source: source.key, error }, "Discovery failed");
      return [];
    }
  }

  private async tryCandidate(
    source: NewsSource,
    candidateUrl: string,
    { category, seen }: DiscoveryRequest
  ): Promise<ArticleRecord | null> {
    const canonical = tryCanonicalize(candidateUrl);
    if (!canonical) {
      this.count(source, "invalid_url");
      this.logger.debug({ source: source.key, candidateUrl }, "Skipping unparseable candidate");
      return null;
    }

    if (seen.hasSeen(category, canonical)) {
      this.count(source, "seen");
      this.logger.debug({ source: source.key, url: canonical }, "Skipping already-seen article");
      return null;
    }

    let article: ExtractedArticle;
    try {
      const html = await source.fetch(candidateUrl);
      article = source.extract(html);
    } catch (error) {
      this.count(source, "fetch_failed");
      this.logger.warn(
        { source: source.key, url: candidateUrl, error },
        "Failed to fetch or extract candidate"
      );
      return null;
    }

    if (!isExtractionSuccess(article)) {
      this.count(source, "extract_failed");
      this.logger.debug(
        { source: source.key, url: candidateUrl },
        "Extraction yielded no title or URL"
      );
      return null;
    }

    // the page may name a different URL than the one discovered (redirects)
    const articleUrl = tryCanonicalize(resolveAgainst(article.url, candidateUrl));
    if (!articleUrl) {
      this.count(source, "extract_failed");
      return null;
    }

    if (seen.hasSeen(category, articleUrl)) {
      this.count(source, "duplicate_after_extract");
      return null;
    }

    this.count(source, "returned");
    return this.buildRecord(source.key, articleUrl, article);
  }

  private async buildRecord(
    sourceKey: string,
    url: string,
    article: ExtractedArticle & { title: string }
  ): Promise<ArticleRecord> {
    const summary = await this.summarize(article.content);
    const topics =
      article.topics.length > 0 ? article.topics : await this.tagTopics(article.content);

    return {
      url,
      title: article.title,
      publishedAt: article.publishedAt,
      content: article.content,
      imageUrl: article.imageUrl,
      topics,
      aiTitle: summary?.aiTitle ?? "",
      summary: summary?.summary ?? "",
      source: sourceKey
    };
  }

  private async summarize(content: string | null) {
    if (!this.summarizer) return null;
    try {
      return await this.summarizer.summarize(content);
    } catch (error) {
      this.logger.warn({ error }, "Summarizer failed, continuing without summary");
      return null;
    }
  }

  private async tagTopics(content: string | null) {
    if (!this.topicTagger) return [];
    try {
      return await this.topicTagger.extractTopics(content);
    } catch (error) {
      this.logger.warn({ error }, "Topic tagging failed, continuing without topics");
      return [];
    }
  }

  private count(source: NewsSource, outcome: CandidateOutcome) {
    metrics.discoveryCandidates.inc({ source: source.key, outcome });
  }
}

function resolveAgainst(url: string | null, base: string): string | null {
  if (!url) return null;
  try {
    return new URL(url, base).toString();
  } catch {
    return url;
  }
}
