import {
  InvalidUrlError,
  type NewsSource,
  type SourceRegistry
} from "@chomp/sources";

import { categoryForSource, type Category } from "../../lib/discovery/categories.js";
import { pickMockArticle, type MockArticles } from "../../lib/discovery/mock-articles.js";
import type {
  ArticleRecord,
  DiscoveryPipeline,
  DiscoveryRequest
} from "../../lib/discovery/pipeline.js";
import { articleResponseSchema, type ArticleResponse } from "./schemas.js";

export const NO_NEW_ARTICLES_MESSAGE = "No new articles found";

export type DiscoveryServiceOptions = {
  pipeline: DiscoveryPipeline;
  registry: SourceRegistry;
  /** Serve fixture articles instead of crawling. */
  skipCrawl?: boolean;
  mockArticles?: () => MockArticles;
  random?: () => number;
};

export type InspectOutcome =
  | { status: "ok"; record: ArticleRecord; source: NewsSource; category: Category }
  | { status: "invalid_url"; message: string }
  | { status: "unsupported_source"; url: string }
  | { status: "fetch_failed" }
  | { status: "extract_failed"; source: NewsSource };

export class DiscoveryService {
  constructor(private readonly options: DiscoveryServiceOptions) {}

  /**
   * Next unseen article for the request's seen partition, serialized for the
   * response. The URL is recorded as seen only once serialization succeeded.
   */
  async next(request: DiscoveryRequest): Promise<ArticleResponse | null> {
    if (this.options.skipCrawl) {
      const mock = pickMockArticle(
        request.category,
        this.options.mockArticles?.(),
        this.options.random
      );
      return mock ? toArticleResponse(mock) : null;
    }

    const record = await this.options.pipeline.run(request);
    if (!record) {
      return null;
    }

    const response = toArticleResponse(record);
    request.seen.markSeen(request.category, record.url);
    return response;
  }

  async inspect(url: string): Promise<InspectOutcome> {
    let source: NewsSource | undefined;
    try {
      source = this.options.registry.getByUrl(url);
    } catch (error) {
      if (error instanceof InvalidUrlError) {
        return { status: "invalid_url", message: error.message };
      }
      throw error;
    }

    if (!source) {
      return { status: "unsupported_source", url };
    }

    const result = await this.options.pipeline.inspect(source, url);
    switch (result.status) {
      case "ok":
        return {
          status: "ok",
          record: result.record,
          source,
          category: categoryForSource(source.key)
        };
      case "fetch_failed":
        return { status: "fetch_failed" };
      case "extract_failed":
        return { status: "extract_failed", source };
    }
  }
}

export function toArticleResponse(record: ArticleRecord): ArticleResponse {
  return articleResponseSchema.parse({
    ...record,
    publishedAt: formatPublishedAt(record.publishedAt)
  });
}

/** ISO timestamp, or null for dates a four-digit year cannot express. */
export function formatPublishedAt(date: Date | null): string | null {
  if (!date || Number.isNaN(date.getTime())) {
    return null;
  }
  const year = date.getUTCFullYear();
  return year >= 0 && year <= 9999 ? date.toISOString() : null;
}
