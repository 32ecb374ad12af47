import type { HTMLElement } from "node-html-parser";

import { parseFeed } from "../lib/rss-parser.js";
import {
  collectText,
  parseHtml,
  readArticleMeta,
  uniqueInOrder
} from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

const FEED_BASE = "https://news.google.com/rss/search";

/**
 * Search-only source backed by the Google News RSS search feed. Item links
 * redirect to the publisher, so the extracted URL usually differs from the
 * discovered one.
 */
export class GoogleNewsSource extends BrowsingSource {
  readonly name = "Google News";
  readonly key = "googlenews";
  protected readonly categoryPages: readonly string[] = [];

  async discover(query?: string): Promise<string[]> {
    if (!query) {
      return [];
    }

    try {
      const xml = await this.fetcher(this.searchFeedUrl(query));
      const feed = await parseFeed(xml);
      return uniqueInOrder(
        (feed.items ?? [])
          .map((item) => item.link?.trim())
          .filter((link): link is string => Boolean(link))
      );
    } catch (error) {
      this.logSearchFailure(query, error);
      return [];
    }
  }

  searchFeedUrl(query: string) {
    const params = new URLSearchParams({
      q: query,
      hl: "en-US",
      gl: "US",
      ceid: "US:en"
    });
    return `${FEED_BASE}?${params.toString()}`;
  }

  protected collectArticleLinks(_root: HTMLElement, _pageUrl: string): string[] {
    return [];
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content:
        collectText(root.querySelector("article")) ?? this.readableText(html, meta.url),
      imageUrl: meta.imageUrl,
      topics: []
    };
  }
}
