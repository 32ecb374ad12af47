import type { HTMLElement } from "node-html-parser";
import { createLogger } from "@chomp/logger";

import { createHtmlFetcher } from "../lib/fetch-html.js";
import { extractArticleContent } from "../lib/article-content.js";
import { parseHtml, uniqueInOrder } from "../lib/html-metadata.js";
import { shuffled } from "../lib/shuffle.js";
import type {
  ExtractedArticle,
  HtmlFetcher,
  NewsSource,
  SourceOptions
} from "../types.js";

const logger = createLogger({ name: "sources" });

export const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

/**
 * Base for publishers that are discovered by browsing section pages. Pages
 * are tried in random order until one yields article links.
 */
export abstract class BrowsingSource implements NewsSource {
  abstract readonly name: string;
  abstract readonly key: string;
  protected abstract readonly categoryPages: readonly string[];

  protected readonly fetcher: HtmlFetcher;
  protected readonly random: () => number;

  constructor(options: SourceOptions = {}) {
    this.fetcher =
      options.fetcher ??
      createHtmlFetcher(options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS);
    this.random = options.random ?? Math.random;
  }

  async discover(_query?: string): Promise<string[]> {
    return this.browse(this.categoryPages);
  }

  fetch(url: string): Promise<string> {
    return this.fetcher(url);
  }

  abstract extract(html: string): ExtractedArticle;

  protected abstract collectArticleLinks(
    root: HTMLElement,
    pageUrl: string
  ): string[];

  protected async browse(pages: readonly string[]): Promise<string[]> {
    for (const pageUrl of shuffled(pages, this.random)) {
      try {
        const html = await this.fetcher(pageUrl);
        const links = uniqueInOrder(
          this.collectArticleLinks(parseHtml(html), pageUrl)
        );

        if (links.length > 0) {
          logger.debug(
            { source: this.key, pageUrl, count: links.length },
            "Collected article links"
          );
          return links;
        }

        logger.debug({ source: this.key, pageUrl }, "No article links on page");
      } catch (error) {
        logger.warn(
          { source: this.key, pageUrl, error },
          "Failed to browse category page"
        );
      }
    }

    logger.info({ source: this.key }, "All category pages exhausted");
    return [];
  }

  protected readableText(html: string, url: string | null) {
    return extractArticleContent(html, url ?? undefined);
  }

  protected logSearchFailure(query: string, error: unknown) {
    logger.warn({ source: this.key, query, error }, "Search request failed");
  }
}
