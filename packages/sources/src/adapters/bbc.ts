import type { HTMLElement } from "node-html-parser";

import {
  collectLinks,
  collectText,
  parseHtml,
  readArticleMeta
} from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

const BASE_URL = "https://www.bbc.com";

export class BBCSource extends BrowsingSource {
  readonly name = "BBC News";
  readonly key = "bbc";
  protected readonly categoryPages = [`${BASE_URL}/news/world`];

  async discover(query?: string): Promise<string[]> {
    if (!query) {
      return this.browse(this.categoryPages);
    }

    const searchUrl = `${BASE_URL}/search?q=${encodeURIComponent(query)}`;
    try {
      const html = await this.fetcher(searchUrl);
      return this.collectArticleLinks(parseHtml(html), searchUrl);
    } catch (error) {
      this.logSearchFailure(query, error);
      return [];
    }
  }

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a[href]", pageUrl, (url) => {
      const host = new URL(url).hostname;
      const isBbc = host.endsWith("bbc.com") || host.endsWith("bbc.co.uk");
      return isBbc && url.includes("/articles/");
    });
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const content =
      collectText(root, "[data-component='text-block'] p") ??
      collectText(root.querySelector("article"));

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content,
      imageUrl: meta.imageUrl,
      topics: []
    };
  }
}
