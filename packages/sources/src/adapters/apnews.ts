import type { HTMLElement } from "node-html-parser";

import {
  collectLinks,
  collectMetaValues,
  collectText,
  getMetaContent,
  normaliseWhitespace,
  parseHtml,
  pickImageSource,
  readArticleMeta
} from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

const BASE_URL = "https://apnews.com";

export class APNewsSource extends BrowsingSource {
  readonly name = "AP News";
  readonly key = "apnews";
  protected readonly categoryPages = [`${BASE_URL}/world-news`];

  async discover(query?: string): Promise<string[]> {
    if (!query) {
      return this.browse(this.categoryPages);
    }

    // s=0 sorts by relevance
    const searchUrl = `${BASE_URL}/search?q=${encodeURIComponent(query)}&s=0`;
    try {
      const html = await this.fetcher(searchUrl);
      return this.collectArticleLinks(parseHtml(html), searchUrl);
    } catch (error) {
      this.logSearchFailure(query, error);
      return [];
    }
  }

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "div.PagePromo-title a.Link", pageUrl, (url) =>
      url.includes("/article/")
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const body = root.querySelector("div.RichTextStoryBody.RichTextBody");
    const content =
      collectText(body) ?? (body ? normaliseWhitespace(body.text) || null : null);

    return {
      title: meta.title,
      url: getMetaContent(root, "meta[property='og:url']") ?? meta.url,
      publishedAt: meta.publishedAt,
      content,
      imageUrl: leadImage(root),
      topics: collectMetaValues(root, "article:tag")
    };
  }
}

// Video posters win over the lead picture.
function leadImage(root: HTMLElement) {
  const pageContent = root.querySelector("div.Page-content");
  if (!pageContent) return null;

  const poster = pageContent
    .querySelector("bsp-jw-player")
    ?.getAttribute("poster")
    ?.trim();
  if (poster) return poster;

  const img = pageContent.querySelector("picture img.Image");
  return (
    img?.getAttribute("data-flickity-lazyload")?.trim() || pickImageSource(img)
  );
}
