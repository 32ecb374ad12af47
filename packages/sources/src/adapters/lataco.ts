import type { HTMLElement } from "node-html-parser";

import {
  collectLinks,
  collectText,
  parseHtml,
  readArticleMeta
} from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

const NON_ARTICLE_PATHS = [
  "/category/",
  "/tag/",
  "/author/",
  "/neighborhoods",
  "/products",
  "/members",
  "/join",
  "/login",
  "/sponsor",
  "/mobile-apps",
  "/local-business-directory",
  "/send-us-your-stuff",
  "/terms-of-service",
  "/privacy-policy",
  "/about"
];

export class LATacoSource extends BrowsingSource {
  readonly name = "L.A. TACO";
  readonly key = "lataco";
  readonly location = {
    latitude: 34.0522,
    longitude: -118.2437,
    city: "Los Angeles, CA"
  };
  protected readonly categoryPages = ["https://lataco.com/category/food"];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a[href]", pageUrl, (url) => {
      const parsed = new URL(url);
      if (parsed.hostname !== "lataco.com" && parsed.hostname !== "www.lataco.com") {
        return false;
      }
      if (NON_ARTICLE_PATHS.some((path) => parsed.pathname.includes(path))) {
        return false;
      }
      // article slugs are long; section links are not
      return parsed.pathname.length > 11;
    });
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const container =
      root.querySelector("article") ??
      root.querySelector("div.entry-content, div.article-content, div.post-content");
    const content = collectText(container) ?? this.readableText(html, meta.url);

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
