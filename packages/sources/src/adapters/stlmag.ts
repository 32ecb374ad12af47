import type { HTMLElement } from "node-html-parser";

import {
  collectLinks,
  collectText,
  parseHtml,
  pickImageSource,
  readArticleMeta,
  resolveUrl
} from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

const BASE_URL = "https://www.stlmag.com";

export class STLMagSource extends BrowsingSource {
  readonly name = "STL Magazine";
  readonly key = "stlmag";
  readonly location = {
    latitude: 38.627,
    longitude: -90.1994,
    city: "St. Louis, MO"
  };
  protected readonly categoryPages = [
    `${BASE_URL}/dining/`,
    `${BASE_URL}/culture/`,
    `${BASE_URL}/health/`
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(
      root,
      "article.c-article-card h2.c-article-card__title a[href]",
      pageUrl
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const container =
      root.querySelector("div.wp-block-post-content") ??
      root.querySelector("div.entry-content");
    const image = pickImageSource(root.querySelector("img.c-single-post-image"));

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(container),
      imageUrl: resolveUrl(image, BASE_URL) ?? meta.imageUrl,
      topics: []
    };
  }
}
