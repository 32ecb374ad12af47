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

const BASE_URL = "https://folioweekly.com";

export class FolioWeeklySource extends BrowsingSource {
  readonly name = "Folio Weekly";
  readonly key = "folioweekly";
  readonly location = {
    latitude: 30.3322,
    longitude: -81.6557,
    city: "Jacksonville, FL"
  };
  protected readonly categoryPages = [
    `${BASE_URL}/category/entertainment/`,
    `${BASE_URL}/category/lifestyle/`
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "article h2 a[href]", pageUrl);
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);
    const image = pickImageSource(root.querySelector("img.wp-post-image"));

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(root.querySelector("div.entry-content")),
      imageUrl: resolveUrl(image, BASE_URL) ?? meta.imageUrl,
      topics: []
    };
  }
}
