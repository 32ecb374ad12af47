import type { HTMLElement } from "node-html-parser";

import {
  collectLinks,
  collectText,
  parseHtml,
  pickImageSource,
  readArticleMeta
} from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

export class IExaminerSource extends BrowsingSource {
  readonly name = "iExaminer";
  readonly key = "iexaminer";
  readonly location = {
    latitude: 47.6062,
    longitude: -122.3321,
    city: "Seattle, WA"
  };
  protected readonly categoryPages = ["https://iexaminer.org/category/arts/"];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a.td-image-wrap", pageUrl, (url) =>
      url.includes("iexaminer.org")
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);
    const article = root.querySelector("article");

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(article),
      imageUrl:
        pickImageSource(article?.querySelector("img[class*='wp-image-']")) ??
        meta.imageUrl,
      topics: []
    };
  }
}
