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

export class ReutersSource extends BrowsingSource {
  readonly name = "Reuters";
  readonly key = "reuters";
  protected readonly categoryPages = ["https://www.reuters.com/world/"];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a[data-testid='TitleLink']", pageUrl, (url) =>
      url.includes("reuters.com")
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const content =
      collectText(root, "[data-testid^='paragraph-']") ??
      collectText(root, "[class*='article-body-module__paragraph']");

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content,
      imageUrl:
        pickImageSource(root.querySelector("img[data-testid='EagerImage']")) ??
        meta.imageUrl,
      topics: []
    };
  }
}
