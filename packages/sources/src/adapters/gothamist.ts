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

export class GothamistSource extends BrowsingSource {
  readonly name = "The Gothamist";
  readonly key = "gothamist";
  readonly location = {
    latitude: 40.7128,
    longitude: -74.006,
    city: "New York, NY"
  };
  protected readonly categoryPages = ["https://gothamist.com/arts-entertainment/"];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a.card-title-link", pageUrl);
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const featured =
      root.querySelector("img.featured-image") ??
      root.querySelector("img.wp-post-image") ??
      root.querySelector("figure.featured-image img");

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(
        root.querySelector("div.content"),
        "p, h2, h3, h4, li",
        21
      ),
      imageUrl: meta.imageUrl ?? pickImageSource(featured),
      topics: []
    };
  }
}
