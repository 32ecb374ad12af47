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

const BASE_URL = "https://doorcountypulse.com";

export class DoorCountyPulseSource extends BrowsingSource {
  readonly name = "Door County Pulse";
  readonly key = "doorcountypulse";
  readonly location = {
    latitude: 44.8342,
    longitude: -87.377,
    city: "Sturgeon Bay, WI"
  };
  protected readonly categoryPages = [
    `${BASE_URL}/food-and-drink/`,
    `${BASE_URL}/entertainment/`,
    `${BASE_URL}/outdoor/`
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(
      root,
      "li[class*='post'] p.hentry__title a[href]",
      pageUrl,
      (url) => !new URL(url).pathname.toLowerCase().startsWith("/podcast")
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(root.querySelector("section.pg-content")),
      imageUrl:
        pickImageSource(root.querySelector("div.featured-image img")) ??
        meta.imageUrl,
      topics: []
    };
  }
}
