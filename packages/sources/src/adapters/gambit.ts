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

const BASE_URL = "https://www.nola.com";

export class GambitSource extends BrowsingSource {
  readonly name = "Gambit";
  readonly key = "gambit";
  readonly location = {
    latitude: 29.9511,
    longitude: -90.0715,
    city: "New Orleans, LA"
  };
  protected readonly categoryPages = [
    `${BASE_URL}/gambit/food_drink/`,
    `${BASE_URL}/gambit/events/`,
    `${BASE_URL}/gambit/music/`
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a[href]", pageUrl, (url) => {
      const { hostname, pathname } = new URL(url);
      return (
        hostname.endsWith("nola.com") &&
        pathname.includes("/gambit/") &&
        pathname.includes("article_") &&
        pathname.endsWith(".html")
      );
    });
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const container =
      root.querySelector("div.asset-body") ?? root.querySelector("article");
    const imageUrl =
      pickImageSource(root.querySelector("figure img")) ??
      pickImageSource(root.querySelector("div[class*='card-image'] img")) ??
      meta.imageUrl;

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(container),
      imageUrl,
      topics: []
    };
  }
}
