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

const BASE_URL = "https://urbanmilwaukee.com";

export class UrbanMilwaukeeSource extends BrowsingSource {
  readonly name = "Urban Milwaukee";
  readonly key = "urbanmilwaukee";
  readonly location = {
    latitude: 43.0389,
    longitude: -87.9065,
    city: "Milwaukee, WI"
  };
  protected readonly categoryPages = [
    `${BASE_URL}/food-drink/`,
    `${BASE_URL}/arts-entertainment/`
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "div.wide-story-block a[href]", pageUrl, (url) =>
      /^https:\/\/urbanmilwaukee\.com\/\d{4}\/\d{2}\/\d{2}\//.test(url)
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(root.querySelector("div.entry")),
      imageUrl:
        pickImageSource(root.querySelector("div.wp-caption img")) ??
        meta.imageUrl,
      topics: []
    };
  }
}
