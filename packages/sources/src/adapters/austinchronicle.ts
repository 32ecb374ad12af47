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

const BASE_URL = "https://www.austinchronicle.com";

export class AustinChronicleSource extends BrowsingSource {
  readonly name = "Austin Chronicle";
  readonly key = "austinchronicle";
  readonly location = {
    latitude: 30.2672,
    longitude: -97.7431,
    city: "Austin, TX"
  };
  protected readonly categoryPages = [
    BASE_URL,
    `${BASE_URL}/food/`,
    `${BASE_URL}/arts/`,
    `${BASE_URL}/music/`,
    `${BASE_URL}/screens/`
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "article h3 a[href]", pageUrl, (url) =>
      url.startsWith(BASE_URL)
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);
    const image = pickImageSource(root.querySelector("img.wp-post-image"));

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(root.querySelector("article")),
      imageUrl: resolveUrl(image, BASE_URL) ?? meta.imageUrl,
      topics: []
    };
  }
}
