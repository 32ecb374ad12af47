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

const BASE_URL = "https://www.slugmag.com";

export class SlugMagSource extends BrowsingSource {
  readonly name = "Slug Magazine";
  readonly key = "slugmag";
  readonly location = {
    latitude: 40.7608,
    longitude: -111.891,
    city: "Salt Lake City, UT"
  };
  protected readonly categoryPages = [
    `${BASE_URL}/category/music/`,
    `${BASE_URL}/category/arts/`,
    `${BASE_URL}/events/`,
    `${BASE_URL}/category/community/`
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    if (pageUrl.includes("/events/")) {
      return collectLinks(root, "a.wpem-event-action-url", pageUrl);
    }
    return collectLinks(root, "h4.card-title a[href]", pageUrl);
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    // event pages and articles use different templates
    const content =
      collectText(root.querySelector("div.wpem-single-event-body-content")) ??
      collectText(root.querySelector("div.entry-content"));

    const image =
      pickImageSource(root.querySelector("div.wpem-event-single-image img")) ??
      pickImageSource(root.querySelector("img.wp-post-image")) ??
      meta.imageUrl;

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content,
      imageUrl: resolveUrl(image, BASE_URL),
      topics: []
    };
  }
}
