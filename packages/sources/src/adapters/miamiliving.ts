import type { HTMLElement } from "node-html-parser";

import {
  collectLinks,
  collectText,
  normaliseWhitespace,
  parseHtml,
  pickImageSource,
  readArticleMeta
} from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

const BASE_URL = "https://www.miamilivingmagazine.com";

export class MiamiLivingSource extends BrowsingSource {
  readonly name = "Miami Living Magazine";
  readonly key = "miamiliving";
  readonly location = {
    latitude: 25.7617,
    longitude: -80.1918,
    city: "Miami, FL"
  };
  protected readonly categoryPages = [`${BASE_URL}/food-drink`, `${BASE_URL}/culture`];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, ".gallery-item-container a[href]", pageUrl, (url) =>
      url.includes("/post/")
    );
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);
    const article = root.querySelector("article");

    const heading = article?.querySelector("h1");
    const title = (heading ? normaliseWhitespace(heading.text) : "") || meta.title;

    return {
      title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(article),
      imageUrl: pickImageSource(root.querySelector("wow-image img")) ?? meta.imageUrl,
      topics: []
    };
  }
}
