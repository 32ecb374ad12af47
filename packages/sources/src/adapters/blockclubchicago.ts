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

// Stories live under dated paths: /2024/05/17/slug/
const ARTICLE_PATH = /^https:\/\/blockclubchicago\.org\/\d{4}\/\d{2}\/\d{2}\/[^/]+/;

export class BlockClubChicagoSource extends BrowsingSource {
  readonly name = "Block Club Chicago";
  readonly key = "blockclubchicago";
  readonly location = {
    latitude: 41.8781,
    longitude: -87.6298,
    city: "Chicago, IL"
  };
  protected readonly categoryPages = ["https://blockclubchicago.org/arts-culture/"];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a[href]", pageUrl, (url) => ARTICLE_PATH.test(url));
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(
        root.querySelector("div.entry-content"),
        "p, h2, h3, h4, li",
        21
      ),
      imageUrl:
        pickImageSource(
          root.querySelector("img[class*='attachment-newspack-featured-image']")
        ) ?? meta.imageUrl,
      topics: []
    };
  }
}
