import type { HTMLElement } from "node-html-parser";

import {
  collectLinks,
  collectText,
  parseHtml,
  pickImageSource,
  readArticleMeta,
  resolveUrl
} from "../lib/html-metadata.js";
import type { ExtractedArticle, SourceOptions } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

const BASE_URL = "https://303magazine.com";
const DATED_ARTICLE = /^https:\/\/303magazine\.com\/20\d{2}\/\d{2}\/[^/]+/;

export class Magazine303Source extends BrowsingSource {
  readonly name = "303 Magazine";
  readonly key = "303magazine";
  readonly location = {
    latitude: 39.7392,
    longitude: -104.9903,
    city: "Denver, CO"
  };
  protected readonly categoryPages = [`${BASE_URL}/`];

  private readonly now: () => Date;

  constructor(options: SourceOptions & { now?: () => Date } = {}) {
    super(options);
    this.now = options.now ?? (() => new Date());
  }

  /** The current month's archive first, the front page if that is empty. */
  async discover(): Promise<string[]> {
    const archive = await this.browse([this.archiveUrl()]);
    return archive.length > 0 ? archive : this.browse(this.categoryPages);
  }

  archiveUrl() {
    const date = this.now();
    const month = String(date.getUTCMonth() + 1).padStart(2, "0");
    return `${BASE_URL}/${date.getUTCFullYear()}/${month}/`;
  }

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    const titled = collectLinks(root, ".cs-entry__title a[href]", pageUrl, (url) =>
      DATED_ARTICLE.test(url)
    );
    if (titled.length > 0) {
      return titled;
    }
    return collectLinks(root, "a[href]", pageUrl, (url) => DATED_ARTICLE.test(url));
  }

  extract(html: string): ExtractedArticle {
    const root = parseHtml(html);
    const meta = readArticleMeta(root);

    const figureImage = pickImageSource(root.querySelector("figure img"));

    return {
      title: meta.title,
      url: meta.url,
      publishedAt: meta.publishedAt,
      content: collectText(root.querySelector("article") ?? root, "p", 40),
      imageUrl: meta.imageUrl ?? resolveUrl(figureImage, BASE_URL),
      topics: []
    };
  }
}
