import type { HTMLElement } from "node-html-parser";
import { describe, expect, it, vi } from "vitest";

import { collectLinks } from "../lib/html-metadata.js";
import type { ExtractedArticle } from "../types.js";
import { BrowsingSource } from "./browsing-source.js";

class SectionSource extends BrowsingSource {
  readonly name = "Section Source";
  readonly key = "section";
  protected readonly categoryPages = [
    "https://example.com/arts",
    "https://example.com/food"
  ];

  protected collectArticleLinks(root: HTMLElement, pageUrl: string) {
    return collectLinks(root, "a.story", pageUrl);
  }

  extract(_html: string): ExtractedArticle {
    return {
      title: null,
      url: null,
      publishedAt: null,
      content: null,
      imageUrl: null,
      topics: []
    };
  }
}

describe("BrowsingSource.discover", () => {
  it("moves on to the next page when one fails", async () => {
    const fetcher = vi.fn(async (url: string) => {
      if (url === "https://example.com/food") {
        throw new Error("HTTP 500");
      }
      return `<a class="story" href="/arts/mural">Mural</a><a class="story" href="/arts/mural">Again</a>`;
    });
    // random() = 0 swaps the two pages, so food is tried first
    const source = new SectionSource({ fetcher, random: () => 0 });

    const urls = await source.discover();

    expect(fetcher.mock.calls.map(([url]) => url)).toEqual([
      "https://example.com/food",
      "https://example.com/arts"
    ]);
    expect(urls).toEqual(["https://example.com/arts/mural"]);
  });

  it("stops at the first page with links", async () => {
    const fetcher = vi.fn().mockResolvedValue(`<a class="story" href="/x">X</a>`);
    const source = new SectionSource({ fetcher, random: () => 0.99 });

    const urls = await source.discover();

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(fetcher).toHaveBeenCalledWith("https://example.com/arts");
    expect(urls).toEqual(["https://example.com/x"]);
  });

  it("resolves to an empty list when every page fails or is empty", async () => {
    const fetcher = vi
      .fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValueOnce("<p>nothing here</p>");
    const source = new SectionSource({ fetcher });

    await expect(source.discover()).resolves.toEqual([]);
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it("delegates fetch to the configured fetcher", async () => {
    const fetcher = vi.fn().mockResolvedValue("<html></html>");
    const source = new SectionSource({ fetcher });

    await expect(source.fetch("https://example.com/arts/mural")).resolves.toBe("<html></html>");
  });
});
