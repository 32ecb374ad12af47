import { describe, expect, it, vi } from "vitest";

import { APNewsSource } from "./apnews.js";

const ARTICLE_HTML = `
<html>
  <head>
    <meta property="og:title" content="Harbour Deal Signed">
    <meta property="og:url" content="https://apnews.com/article/harbour-deal-1a2b">
    <meta property="article:published_time" content="2025-02-11T08:15:00Z">
    <meta property="article:tag" content="Trade">
    <meta property="article:tag" content="Shipping">
  </head>
  <body>
    <div class="Page-content">
      <picture>
        <img class="Image" src="https://cdn.example.com/harbour.jpg">
      </picture>
    </div>
    <div class="RichTextStoryBody RichTextBody">
      Five ports will share dredging costs under the new deal.
    </div>
  </body>
</html>
`;

describe("APNewsSource.extract", () => {
  const source = new APNewsSource({ fetcher: vi.fn() });

  it("extracts the core article fields", () => {
    const article = source.extract(ARTICLE_HTML);

    expect(article.title).toBe("Harbour Deal Signed");
    expect(article.url).toBe("https://apnews.com/article/harbour-deal-1a2b");
    expect(article.publishedAt?.toISOString()).toBe("2025-02-11T08:15:00.000Z");
    expect(article.content).toBe("Five ports will share dredging costs under the new deal.");
    expect(article.imageUrl).toBe("https://cdn.example.com/harbour.jpg");
    expect(article.topics).toEqual(["Trade", "Shipping"]);
  });

  it("joins story paragraphs when the body has them", () => {
    const article = source.extract(`
      <meta property="og:title" content="Two Paragraphs">
      <meta property="og:url" content="https://apnews.com/article/two">
      <div class="RichTextStoryBody RichTextBody">
        <p>First line.</p>
        <p>Second line.</p>
      </div>
    `);

    expect(article.content).toBe("First line.\nSecond line.");
  });

  it("leaves optional fields empty when the page lacks them", () => {
    const article = source.extract(`
      <html>
        <head>
          <meta property="og:title" content="Bare Page">
          <meta property="og:url" content="https://apnews.com/article/bare">
        </head>
        <body></body>
      </html>
    `);

    expect(article.title).toBe("Bare Page");
    expect(article.content).toBeNull();
    expect(article.imageUrl).toBeNull();
    expect(article.publishedAt).toBeNull();
    expect(article.topics).toEqual([]);
  });

  it("prefers the video poster over the lead picture", () => {
    const article = source.extract(`
      <meta property="og:title" content="Video Story">
      <meta property="og:url" content="https://apnews.com/article/video">
      <div class="Page-content">
        <bsp-jw-player poster="https://cdn.example.com/poster.jpg"></bsp-jw-player>
        <picture><img class="Image" src="https://cdn.example.com/fallback.jpg"></picture>
      </div>
    `);

    expect(article.imageUrl).toBe("https://cdn.example.com/poster.jpg");
  });
});

describe("APNewsSource.discover", () => {
  const searchPage = `
    <div class="PagePromo-title"><a class="Link" href="https://apnews.com/article/storm-1">Storm</a></div>
    <div class="PagePromo-title"><a class="Link" href="https://apnews.com/hub/weather">Hub</a></div>
    <div class="PagePromo-title"><a class="Link" href="/article/storm-2">Storm 2</a></div>
  `;

  it("searches by relevance when a query is given", async () => {
    const fetcher = vi.fn().mockResolvedValue(searchPage);
    const source = new APNewsSource({ fetcher });

    const urls = await source.discover("winter storm");

    expect(fetcher).toHaveBeenCalledWith("https://apnews.com/search?q=winter%20storm&s=0");
    expect(urls).toEqual([
      "https://apnews.com/article/storm-1",
      "https://apnews.com/article/storm-2"
    ]);
  });

  it("browses the world section without a query", async () => {
    const fetcher = vi.fn().mockResolvedValue(searchPage);
    const source = new APNewsSource({ fetcher });

    await source.discover();

    expect(fetcher).toHaveBeenCalledWith("https://apnews.com/world-news");
  });

  it("resolves to an empty list when the search request fails", async () => {
    const fetcher = vi.fn().mockRejectedValue(new Error("HTTP 503"));
    const source = new APNewsSource({ fetcher });

    await expect(source.discover("storm")).resolves.toEqual([]);
  });
});
