import { describe, expect, it } from "vitest";

import {
  collectLinks,
  collectMetaValues,
  collectText,
  parseHtml,
  parsePublishedAt,
  pickImageSource,
  readArticleMeta,
  resolveUrl
} from "./html-metadata.js";

describe("readArticleMeta", () => {
  it("reads Open Graph fields and prefers the canonical link", () => {
    const root = parseHtml(`
      <html>
        <head>
          <meta property="og:title" content=" Riverfront Market Returns " />
          <meta property="og:url" content="https://example.com/og-url" />
          <meta property="og:image" content="https://cdn.example.com/market.jpg" />
          <meta property="article:published_time" content="2025-03-02T18:00:00Z" />
          <link rel="canonical" href="https://example.com/canonical" />
        </head>
      </html>
    `);

    const meta = readArticleMeta(root);

    expect(meta.title).toBe("Riverfront Market Returns");
    expect(meta.url).toBe("https://example.com/canonical");
    expect(meta.imageUrl).toBe("https://cdn.example.com/market.jpg");
    expect(meta.publishedAt?.toISOString()).toBe("2025-03-02T18:00:00.000Z");
  });

  it("falls back to og:url and a time element", () => {
    const root = parseHtml(`
      <head><meta property="og:url" content="https://example.com/og-url" /></head>
      <body><time datetime="2025-01-05T10:00:00Z">Jan 5</time></body>
    `);

    const meta = readArticleMeta(root);

    expect(meta.title).toBeNull();
    expect(meta.url).toBe("https://example.com/og-url");
    expect(meta.publishedAt?.toISOString()).toBe("2025-01-05T10:00:00.000Z");
    expect(meta.imageUrl).toBeNull();
  });
});

describe("parsePublishedAt", () => {
  it("returns null for missing or invalid dates", () => {
    expect(parsePublishedAt(null)).toBeNull();
    expect(parsePublishedAt("yesterday-ish")).toBeNull();
  });

  it("drops years an ISO timestamp cannot carry", () => {
    expect(parsePublishedAt("20240")).toBeNull();
    expect(parsePublishedAt(" 2024-05-06T07:08:09Z ")?.toISOString()).toBe(
      "2024-05-06T07:08:09.000Z"
    );
  });
});

describe("collectMetaValues", () => {
  it("collects repeated properties once each, in order", () => {
    const root = parseHtml(`
      <meta property="article:tag" content="Weather" />
      <meta property="article:tag" content="Floods" />
      <meta property="article:tag" content="Weather" />
    `);

    expect(collectMetaValues(root, "article:tag")).toEqual(["Weather", "Floods"]);
  });
});

describe("resolveUrl", () => {
  it("resolves relative links and rejects anchors and inline data", () => {
    expect(resolveUrl("/news/item", "https://example.com/section/")).toBe(
      "https://example.com/news/item"
    );
    expect(resolveUrl("#top", "https://example.com/")).toBeNull();
    expect(resolveUrl("data:image/png;base64,AAAA", "https://example.com/")).toBeNull();
    expect(resolveUrl(null, "https://example.com/")).toBeNull();
  });
});

describe("pickImageSource", () => {
  it("skips data: placeholders in favour of lazy-loaded sources", () => {
    const root = parseHtml(
      `<img src="data:image/gif;base64,R0lGOD" data-src="https://cdn.example.com/lazy.jpg" />`
    );
    expect(pickImageSource(root.querySelector("img"))).toBe("https://cdn.example.com/lazy.jpg");
  });

  it("uses the first srcset entry when nothing else is usable", () => {
    const root = parseHtml(
      `<img src="data:image/gif;base64,R0lGOD" srcset="https://cdn.example.com/a.jpg 1x, https://cdn.example.com/b.jpg 2x" />`
    );
    expect(pickImageSource(root.querySelector("img"))).toBe("https://cdn.example.com/a.jpg");
  });
});

describe("collectText", () => {
  it("joins matched paragraphs and drops short ones", () => {
    const root = parseHtml(`
      <article>
        <p>First   paragraph of the story.</p>
        <p>Ad</p>
        <p>Second paragraph of the story.</p>
      </article>
    `);

    expect(collectText(root.querySelector("article"), "p", 5)).toBe(
      "First paragraph of the story.\nSecond paragraph of the story."
    );
    expect(collectText(null)).toBeNull();
  });
});

describe("collectLinks", () => {
  it("resolves, filters and de-duplicates anchors", () => {
    const root = parseHtml(`
      <a href="/article/one">One</a>
      <a href="/about">About</a>
      <a href="https://apnews.com/article/one">One again</a>
      <a href="/article/two">Two</a>
    `);

    expect(
      collectLinks(root, "a", "https://apnews.com/world-news", (url) => url.includes("/article/"))
    ).toEqual(["https://apnews.com/article/one", "https://apnews.com/article/two"]);
  });
});
