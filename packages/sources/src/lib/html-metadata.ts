import { parse } from "node-html-parser";
import type { HTMLElement } from "node-html-parser";

export type ArticleMeta = {
  title: string | null;
  url: string | null;
  publishedAt: Date | null;
  imageUrl: string | null;
};

export function parseHtml(html: string): HTMLElement {
  const root = parse(html);

  for (const node of root.querySelectorAll("script,style,noscript")) {
    node.remove();
  }

  return root;
}

/**
 * The fields almost every publisher exposes through Open Graph and the
 * canonical link.
 */
export function readArticleMeta(root: HTMLElement): ArticleMeta {
  const title = getMetaContent(root, "meta[property='og:title']", "content");

  const url =
    getMetaContent(root, "link[rel='canonical']", "href") ??
    getMetaContent(root, "meta[property='og:url']", "content");

  const publishedAt = parsePublishedAt(
    getMetaContent(root, "meta[property='article:published_time']", "content") ??
      getMetaContent(root, "meta[property='og:published_time']", "content") ??
      getMetaContent(root, "time[datetime]", "datetime")
  );

  const imageUrl = getMetaContent(root, "meta[property='og:image']", "content");

  return { title, url, publishedAt, imageUrl };
}

export function getMetaContent(
  root: HTMLElement,
  selector: string,
  attr = "content"
) {
  const node = root.querySelector(selector);
  if (!node) return null;
  const value = node.getAttribute(attr);
  return value ? value.trim() || null : null;
}

export function collectMetaValues(root: HTMLElement, property: string) {
  const values: string[] = [];
  for (const meta of root.querySelectorAll(`meta[property='${property}']`)) {
    const content = meta.getAttribute("content")?.trim();
    if (content) {
      values.push(content);
    }
  }
  return uniqueInOrder(values);
}

const MAX_YEAR = 9999;

/** Dates outside the four-digit years an ISO timestamp can carry are dropped. */
export function parsePublishedAt(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value.trim());
  if (Number.isNaN(parsed.getTime())) return null;

  const year = parsed.getUTCFullYear();
  return year >= 0 && year <= MAX_YEAR ? parsed : null;
}

export function resolveUrl(href: string | null | undefined, base: string) {
  if (!href) return null;
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith("data:")) {
    return null;
  }
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return null;
  }
}

/** First usable source of an image, skipping inline `data:` placeholders. */
export function pickImageSource(img: HTMLElement | null | undefined) {
  if (!img) return null;

  const srcset = img.getAttribute("srcset")?.trim().split(/\s+/)[0];
  const candidates = [
    img.getAttribute("data-src"),
    img.getAttribute("data-lazy-src"),
    img.getAttribute("src"),
    srcset
  ];

  return (
    candidates.find(
      (value): value is string =>
        typeof value === "string" && value.length > 0 && !value.startsWith("data:")
    ) ?? null
  );
}

/**
 * Text of every element matched under `container`, one per line. Elements
 * shorter than `minLength` characters are dropped.
 */
export function collectText(
  container: HTMLElement | null | undefined,
  selector = "p",
  minLength = 1
) {
  if (!container) return null;

  const lines: string[] = [];
  for (const element of container.querySelectorAll(selector)) {
    const text = normaliseWhitespace(element.text);
    if (text.length >= minLength) {
      lines.push(text);
    }
  }

  return lines.length > 0 ? lines.join("\n") : null;
}

export function collectLinks(
  root: HTMLElement,
  selector: string,
  base: string,
  accept: (url: string) => boolean = () => true
) {
  const urls: string[] = [];
  for (const anchor of root.querySelectorAll(selector)) {
    const url = resolveUrl(anchor.getAttribute("href"), base);
    if (url && accept(url)) {
      urls.push(url);
    }
  }
  return uniqueInOrder(urls);
}

export function uniqueInOrder(values: Iterable<string>) {
  return [...new Set(values)];
}

export function normaliseWhitespace(value: string) {
  return value.replace(/\s+/g, " ").trim();
}
