import { Readability } from "@mozilla/readability";
import { JSDOM, VirtualConsole } from "jsdom";

const PLAIN_TEXT_MAX_LENGTH = 200_000;

/**
 * Plain-text body of an article page via Readability, for publishers whose
 * own markup yields nothing usable. Null when the page has no readable text.
 */
export function extractArticleContent(
  html: string | null | undefined,
  url?: string
): string | null {
  if (!html || html.trim().length === 0) {
    return null;
  }

  try {
    // CSS parse errors from jsdom are noise for text extraction
    const virtualConsole = new VirtualConsole();
    virtualConsole.on("error", () => undefined);

    const dom = new JSDOM(html, {
      url,
      contentType: "text/html",
      pretendToBeVisual: false,
      runScripts: "outside-only",
      virtualConsole
    });

    const article = new Readability(dom.window.document).parse();
    const text = normaliseWhitespace(
      article?.textContent ?? dom.window.document.body.textContent ?? ""
    );
    return truncate(text, PLAIN_TEXT_MAX_LENGTH) || null;
  } catch {
    const plain = normaliseWhitespace(stripTags(html));
    return truncate(plain, PLAIN_TEXT_MAX_LENGTH) || null;
  }
}

function truncate(value: string, limit: number): string {
  if (value.length <= limit) {
    return value;
  }
  return `${value.slice(0, limit)}…`;
}

function normaliseWhitespace(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

function stripTags(html: string) {
  return html.replace(/<[^>]+>/g, " ");
}
