export class InvalidUrlError extends Error {
  readonly url: string;

  constructor(url: string, options?: { cause?: unknown }) {
    super(`Invalid URL: ${url}`, options);
    this.name = "InvalidUrlError";
    this.url = url;
  }
}

const PERCENT_RUN = /(?:%[0-9A-Fa-f]{2})+/g;
const PERCENT_ESCAPE = /%[0-9A-Fa-f]{2}/g;
const MAX_UTF8_BYTES = 4;

/**
 * Decodes every percent-escape exactly once. Bytes that do not belong to a
 * valid UTF-8 sequence are left as written; their neighbours still decode.
 */
export function decodePercentEscapes(value: string): string {
  return value.replace(PERCENT_RUN, decodeRun);
}

function decodeRun(run: string): string {
  const escapes = run.match(PERCENT_ESCAPE) ?? [];
  let decoded = "";
  let index = 0;

  while (index < escapes.length) {
    const sequence = decodeSequenceAt(escapes, index);
    if (sequence) {
      decoded += sequence.text;
      index += sequence.length;
    } else {
      decoded += escapes[index];
      index += 1;
    }
  }

  return decoded;
}

/** Shortest run of escapes starting at `start` that decodes as UTF-8. */
function decodeSequenceAt(escapes: string[], start: number) {
  const limit = Math.min(MAX_UTF8_BYTES, escapes.length - start);
  for (let length = 1; length <= limit; length += 1) {
    const text = tryDecode(escapes.slice(start, start + length).join(""));
    if (text !== null) {
      return { text, length };
    }
  }
  return null;
}

function tryDecode(escaped: string): string | null {
  try {
    return decodeURIComponent(escaped);
  } catch {
    return null;
  }
}

/**
 * Turns a raw article URL into the key used for deduplication: percent-decoded
 * once, fragment removed, everything else (scheme, host, path, query) kept as
 * written. Trailing slashes, case and query order are significant.
 */
export function canonicalize(url: string): string {
  const decoded = decodePercentEscapes(url.trim());

  try {
    new URL(decoded);
  } catch (error) {
    throw new InvalidUrlError(url, { cause: error });
  }

  const hashIndex = decoded.indexOf("#");
  return hashIndex === -1 ? decoded : decoded.slice(0, hashIndex);
}

export function tryCanonicalize(url: string | null | undefined): string | null {
  if (!url) return null;
  try {
    return canonicalize(url);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      return null;
    }
    throw error;
  }
}
