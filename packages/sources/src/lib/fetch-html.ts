const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export async function fetchHtml(
  url: string,
  timeoutMs: number,
  extraHeaders: Record<string, string> = {}
) {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        "user-agent": BROWSER_USER_AGENT,
        accept:
          "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
        "accept-language": "en-US,en;q=0.9",
        ...extraHeaders
      },
      redirect: "follow"
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }

    const contentType = response.headers.get("content-type") ?? undefined;
    const html = await response.text();
    return { html, contentType, finalUrl: response.url || url };
  } finally {
    clearTimeout(timeout);
  }
}

export function createHtmlFetcher(timeoutMs: number) {
  return async (url: string) => (await fetchHtml(url, timeoutMs)).html;
}
