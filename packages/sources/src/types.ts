export type SourceLocation = {
  latitude: number;
  longitude: number;
  city: string;
};

/**
 * What an adapter pulls out of one article page. A missing `title` or `url`
 * is the only signal that extraction failed; every other field is optional.
 */
export type ExtractedArticle = {
  title: string | null;
  url: string | null;
  publishedAt: Date | null;
  content: string | null;
  imageUrl: string | null;
  topics: string[];
};

export type SourceDescriptor = {
  key: string;
  name: string;
  location: SourceLocation | null;
};

export interface NewsSource {
  readonly name: string;
  readonly key: string;
  readonly location?: SourceLocation;

  /**
   * Candidate article URLs, most relevant first. Resolves to an empty list
   * when the source has nothing, transport failures included.
   */
  discover(query?: string): Promise<string[]>;

  /** Raw HTML for one article. Rejects on transport failure. */
  fetch(url: string): Promise<string>;

  extract(html: string): ExtractedArticle;
}

export type HtmlFetcher = (url: string) => Promise<string>;

export type SourceOptions = {
  fetchTimeoutMs?: number;
  fetcher?: HtmlFetcher;
  random?: () => number;
};

export function isExtractionSuccess(
  article: ExtractedArticle | null | undefined
): article is ExtractedArticle & { title: string; url: string } {
  return Boolean(article?.title && article.url);
}

export function describeSource(source: NewsSource): SourceDescriptor {
  return {
    key: source.key,
    name: source.name,
    location: source.location ?? null
  };
}
