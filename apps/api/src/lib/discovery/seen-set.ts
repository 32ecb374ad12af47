export const DEFAULT_SEEN_CAPACITY = 100;

export type SeenSetSnapshot = Record<string, string[]>;

/**
 * Per-category memory of canonical URLs already delivered to one client.
 * Each category keeps at most `capacity` URLs in insertion order; the oldest
 * is evicted first.
 */
export class SeenSet {
  private readonly categories = new Map<string, Set<string>>();

  constructor(readonly capacity: number = DEFAULT_SEEN_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Seen-set capacity must be a positive integer, got ${capacity}`);
    }
  }

  static fromSnapshot(snapshot: SeenSetSnapshot, capacity = DEFAULT_SEEN_CAPACITY) {
    const seen = new SeenSet(capacity);
    for (const [category, urls] of Object.entries(snapshot)) {
      for (const url of urls) {
        seen.markSeen(category, url);
      }
    }
    return seen;
  }

  hasSeen(category: string, canonicalUrl: string): boolean {
    return this.categories.get(category)?.has(canonicalUrl) ?? false;
  }

  markSeen(category: string, canonicalUrl: string | null | undefined): void {
    if (!canonicalUrl) {
      return;
    }

    let urls = this.categories.get(category);
    if (!urls) {
      urls = new Set();
      this.categories.set(category, urls);
    }

    if (urls.has(canonicalUrl)) {
      return;
    }

    urls.add(canonicalUrl);

    // Set iteration follows insertion order, so the first value is the oldest
    for (const oldest of urls) {
      if (urls.size <= this.capacity) break;
      urls.delete(oldest);
    }
  }

  entries(category: string): string[] {
    return [...(this.categories.get(category) ?? [])];
  }

  size(category: string): number {
    return this.categories.get(category)?.size ?? 0;
  }

  toJSON(): SeenSetSnapshot {
    const snapshot: SeenSetSnapshot = {};
    for (const [category, urls] of this.categories) {
      snapshot[category] = [...urls];
    }
    return snapshot;
  }
}
