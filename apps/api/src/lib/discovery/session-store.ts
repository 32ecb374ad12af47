import { randomUUID } from "node:crypto";

import { DEFAULT_SEEN_CAPACITY, SeenSet } from "./seen-set.js";

export type SessionStoreOptions = {
  maxSessions?: number;
  seenCapacity?: number;
  createId?: () => string;
};

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

/**
 * In-memory seen-sets keyed by session id. Touching a session moves it to
 * the back of the eviction queue; past `maxSessions` the least recently used
 * session is dropped.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SeenSet>();
  private readonly maxSessions: number;
  private readonly seenCapacity: number;
  private readonly createId: () => string;

  constructor(options: SessionStoreOptions = {}) {
    this.maxSessions = options.maxSessions ?? 10_000;
    this.seenCapacity = options.seenCapacity ?? DEFAULT_SEEN_CAPACITY;
    this.createId = options.createId ?? randomUUID;
  }

  /** Resolves an incoming id, minting a fresh session for missing or malformed ones. */
  open(sessionId: string | undefined): { id: string; seen: SeenSet } {
    if (sessionId && SESSION_ID_PATTERN.test(sessionId)) {
      const existing = this.sessions.get(sessionId);
      if (existing) {
        this.sessions.delete(sessionId);
        this.sessions.set(sessionId, existing);
        return { id: sessionId, seen: existing };
      }

      return { id: sessionId, seen: this.create(sessionId) };
    }

    const id = this.createId();
    return { id, seen: this.create(id) };
  }

  get(sessionId: string) {
    return this.sessions.get(sessionId);
  }

  get size() {
    return this.sessions.size;
  }

  private create(id: string) {
    const seen = new SeenSet(this.seenCapacity);
    this.sessions.set(id, seen);

    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
    }

    return seen;
  }
}
