import { describe, expect, it } from "vitest";

import { SeenSet } from "./seen-set.js";

describe("SeenSet", () => {
  it("starts empty for every category", () => {
    const seen = new SeenSet();

    expect(seen.entries("world")).toEqual([]);
    expect(seen.hasSeen("world", "https://a.com/1")).toBe(false);
  });

  it("keeps categories apart", () => {
    const seen = new SeenSet();
    seen.markSeen("world", "https://a.com/1");

    expect(seen.hasSeen("world", "https://a.com/1")).toBe(true);
    expect(seen.hasSeen("color", "https://a.com/1")).toBe(false);
  });

  it("ignores missing URLs", () => {
    const seen = new SeenSet();
    seen.markSeen("world", null);
    seen.markSeen("world", undefined);
    seen.markSeen("world", "");

    expect(seen.size("world")).toBe(0);
  });

  it("does not duplicate a URL", () => {
    const seen = new SeenSet();
    seen.markSeen("world", "https://a.com/1");
    seen.markSeen("world", "https://a.com/2");
    seen.markSeen("world", "https://a.com/1");

    expect(seen.entries("world")).toEqual(["https://a.com/1", "https://a.com/2"]);
  });

  it("evicts the oldest URL once past capacity", () => {
    const seen = new SeenSet();
    const urls = Array.from({ length: 101 }, (_, index) => `https://a.com/${index}`);
    for (const url of urls) {
      seen.markSeen("world", url);
    }

    expect(seen.size("world")).toBe(100);
    expect(seen.hasSeen("world", "https://a.com/0")).toBe(false);
    expect(seen.entries("world")).toEqual(urls.slice(1));
  });

  it("round-trips through a snapshot", () => {
    const seen = new SeenSet(2);
    seen.markSeen("world", "https://a.com/1");
    seen.markSeen("color", "https://b.com/1");

    const restored = SeenSet.fromSnapshot(JSON.parse(JSON.stringify(seen)), 2);

    expect(restored.toJSON()).toEqual({
      world: ["https://a.com/1"],
      color: ["https://b.com/1"]
    });
  });

  it("trims an oversized snapshot to capacity", () => {
    const restored = SeenSet.fromSnapshot({ world: ["a", "b", "c"] }, 2);

    expect(restored.entries("world")).toEqual(["b", "c"]);
  });

  it("rejects a capacity that is not a positive integer", () => {
    expect(() => new SeenSet(0)).toThrow(RangeError);
    expect(() => new SeenSet(1.5)).toThrow(RangeError);
  });
});
