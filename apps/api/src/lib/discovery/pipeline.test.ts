import { describe, expect, it, vi } from "vitest";
import { createLogger } from "@chomp/logger";
import type { ExtractedArticle, NewsSource } from "@chomp/sources";

import type { Summarizer } from "../enrichment/summarizer.js";
import type { TopicTagger } from "../enrichment/topics.js";
import { DiscoveryPipeline } from "./pipeline.js";
import { SeenSet } from "./seen-set.js";

const logger = createLogger({ name: "pipeline-test", level: "silent" });

function article(url: string | null, title: string | null = "Story", topics: string[] = []): ExtractedArticle {
  return { title, url, publishedAt: null, content: "Body text", imageUrl: null, topics };
}

/** Pages are keyed by URL; fetch returns the URL itself as the "HTML". */
class FakeSource implements NewsSource {
  readonly name: string;

  readonly discover = vi.fn(async (_query?: string): Promise<string[]> => {
    if (this.candidates instanceof Error) throw this.candidates;
    return this.candidates;
  });

  readonly fetch = vi.fn(async (url: string): Promise<string> => {
    const page = this.pages[url];
    if (!page) throw new Error(`HTTP 404 ${url}`);
    return url;
  });

  readonly extract = vi.fn((html: string): ExtractedArticle => this.pages[html] ?? article(null, null));

  constructor(
    readonly key: string,
    private readonly candidates: string[] | Error,
    private readonly pages: Record<string, ExtractedArticle> = {}
  ) {
    this.name = key.toUpperCase();
  }
}

function registryOf(...sources: NewsSource[]) {
  return { get: (key: string) => sources.find((source) => source.key === key) };
}

function pipelineFor(
  sources: NewsSource[],
  options: { summarizer?: Summarizer; topicTagger?: TopicTagger; maxCandidatesPerSource?: number } = {}
) {
  return new DiscoveryPipeline({
    registry: registryOf(...sources),
    logger,
    // keeps sources in the order given
    random: () => 0.99,
    ...options
  });
}

describe("DiscoveryPipeline.run", () => {
  it("returns null without fetching when every candidate was seen", async () => {
    const source = new FakeSource("a", ["https://a.com/1", "https://a.com/2#comments"], {
      "https://a.com/1": article("https://a.com/1")
    });
    const seen = new SeenSet();
    seen.markSeen("world", "https://a.com/1");
    seen.markSeen("world", "https://a.com/2");

    const record = await pipelineFor([source]).run({ category: "world", sourceKeys: ["a"], seen });

    expect(record).toBeNull();
    expect(source.fetch).not.toHaveBeenCalled();
  });

  it("moves past a failed extraction to the next candidate", async () => {
    const source = new FakeSource("a", ["https://a.com/1", "https://a.com/2"], {
      "https://a.com/1": article("https://a.com/1", null),
      "https://a.com/2": article("https://a.com/2", "Second", ["Local"])
    });
    const summarizer: Summarizer = {
      summarize: vi.fn(async () => ({ aiTitle: "Short Title", summary: "One.\nTwo." }))
    };

    const record = await pipelineFor([source], { summarizer }).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(record).toEqual({
      url: "https://a.com/2",
      title: "Second",
      publishedAt: null,
      content: "Body text",
      imageUrl: null,
      topics: ["Local"],
      aiTitle: "Short Title",
      summary: "One.\nTwo.",
      source: "a"
    });
    expect(summarizer.summarize).toHaveBeenCalledWith("Body text");
  });

  it("moves past a rejected fetch", async () => {
    const source = new FakeSource("a", ["https://a.com/missing", "https://a.com/2"], {
      "https://a.com/2": article("https://a.com/2")
    });

    const record = await pipelineFor([source]).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(source.fetch).toHaveBeenCalledTimes(2);
    expect(record?.url).toBe("https://a.com/2");
  });

  it("skips a candidate whose page resolves to a seen URL", async () => {
    const source = new FakeSource("a", ["https://a.com/short-link"], {
      "https://a.com/short-link": article("https://a.com/1")
    });
    const seen = new SeenSet();
    seen.markSeen("world", "https://a.com/1");

    const record = await pipelineFor([source]).run({ category: "world", sourceKeys: ["a"], seen });

    expect(record).toBeNull();
    expect(source.fetch).toHaveBeenCalledTimes(1);
  });

  it("canonicalizes the extracted URL against the candidate", async () => {
    const source = new FakeSource("a", ["https://a.com/news/1"], {
      "https://a.com/news/1": article("/news/caf%C3%A9#top")
    });

    const record = await pipelineFor([source]).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(record?.url).toBe("https://a.com/news/café");
  });

  it("skips unknown source keys and sources whose discovery rejects", async () => {
    const broken = new FakeSource("broken", new Error("adapter bug"));
    const working = new FakeSource("b", ["https://b.com/1"], {
      "https://b.com/1": article("https://b.com/1")
    });

    const record = await pipelineFor([broken, working]).run({
      category: "color",
      sourceKeys: ["missing", "broken", "b"],
      seen: new SeenSet()
    });

    expect(record?.source).toBe("b");
  });

  it("passes the query to every source", async () => {
    const source = new FakeSource("a", []);

    await pipelineFor([source]).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet(),
      query: "harbour"
    });

    expect(source.discover).toHaveBeenCalledWith("harbour");
  });

  it("returns empty enrichment fields without a summarizer", async () => {
    const source = new FakeSource("a", ["https://a.com/1"], {
      "https://a.com/1": article("https://a.com/1")
    });

    const record = await pipelineFor([source]).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(record?.aiTitle).toBe("");
    expect(record?.summary).toBe("");
    expect(record?.topics).toEqual([]);
  });

  it("tags topics only when the source supplied none", async () => {
    const source = new FakeSource("a", ["https://a.com/1"], {
      "https://a.com/1": article("https://a.com/1")
    });
    const topicTagger: TopicTagger = { extractTopics: vi.fn(async () => ["Harbours"]) };

    const record = await pipelineFor([source], { topicTagger }).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(record?.topics).toEqual(["Harbours"]);
  });

  it("continues when the summarizer throws", async () => {
    const source = new FakeSource("a", ["https://a.com/1"], {
      "https://a.com/1": article("https://a.com/1")
    });
    const summarizer: Summarizer = {
      summarize: vi.fn(async () => {
        throw new Error("provider down");
      })
    };

    const record = await pipelineFor([source], { summarizer }).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(record?.url).toBe("https://a.com/1");
    expect(record?.summary).toBe("");
  });

  it("caps candidates per source when configured", async () => {
    const source = new FakeSource("a", ["https://a.com/missing", "https://a.com/2"], {
      "https://a.com/2": article("https://a.com/2")
    });

    const record = await pipelineFor([source], { maxCandidatesPerSource: 1 }).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(record).toBeNull();
    expect(source.fetch).toHaveBeenCalledTimes(1);
  });

  it("skips unparseable candidates", async () => {
    const source = new FakeSource("a", ["not a url", "https://a.com/1"], {
      "https://a.com/1": article("https://a.com/1")
    });

    const record = await pipelineFor([source]).run({
      category: "world",
      sourceKeys: ["a"],
      seen: new SeenSet()
    });

    expect(record?.url).toBe("https://a.com/1");
    expect(source.fetch).toHaveBeenCalledTimes(1);
  });

  it("does not mark anything as seen", async () => {
    const source = new FakeSource("a", ["https://a.com/1"], {
      "https://a.com/1": article("https://a.com/1")
    });
    const seen = new SeenSet();

    await pipelineFor([source]).run({ category: "world", sourceKeys: ["a"], seen });

    expect(seen.entries("world")).toEqual([]);
  });
});

describe("DiscoveryPipeline.inspect", () => {
  it("extracts and enriches a URL regardless of the seen-set", async () => {
    const source = new FakeSource("a", [], {
      "https://a.com/1#top": article("https://a.com/1", "Inspected")
    });

    const result = await pipelineFor([source]).inspect(source, "https://a.com/1#top");

    expect(result.status).toBe("ok");
    if (result.status === "ok") {
      expect(result.record.url).toBe("https://a.com/1");
      expect(result.record.title).toBe("Inspected");
    }
  });

  it("falls back to the requested URL when the page names none", async () => {
    const source = new FakeSource("a", [], {
      "https://a.com/2": article(null, "No Canonical")
    });

    const result = await pipelineFor([source]).inspect(source, "https://a.com/2");

    expect(result.status === "ok" ? result.record.url : null).toBe("https://a.com/2");
  });

  it("reports fetch and extraction failures separately", async () => {
    const source = new FakeSource("a", [], {
      "https://a.com/untitled": article("https://a.com/untitled", null)
    });
    const pipeline = pipelineFor([source]);

    await expect(pipeline.inspect(source, "https://a.com/missing")).resolves.toMatchObject({
      status: "fetch_failed"
    });
    await expect(pipeline.inspect(source, "https://a.com/untitled")).resolves.toEqual({
      status: "extract_failed"
    });
  });
});
