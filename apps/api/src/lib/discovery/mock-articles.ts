import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { z } from "zod";

import type { ArticleRecord } from "./pipeline.js";

const MOCK_ARTICLES_PATH = fileURLToPath(
  new URL("../../../fixtures/mock-articles.json", import.meta.url)
);

const mockArticleSchema = z.object({
  url: z.string().url(),
  title: z.string().min(1),
  publishedAt: z.coerce.date().nullable(),
  content: z.string().nullable(),
  imageUrl: z.string().nullable(),
  topics: z.array(z.string()),
  aiTitle: z.string(),
  summary: z.string(),
  source: z.string()
});

const mockArticlesSchema = z.record(z.array(mockArticleSchema));

export type MockArticles = Record<string, ArticleRecord[]>;

let cached: MockArticles | null = null;

export function loadMockArticles(path: string = MOCK_ARTICLES_PATH): MockArticles {
  if (path === MOCK_ARTICLES_PATH && cached) {
    return cached;
  }

  const parsed = mockArticlesSchema.parse(JSON.parse(readFileSync(path, "utf8")));
  if (path === MOCK_ARTICLES_PATH) {
    cached = parsed;
  }
  return parsed;
}

/** Random canned article for the category, or null when it has none. */
export function pickMockArticle(
  category: string,
  articles: MockArticles = loadMockArticles(),
  random: () => number = Math.random
): ArticleRecord | null {
  const pool = articles[category] ?? [];
  if (pool.length === 0) {
    return null;
  }
  return pool[Math.floor(random() * pool.length)] ?? null;
}
