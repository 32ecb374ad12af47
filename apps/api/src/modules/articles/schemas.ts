import { z } from "zod";

export const categoryParamsSchema = z.object({
  category: z.string().trim().toLowerCase()
});

export const nextArticleQuerySchema = z.object({
  q: z
    .string()
    .trim()
    .transform((value) => (value.length > 0 ? value : undefined))
    .optional()
});

export type NextArticleQuery = z.infer<typeof nextArticleQuerySchema>;

export const inspectBodySchema = z.object({
  url: z.string().trim().min(1, "url is required")
});

export const articleResponseSchema = z.object({
  url: z.string().url(),
  title: z.string().min(1),
  publishedAt: z.string().datetime().nullable(),
  content: z.string().nullable(),
  imageUrl: z.string().nullable(),
  topics: z.array(z.string()),
  aiTitle: z.string(),
  summary: z.string(),
  source: z.string()
});

export type ArticleResponse = z.infer<typeof articleResponseSchema>;
