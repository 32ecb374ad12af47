import { z } from "zod";

const serverSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(3000)
});

const discoverySchema = z.object({
  fetchTimeoutMs: z.coerce.number().int().positive().default(15_000),
  // 0 keeps scanning every candidate a source offers
  maxCandidatesPerSource: z.coerce.number().int().min(0).default(0),
  skipCrawl: z.coerce.boolean().default(false)
});

const sessionsSchema = z.object({
  seenCapacity: z.coerce.number().int().positive().default(100),
  maxSessions: z.coerce.number().int().positive().default(10_000)
});

const openaiSchema = z.object({
  apiKey: z
    .string()
    .trim()
    .transform((value) => (value.length > 0 ? value : undefined))
    .optional(),
  model: z.string().default("gpt-5.1"),
  timeoutMs: z.coerce.number().int().positive().default(30_000)
});

const summarizerSchema = z.object({
  maxInputChars: z.coerce.number().int().positive().default(4_000),
  topicInputChars: z.coerce.number().int().positive().default(2_000),
  failureThreshold: z.coerce.number().int().positive().default(5),
  resetTimeoutMs: z.coerce.number().int().positive().default(60_000)
});

const monitoringSchema = z.object({
  enabled: z.coerce.boolean().default(true)
});

export const configSchema = z.object({
  nodeEnv: z
    .enum(["development", "test", "production"])
    .default("development"),
  server: serverSchema,
  discovery: discoverySchema,
  sessions: sessionsSchema,
  openai: openaiSchema,
  summarizer: summarizerSchema,
  monitoring: monitoringSchema
});

export type AppConfig = z.infer<typeof configSchema>;
