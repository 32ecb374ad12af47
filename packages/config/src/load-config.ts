import { config as loadDotenv } from "dotenv";
import type { ZodIssue } from "zod";

import { configSchema, type AppConfig } from "./schema.js";

let cachedConfig: AppConfig | null = null;

function coerceBoolean(value: string | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  return undefined;
}

export function loadConfig(options: { env?: NodeJS.ProcessEnv } = {}): AppConfig {
  if (cachedConfig && !options.env) {
    return cachedConfig;
  }

  if (!options.env) {
    loadDotenv();
  }

  const env = options.env ?? process.env;

  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT
    },
    discovery: {
      fetchTimeoutMs: env.DISCOVERY_FETCH_TIMEOUT_MS,
      maxCandidatesPerSource: env.DISCOVERY_MAX_CANDIDATES_PER_SOURCE,
      skipCrawl: coerceBoolean(env.SKIP_CRAWL)
    },
    sessions: {
      seenCapacity: env.SESSIONS_SEEN_CAPACITY,
      maxSessions: env.SESSIONS_MAX_SESSIONS
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      timeoutMs: env.OPENAI_TIMEOUT_MS
    },
    summarizer: {
      maxInputChars: env.SUMMARIZER_MAX_INPUT_CHARS,
      topicInputChars: env.SUMMARIZER_TOPIC_INPUT_CHARS,
      failureThreshold: env.SUMMARIZER_FAILURE_THRESHOLD,
      resetTimeoutMs: env.SUMMARIZER_RESET_TIMEOUT_MS
    },
    monitoring: {
      enabled: coerceBoolean(env.MONITORING_ENABLED)
    }
  });

  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue: ZodIssue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${formattedErrors}`);
  }

  if (!options.env) {
    cachedConfig = result.data;
  }
  return result.data;
}

export function resetConfigCache() {
  cachedConfig = null;
}
