import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const configSchema = z.object({
  OPENAI_API_KEY: z.string().trim().min(1, "is required"),
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  CHAT_MODEL: z.string().trim().min(1).default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().trim().min(1).default("text-embedding-3-small"),
  EMBEDDING_BATCH_SIZE: positiveInt(32),
  VECTOR_DB_PATH: z.string().trim().min(1).default(":cache:"),
  MAX_RESULTS: positiveInt(5),
  MAX_HISTORY: positiveInt(2),
  MAX_TOKENS: positiveInt(800),
  LOG_FILE: optionalString,
  LOG_LEVEL: z.enum(["error", "warn", "info", "verbose", "debug"]).default("info"),
  NODE_ENV: optionalString,
});

export interface AppConfig {
  openaiApiKey: string;
  openaiBaseUrl?: string;
  chatModel: string;
  embeddingModel: string;
  embeddingBatchSize: number;
  vectorDbPath: string;
  maxResults: number;
  maxHistory: number;
  maxTokens: number;
  logFile?: string;
  logLevel: string;
  development: boolean;
}

/**
 * Reads configuration from environment variables.
 * @throws ConfigError naming every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration - ${problems}`, parsed.error);
  }

  const c = parsed.data;
  return {
    openaiApiKey: c.OPENAI_API_KEY,
    openaiBaseUrl: c.OPENAI_BASE_URL,
    chatModel: c.CHAT_MODEL,
    embeddingModel: c.EMBEDDING_MODEL,
    embeddingBatchSize: c.EMBEDDING_BATCH_SIZE,
    vectorDbPath: c.VECTOR_DB_PATH,
    maxResults: c.MAX_RESULTS,
    maxHistory: c.MAX_HISTORY,
    maxTokens: c.MAX_TOKENS,
    logFile: c.LOG_FILE,
    logLevel: c.LOG_LEVEL,
    development: c.NODE_ENV === "development",
  };
}
