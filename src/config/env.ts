import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  LOG_TYPE: z.enum(["pretty", "json", "hidden"]).default("pretty"),

  OPENAI_API_KEY: z
    .string({ required_error: "OPENAI_API_KEY is required" })
    .trim()
    .min(1, "OPENAI_API_KEY is required"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(500),
  LLM_TOKENS_PER_MINUTE: z.coerce.number().int().positive().default(1_000_000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(5),
  EMBEDDING_CACHE_SIZE: z.coerce.number().int().min(0).default(1000),
  EMBEDDING_CACHE_TTL_MS: z.coerce.number().int().positive().default(3_600_000),

  QDRANT_URL: z.string().url().default("http://localhost:6333"),
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION: z.string().default("passages"),

  NEO4J_HTTP_URL: z.string().url().default("http://localhost:7474"),
  NEO4J_DATABASE: z.string().default("neo4j"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: optionalString,

  DATABASE_URL: optionalString,
  CONVERSATION_STORE: z.enum(["postgres", "memory"]).default("postgres"),

  FUSION_STRATEGY: z.enum(["rrf", "mmr", "hybrid"]).default("hybrid"),
  FUSION_SIMILARITY: z.enum(["lexical", "embedding"]).default("lexical"),
  RRF_K: z.coerce.number().positive().default(60),
  MMR_LAMBDA: z.coerce.number().min(0).max(1).default(0.5),
  MMR_WINDOW: z.coerce.number().int().positive().default(20),

  CONTEXT_TURNS: z.coerce.number().int().min(0).default(6),
  VECTOR_TOP_K: z.coerce.number().int().positive().default(10),
  GRAPH_TOP_K: z.coerce.number().int().positive().default(10),
  EXPANSION_CONCURRENCY: z.coerce.number().int().min(1).max(5).default(5),
  MAX_HOPS: z.coerce.number().int().min(2).max(3).default(3),
  RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
  SYNTHESIS_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  VALIDATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SELF_CHECK_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),

  POOL_IDLE_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  POOL_MAX_ENTRIES: z.coerce.number().int().positive().default(50),
  DEFAULT_WORKSPACE_ID: z.string().default("default")
});

export type AppConfig = z.infer<typeof EnvSchema>;

const LoggingSchema = EnvSchema.pick({ LOG_LEVEL: true, LOG_TYPE: true });

export type LoggingConfig = z.infer<typeof LoggingSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/** The logger is built at import time, before the full config is loaded, so it reads its own two keys. */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = LoggingSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}
