import express, { Application, Request, Response, NextFunction } from "express";
import path from "node:path";
import fs from "node:fs";
import OpenAI from "openai";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { createPool } from "./src/config/db";
import { loadConfig } from "./src/config/env";
import { toPipelineConfig } from "./src/config/pipeline";
import { describeError } from "./src/errors";
import { OpenAITextGenerator } from "./src/llm/client";
import { EmbeddingCache } from "./src/llm/embeddingCache";
import { RateLimiter } from "./src/llm/rateLimiter";
import { componentLogger, logger } from "./src/logger";
import { QuestionResolver, type TenantClients } from "./src/resolver";
import { createRouter } from "./src/routes";
import {
  InMemoryConversationStore,
  PostgresConversationStore,
  type ConversationStore
} from "./src/stores/conversationStore";
import { Neo4jHttpGraphStore } from "./src/stores/graphStore";
import { TenantClientPool } from "./src/stores/pool";
import { QdrantVectorStore } from "./src/stores/vectorStore";

const config = loadConfig();
const pipelineConfig = toPipelineConfig(config);

// One limiter and one cache for the whole process; every tenant's generator shares them.
const limiter = new RateLimiter({
  requestsPerWindow: config.LLM_REQUESTS_PER_MINUTE,
  tokensPerWindow: config.LLM_TOKENS_PER_MINUTE,
  maxRetries: config.LLM_MAX_RETRIES,
  logger: componentLogger("rate-limiter")
});
const embeddingCache = new EmbeddingCache({ maxEntries: config.EMBEDDING_CACHE_SIZE, ttlMs: config.EMBEDDING_CACHE_TTL_MS });
const llm = new OpenAITextGenerator({
  client: new OpenAI({ apiKey: config.OPENAI_API_KEY }),
  limiter,
  chatModel: config.OPENAI_CHAT_MODEL,
  embeddingModel: config.OPENAI_EMBEDDING_MODEL,
  cache: embeddingCache
});

const clientPool = new TenantClientPool<TenantClients>({
  create: async () => ({
    llm,
    vectorStore: new QdrantVectorStore({
      baseUrl: config.QDRANT_URL,
      collection: config.QDRANT_COLLECTION,
      apiKey: config.QDRANT_API_KEY,
      timeoutMs: config.RETRIEVAL_TIMEOUT_MS
    }),
    graphStore: new Neo4jHttpGraphStore({
      baseUrl: config.NEO4J_HTTP_URL,
      database: config.NEO4J_DATABASE,
      user: config.NEO4J_USER,
      password: config.NEO4J_PASSWORD,
      timeoutMs: config.RETRIEVAL_TIMEOUT_MS
    })
  }),
  idleMs: config.POOL_IDLE_MS,
  maxEntries: config.POOL_MAX_ENTRIES
});
clientPool.startSweeper();

const dbPool = config.CONVERSATION_STORE === "postgres" ? createPool({ connectionString: config.DATABASE_URL }) : null;
const conversations: ConversationStore = dbPool
  ? new PostgresConversationStore(dbPool)
  : new InMemoryConversationStore();

const resolver = new QuestionResolver({
  clients: (tenantId) => clientPool.get(tenantId),
  conversations,
  defaultTenantId: config.DEFAULT_WORKSPACE_ID,
  config: pipelineConfig,
  similarity: config.FUSION_SIMILARITY
});

const app: Application = express();

app.use(helmet());
app.use(express.json({ limit: "1mb" }));

const swaggerPath = path.resolve(__dirname, "..", "swagger.json");
let swaggerDocument: Record<string, unknown> | null = null;

if (fs.existsSync(swaggerPath)) {
  try {
    swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
  } catch (error) {
    logger.error("Failed to parse swagger.json", { error: describeError(error) });
  }
} else {
  logger.warn(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
}

if (swaggerDocument) {
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
}

app.get("/health", (_req: Request, res: Response) => {
  res.json({
    status: "ok",
    uptime: process.uptime(),
    clients: clientPool.stats(),
    llm: limiter.usage(),
    embeddings: embeddingCache.stats()
  });
});

app.use(createRouter(resolver));

app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  logger.error("Unhandled error", { error: err.message });
  res.status(500).json({ message: "Unexpected server error" });
});

const server = app.listen(config.PORT, () => {
  logger.info(`Grounded QA service listening on port ${config.PORT}`);
});

process.on("unhandledRejection", (reason: unknown) => {
  logger.error("Unhandled promise rejection", { reason: describeError(reason) });
});

async function shutdown(): Promise<void> {
  server.close();
  await clientPool.closeAll();
  if (dbPool) {
    await dbPool.end();
  }
}

process.on("SIGTERM", () => {
  logger.info("Received SIGTERM, shutting down.");
  shutdown()
    .catch((error: unknown) => {
      logger.error("Shutdown failed", { error: describeError(error) });
    })
    .finally(() => process.exit(0));
});
