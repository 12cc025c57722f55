import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import { z } from "zod";
import { MalformedModelOutputError, UpstreamTimeoutError } from "../errors";
import { componentLogger, type AppLogger } from "../logger";
import { safeJsonParse } from "../utils";
import { EmbeddingCache } from "./embeddingCache";
import { RateLimiter } from "./rateLimiter";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  /** Short label used for rate-limit accounting and logs. */
  operation: string;
  temperature: number;
  maxTokens?: number;
  json?: boolean;
  timeoutMs?: number;
  /** Aborting cancels the request, including a stream already being read. */
  signal?: AbortSignal;
}

export interface TextGenerator {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
  stream(messages: ChatMessage[], options: CompletionOptions): AsyncIterable<string>;
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAITextGeneratorOptions {
  client: OpenAI;
  limiter: RateLimiter;
  chatModel?: string;
  embeddingModel?: string;
  cache?: EmbeddingCache;
  logger?: AppLogger;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class OpenAITextGenerator implements TextGenerator {
  private readonly client: OpenAI;

  private readonly limiter: RateLimiter;

  private readonly chatModel: string;

  private readonly embeddingModel: string;

  private readonly cache: EmbeddingCache | undefined;

  private readonly logger: AppLogger;

  constructor(options: OpenAITextGeneratorOptions) {
    this.client = options.client;
    this.limiter = options.limiter;
    this.chatModel = options.chatModel ?? "gpt-4o-mini";
    this.embeddingModel = options.embeddingModel ?? "text-embedding-3-small";
    this.cache = options.cache;
    this.logger = options.logger ?? componentLogger("llm");
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const response = await this.call(options.operation, timeoutMs, estimateTokens(messages, options.maxTokens), () =>
      this.client.chat.completions.create(
        {
          model: this.chatModel,
          messages: toOpenAIMessages(messages),
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          response_format: options.json ? { type: "json_object" } : undefined
        },
        { timeout: timeoutMs, maxRetries: 0, signal: options.signal }
      )
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new MalformedModelOutputError(`Model returned empty response for ${options.operation}`);
    }
    return content;
  }

  async *stream(messages: ChatMessage[], options: CompletionOptions): AsyncIterable<string> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const stream = await this.call(options.operation, timeoutMs, estimateTokens(messages, options.maxTokens), () =>
      this.client.chat.completions.create(
        {
          model: this.chatModel,
          messages: toOpenAIMessages(messages),
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          stream: true
        },
        { timeout: timeoutMs, maxRetries: 0, signal: options.signal }
      )
    );

    try {
      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw mapClientError(error, options.operation, timeoutMs);
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: Array<number[] | undefined> = texts.map((text) => this.cache?.get(this.embeddingModel, text));
    const missing = texts.map((text, index) => ({ text, index })).filter(({ index }) => vectors[index] === undefined);

    if (missing.length > 0) {
      const response = await this.call(
        "embedding",
        DEFAULT_TIMEOUT_MS,
        missing.reduce((sum, { text }) => sum + Math.ceil(text.length / 4), 0),
        () =>
          this.client.embeddings.create(
            { model: this.embeddingModel, input: missing.map(({ text }) => text) },
            { timeout: DEFAULT_TIMEOUT_MS, maxRetries: 0 }
          )
      );
      for (const item of response.data) {
        const target = missing[item.index];
        if (!target) {
          continue;
        }
        vectors[target.index] = item.embedding;
        this.cache?.set(this.embeddingModel, target.text, item.embedding);
      }
      this.logger.debug("llm:embedded", { requested: texts.length, computed: missing.length });
    }

    return vectors.map((vector, index) => {
      if (!vector) {
        throw new MalformedModelOutputError(`Embedding missing for input ${index}`);
      }
      return vector;
    });
  }

  private async call<T>(operation: string, timeoutMs: number, estimatedTokens: number, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.limiter.schedule(fn, { operation, estimatedTokens });
    } catch (error) {
      throw mapClientError(error, operation, timeoutMs);
    }
  }
}

function mapClientError(error: unknown, operation: string, timeoutMs: number): unknown {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new UpstreamTimeoutError(operation, timeoutMs);
  }
  return error;
}

function toOpenAIMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "assistant":
        return { role: "assistant", content: message.content };
      case "user":
        return { role: "user", content: message.content };
    }
  });
}

function estimateTokens(messages: ChatMessage[], maxTokens = 500): number {
  const promptChars = messages.reduce((sum, message) => sum + message.content.length, 0);
  return Math.ceil(promptChars / 4) + maxTokens;
}

/** Accepts bare JSON or JSON wrapped in a fenced block. */
export function extractJsonPayload(raw: string): unknown {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  const body = fenced ? fenced[1] : trimmed;
  const direct = safeJsonParse(body);
  if (direct !== null) {
    return direct;
  }
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  return start >= 0 && end > start ? safeJsonParse(body.slice(start, end + 1)) : null;
}

export async function completeJson<T>(
  llm: TextGenerator,
  messages: ChatMessage[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: Omit<CompletionOptions, "json">
): Promise<T> {
  const raw = await llm.complete(messages, { ...options, json: true });
  const parsed = schema.safeParse(extractJsonPayload(raw));
  if (!parsed.success) {
    throw new MalformedModelOutputError(
      `Invalid ${options.operation} output: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`
    );
  }
  return parsed.data;
}
