import type { ChatMessage, CompletionOptions, TextGenerator } from "../llm/client";
import type { ConversationTurn } from "../pipeline/types";
import type { ConversationStore } from "../stores/conversationStore";
import type { GraphQuery, GraphQueryKind, GraphRow, GraphStore } from "../stores/graphStore";
import type { VectorHit, VectorSearchFilter, VectorStore } from "../stores/vectorStore";

export type FakeReply = string | string[] | ((messages: ChatMessage[], options: CompletionOptions) => string | string[]);

export const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function asChunks(reply: string | string[]): string[] {
  if (Array.isArray(reply)) {
    return reply;
  }
  return reply.match(/\S+\s*/g) ?? [];
}

/**
 * Scripted text generator. Replies are looked up by the `operation` label of
 * each call; an operation without a reply fails the call.
 */
export class FakeTextGenerator implements TextGenerator {
  readonly calls: Array<{ operation: string; messages: ChatMessage[] }> = [];

  embedCalls = 0;

  constructor(private readonly replies: Partial<Record<string, FakeReply>> = {}) {}

  callsFor(operation: string): number {
    return this.calls.filter((call) => call.operation === operation).length;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const reply = this.reply(messages, options);
    return Array.isArray(reply) ? reply.join("") : reply;
  }

  async *stream(messages: ChatMessage[], options: CompletionOptions): AsyncIterable<string> {
    for (const chunk of asChunks(this.reply(messages, options))) {
      yield chunk;
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.embedCalls += 1;
    return texts.map((text) => [text.length % 7, 1, 0.5]);
  }

  private reply(messages: ChatMessage[], options: CompletionOptions): string | string[] {
    this.calls.push({ operation: options.operation, messages });
    const reply = this.replies[options.operation];
    if (reply === undefined) {
      throw new Error(`No scripted reply for ${options.operation}`);
    }
    return typeof reply === "function" ? reply(messages, options) : reply;
  }
}

export interface FakeStoreOptions {
  delayMs?: number;
  error?: Error;
}

export class FakeVectorStore implements VectorStore {
  readonly calls: Array<{ topK: number; filter: VectorSearchFilter }> = [];

  constructor(
    private readonly hits: VectorHit[] = [],
    private readonly options: FakeStoreOptions = {}
  ) {}

  async search(_queryEmbedding: number[], topK: number, filter: VectorSearchFilter): Promise<VectorHit[]> {
    this.calls.push({ topK, filter });
    if (this.options.delayMs) {
      await delay(this.options.delayMs);
    }
    if (this.options.error) {
      throw this.options.error;
    }
    return this.hits.slice(0, topK);
  }
}

/** Answers each Cypher statement from canned rows keyed by the statement kind. */
export class FakeGraphStore implements GraphStore {
  readonly queries: GraphQuery[] = [];

  constructor(
    private readonly rows: Partial<Record<GraphQueryKind, GraphRow[]>> = {},
    private readonly options: FakeStoreOptions = {}
  ) {}

  kinds(): GraphQueryKind[] {
    return this.queries.map((query) => query.kind);
  }

  async run(query: GraphQuery): Promise<GraphRow[]> {
    this.queries.push(query);
    if (this.options.delayMs) {
      await delay(this.options.delayMs);
    }
    if (this.options.error) {
      throw this.options.error;
    }
    return this.rows[query.kind] ?? [];
  }
}

export class FailingConversationStore implements ConversationStore {
  async recentTurns(): Promise<ConversationTurn[]> {
    throw new Error("conversation store offline");
  }
}

export function vectorHit(content: string, score: number, metadata: Record<string, unknown> = {}): VectorHit {
  return { content, score, metadata: { document_id: "doc-1", ...metadata } };
}

export function relevant(): string {
  return JSON.stringify({ relevant: true, reason: "", confidence: 0.9 });
}

export function classification(
  intent: string,
  complexity: string,
  entities: string[] = [],
  crossDocument = false
): string {
  return JSON.stringify({ intent, complexity, entities, crossDocument });
}

export function supported(confidence = 0.9): string {
  return JSON.stringify({ supported: true, confidence, reason: "" });
}
