import { z } from "zod";
import { fetchJson } from "../utils";

export interface VectorHit {
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface VectorSearchFilter {
  workspaceId: string;
  documentIds?: string[];
}

export interface VectorStore {
  search(queryEmbedding: number[], topK: number, filter: VectorSearchFilter): Promise<VectorHit[]>;
}

const QdrantSearchResponseSchema = z.object({
  result: z.array(
    z.object({
      id: z.union([z.string(), z.number()]),
      score: z.number(),
      payload: z.record(z.unknown()).nullable().optional()
    })
  )
});

export interface QdrantVectorStoreOptions {
  baseUrl: string;
  collection: string;
  apiKey?: string;
  timeoutMs?: number;
  /** Payload field holding the passage text. */
  textField?: string;
}

/** Search over a Qdrant collection through its REST API. */
export class QdrantVectorStore implements VectorStore {
  private readonly textField: string;

  constructor(private readonly options: QdrantVectorStoreOptions) {
    this.textField = options.textField ?? "text";
  }

  async search(queryEmbedding: number[], topK: number, filter: VectorSearchFilter): Promise<VectorHit[]> {
    const must: Array<Record<string, unknown>> = [{ key: "workspace_id", match: { value: filter.workspaceId } }];
    if (filter.documentIds && filter.documentIds.length > 0) {
      must.push({ key: "document_id", match: { any: filter.documentIds } });
    }

    const url = `${this.options.baseUrl.replace(/\/$/, "")}/collections/${encodeURIComponent(this.options.collection)}/points/search`;
    const data = await fetchJson(
      url,
      {
        method: "POST",
        timeout: this.options.timeoutMs ?? 8_000,
        headers: this.options.apiKey ? { "api-key": this.options.apiKey } : undefined,
        data: { vector: queryEmbedding, limit: topK, with_payload: true, filter: { must } }
      },
      { retries: 1, initialDelayMs: 200 }
    );

    const parsed = QdrantSearchResponseSchema.parse(data);
    return parsed.result.flatMap((point) => {
      const payload = point.payload ?? {};
      const text = payload[this.textField];
      if (typeof text !== "string" || text.trim().length === 0) {
        return [];
      }
      return [{ content: text, score: point.score, metadata: { ...payload, point_id: point.id } }];
    });
  }
}
