import { DynamicStructuredTool } from "@langchain/core/tools";
import { z } from "zod";
import type { TextGenerator } from "../llm/client";
import type { GraphRow, GraphStore } from "../stores/graphStore";
import type { VectorHit, VectorStore } from "../stores/vectorStore";
import { buildCrossSourceQuery, buildEntityCentricQuery, buildMultiHopQuery } from "./cypher";
import type { Provenance, RetrievedItem } from "./types";

const VectorSearchSchema = z.object({
  query: z.string().min(1),
  topK: z.number().int().positive().max(100),
  workspaceId: z.string().min(1)
});

const GraphTraversalSchema = z.object({
  mode: z.enum(["entity_centric", "multi_hop", "cross_source"]),
  workspaceId: z.string().min(1),
  nodeIds: z.array(z.string()),
  terms: z.array(z.string()),
  maxHops: z.number().int().min(1).max(5),
  preferredRelations: z.array(z.string()),
  limit: z.number().int().positive().max(200)
});

export type VectorSearchInput = z.infer<typeof VectorSearchSchema>;
export type GraphTraversalInput = z.infer<typeof GraphTraversalSchema>;

const ProvenanceSchema = z.object({
  documentId: z.string(),
  documentTitle: z.string().optional(),
  locator: z.union([z.string(), z.number()]).optional(),
  speaker: z.string().optional(),
  speakerName: z.string().optional(),
  relationPath: z.array(z.string()).optional(),
  hopCount: z.number().optional(),
  documentIds: z.array(z.string()).optional()
});

const RetrievedItemSchema = z.object({
  sourceType: z.enum(["vector", "graph"]),
  content: z.string(),
  provenance: ProvenanceSchema,
  relevanceScore: z.number()
});

/** Tool results travel as JSON text; this restores and checks them. */
export function parseToolItems(raw: unknown): RetrievedItem[] {
  const value: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
  return z.array(RetrievedItemSchema).parse(value);
}

function stringField(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

function locatorField(record: Record<string, unknown>): string | number | undefined {
  for (const key of ["timestamp", "start_time", "start", "offset", "position", "page"]) {
    const value = record[key];
    if (typeof value === "number" && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === "string" && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.flatMap((entry) => (typeof entry === "string" || typeof entry === "number" ? [String(entry)] : []));
}

function numberField(value: unknown, fallback = 0): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function toVectorItem(hit: VectorHit): RetrievedItem {
  const meta = hit.metadata;
  const provenance: Provenance = {
    documentId: stringField(meta, "document_id", "episode_id", "source_id", "point_id") ?? "unknown",
    documentTitle: stringField(meta, "document_title", "title", "episode_title"),
    locator: locatorField(meta),
    speaker: stringField(meta, "speaker", "author"),
    speakerName: stringField(meta, "speaker_name", "author_name")
  };
  return { sourceType: "vector", content: hit.content, provenance, relevanceScore: hit.score };
}

function graphProvenance(row: GraphRow, extra: Partial<Provenance> = {}): Provenance {
  const documentIds = [...new Set(stringList(row.documentIds))];
  const nodeId = stringField(row, "id", "endId") ?? "unknown";
  return {
    documentId: documentIds[0] ?? `graph:${nodeId}`,
    documentIds,
    ...extra
  };
}

interface RelationEntry {
  type: string;
  target: string;
  outgoing: boolean;
}

function relationEntries(value: unknown): RelationEntry[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.flatMap((entry): RelationEntry[] => {
    if (typeof entry !== "object" || entry === null) {
      return [];
    }
    const type = "type" in entry ? entry.type : undefined;
    const target = "target" in entry ? entry.target : undefined;
    if (typeof type !== "string" || typeof target !== "string") {
      return [];
    }
    return [{ type, target, outgoing: "outgoing" in entry ? entry.outgoing !== false : true }];
  });
}

function describeNode(row: GraphRow): string {
  const name = stringField(row, "name") ?? "Unnamed concept";
  const type = stringField(row, "type");
  const description = stringField(row, "description");
  const head = type ? `${name} (${type})` : name;
  return description ? `${head}: ${description}` : head;
}

export function entityCentricItem(row: GraphRow): RetrievedItem {
  const relations = relationEntries(row.relations)
    .map(({ type, target, outgoing }) => (outgoing ? `${type} -> ${target}` : `${target} -> ${type}`))
    .join("; ");
  return {
    sourceType: "graph",
    content: relations ? `${describeNode(row)}. Related: ${relations}` : describeNode(row),
    provenance: graphProvenance(row),
    relevanceScore: numberField(row.score)
  };
}

export function multiHopItem(row: GraphRow): RetrievedItem {
  const names = stringList(row.nodeNames);
  const relationPath = stringList(row.relationTypes);
  const path = names
    .map((name, index) => (index < relationPath.length ? `${name} -[${relationPath[index]}]- ` : name))
    .join("");
  const description = stringField(row, "description");
  const hopCount = numberField(row.hops, relationPath.length);
  return {
    sourceType: "graph",
    content: description ? `${path}. ${stringField(row, "endName") ?? "Target"}: ${description}` : path,
    provenance: graphProvenance(row, { relationPath, hopCount }),
    relevanceScore: numberField(row.score)
  };
}

export function crossSourceItem(row: GraphRow): RetrievedItem {
  const provenance = graphProvenance(row);
  const count = provenance.documentIds?.length ?? 0;
  return {
    sourceType: "graph",
    content: `${describeNode(row)} (mentioned in ${count} documents)`,
    provenance,
    relevanceScore: count
  };
}

export function createVectorSearchTool(store: VectorStore, llm: TextGenerator) {
  return new DynamicStructuredTool({
    name: "vector_search",
    description: "Semantic search over indexed passages. Returns passages with their source provenance.",
    schema: VectorSearchSchema,
    func: async ({ query, topK, workspaceId }) => {
      const [embedding] = await llm.embed([query]);
      const hits = await store.search(embedding, topK, { workspaceId });
      return JSON.stringify(hits.map(toVectorItem));
    }
  });
}

export function createGraphTraversalTool(store: GraphStore) {
  return new DynamicStructuredTool({
    name: "graph_traversal",
    description: "Looks up knowledge-graph concepts and their relationships around linked entities.",
    schema: GraphTraversalSchema,
    func: async (input) => {
      switch (input.mode) {
        case "multi_hop": {
          const rows = await store.run(
            buildMultiHopQuery(input.workspaceId, input.nodeIds, input.maxHops, input.preferredRelations, input.limit)
          );
          return JSON.stringify(rows.map(multiHopItem));
        }
        case "cross_source": {
          const rows = await store.run(buildCrossSourceQuery(input.workspaceId, input.nodeIds, input.terms, input.limit));
          return JSON.stringify(rows.map(crossSourceItem));
        }
        case "entity_centric": {
          const rows = await store.run(buildEntityCentricQuery(input.workspaceId, input.nodeIds, input.terms, input.limit));
          return JSON.stringify(rows.map(entityCentricItem));
        }
      }
    }
  });
}
