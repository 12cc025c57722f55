import pLimit from "p-limit";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/pipeline";
import { RetrievalFailure, describeError } from "../errors";
import type { TextGenerator } from "../llm/client";
import { componentLogger, type AppLogger } from "../logger";
import type { GraphStore } from "../stores/graphStore";
import type { VectorStore } from "../stores/vectorStore";
import { contentKey, uniqueStrings, withTimeout } from "../utils";
import { relationHints } from "./cypher";
import { extractEntities, keywordTerms } from "./entities";
import { EntityLinker } from "./entityLinking";
import { QueryExpander } from "./expansion";
import { createGraphTraversalTool, createVectorSearchTool, parseToolItems } from "./tools";
import {
  isRetrievalPlan,
  type QueryPlan,
  type RetrievalFailureNote,
  type RetrievalOutcome,
  type RetrievalPlan,
  type RetrievedItem,
  type SourceType
} from "./types";

type RetrievalConfig = PipelineConfig["retrieval"];

/** Prefix length used to collapse near-identical passages returned for different query variants. */
export const VARIANT_DEDUP_PREFIX = 100;

export interface RetrievalCoordinatorOptions {
  vectorStore: VectorStore;
  graphStore: GraphStore;
  llm: TextGenerator;
  workspaceId: string;
  config?: RetrievalConfig;
  expander?: QueryExpander;
  linker?: EntityLinker;
  logger?: AppLogger;
}

interface SideResult {
  items: RetrievedItem[];
  failure?: RetrievalFailureNote;
}

/** Keeps the best-scoring copy of passages that share a normalized prefix, ordered by score. */
export function dedupeByPrefix(items: readonly RetrievedItem[], prefixLength = VARIANT_DEDUP_PREFIX): RetrievedItem[] {
  const best = new Map<string, RetrievedItem>();
  for (const item of items) {
    const key = contentKey(item.content, prefixLength);
    const current = best.get(key);
    if (!current || item.relevanceScore > current.relevanceScore) {
      best.set(key, item);
    }
  }
  return [...best.values()].sort((a, b) => b.relevanceScore - a.relevanceScore);
}

/** Shorter paths first, then the store's own score. */
export function orderByHops(items: readonly RetrievedItem[]): RetrievedItem[] {
  return [...items].sort((a, b) => {
    const hops = (a.provenance.hopCount ?? Number.MAX_SAFE_INTEGER) - (b.provenance.hopCount ?? Number.MAX_SAFE_INTEGER);
    return hops !== 0 ? hops : b.relevanceScore - a.relevanceScore;
  });
}

export function orderByDocumentSpread(items: readonly RetrievedItem[]): RetrievedItem[] {
  const spread = (item: RetrievedItem) => new Set(item.provenance.documentIds ?? []).size;
  return [...items].sort((a, b) => spread(b) - spread(a));
}

export class RetrievalCoordinator {
  private readonly config: RetrievalConfig;

  private readonly logger: AppLogger;

  private readonly expander: QueryExpander;

  private readonly linker: EntityLinker;

  private readonly vectorSearch: ReturnType<typeof createVectorSearchTool>;

  private readonly graphTraversal: ReturnType<typeof createGraphTraversalTool>;

  private readonly workspaceId: string;

  constructor(options: RetrievalCoordinatorOptions) {
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG.retrieval;
    this.logger = options.logger ?? componentLogger("retrieval");
    this.workspaceId = options.workspaceId;
    this.expander = options.expander ?? new QueryExpander(options.llm, { maxVariants: this.config.maxExpansionVariants });
    this.linker = options.linker ?? new EntityLinker(options.graphStore, options.llm);
    this.vectorSearch = createVectorSearchTool(options.vectorStore, options.llm);
    this.graphTraversal = createGraphTraversalTool(options.graphStore);
  }

  async retrieve(plan: QueryPlan): Promise<RetrievalOutcome> {
    if (!isRetrievalPlan(plan)) {
      return { vector: [], graph: [], failures: [] };
    }

    const { useVector, useGraph } = plan.retrievalStrategy;
    const started = Date.now();
    // Both sides start before either is awaited; this join is the only barrier.
    const [vector, graph] = await Promise.all([
      useVector ? this.guard("vector", () => this.retrieveVector(plan)) : Promise.resolve<SideResult>({ items: [] }),
      useGraph ? this.guard("graph", () => this.retrieveGraph(plan)) : Promise.resolve<SideResult>({ items: [] })
    ]);

    const failures = [vector.failure, graph.failure].filter(
      (note): note is RetrievalFailureNote => note !== undefined
    );
    this.logger.info("retrieval:completed", {
      vector: vector.items.length,
      graph: graph.items.length,
      failures: failures.map((note) => note.source),
      elapsedMs: Date.now() - started
    });
    return { vector: vector.items, graph: graph.items, failures };
  }

  private async guard(source: SourceType, run: () => Promise<RetrievedItem[]>): Promise<SideResult> {
    try {
      const items = await withTimeout(run(), this.config.timeoutMs, `${source} retrieval`);
      return { items };
    } catch (error) {
      const message = describeError(error);
      this.logger.warn("retrieval:side_failed", { source, error: message });
      return { items: [], failure: { source, message } };
    }
  }

  private async retrieveVector(plan: Readonly<RetrievalPlan>): Promise<RetrievedItem[]> {
    const queries = plan.subQueries.length > 0 ? [...plan.subQueries] : [plan.rawQuery];
    const expand = plan.retrievalStrategy.expandQuery && plan.complexity !== "simple";
    const limit = pLimit(this.config.expansionConcurrency);

    const variants = expand
      ? uniqueStrings((await Promise.all(queries.map((query) => limit(() => this.expander.expand(query))))).flat())
      : uniqueStrings(queries);

    const settled = await Promise.allSettled(
      variants.map((query) =>
        limit(async () =>
          parseToolItems(
            await this.vectorSearch.invoke({ query, topK: this.config.vectorTopK, workspaceId: this.workspaceId })
          )
        )
      )
    );

    const items: RetrievedItem[] = [];
    const errors: string[] = [];
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        items.push(...outcome.value);
      } else {
        errors.push(describeError(outcome.reason));
      }
    }
    if (errors.length === variants.length && variants.length > 0) {
      throw new RetrievalFailure("vector", `All ${variants.length} vector searches failed: ${errors[0]}`);
    }
    if (errors.length > 0) {
      this.logger.warn("retrieval:variants_failed", { failed: errors.length, total: variants.length });
    }

    return dedupeByPrefix(items).slice(0, this.config.vectorTopK * Math.max(1, queries.length));
  }

  private async retrieveGraph(plan: Readonly<RetrievalPlan>): Promise<RetrievedItem[]> {
    let mode = plan.retrievalStrategy.graphTraversalMode;
    const entities = plan.entities.length > 0 ? [...plan.entities] : extractEntities(plan.rawQuery);
    // Without a named subject, a cross-source question ranks the whole graph; its wording is framing, not a filter.
    const terms = entities.length > 0 ? entities : mode === "cross_source" ? [] : keywordTerms(plan.rawQuery);
    const linked = await this.linker.link(terms, this.workspaceId);
    const nodeIds = linked.map((entry) => entry.nodeId);

    if (mode === "multi_hop" && nodeIds.length === 0) {
      // Traversal needs anchor nodes; fall back to a term lookup.
      mode = "entity_centric";
    }

    const raw = await this.graphTraversal.invoke({
      mode,
      workspaceId: this.workspaceId,
      nodeIds,
      terms,
      maxHops: this.config.maxHops,
      preferredRelations: relationHints(plan.rawQuery),
      limit: this.config.graphTopK * (mode === "multi_hop" ? 3 : 1)
    });
    const items = parseToolItems(raw);

    this.logger.debug("retrieval:graph", { mode, linked: linked.map((entry) => entry.name), rows: items.length });

    switch (mode) {
      case "multi_hop":
        return orderByHops(items).slice(0, this.config.graphTopK);
      case "cross_source":
        return orderByDocumentSpread(items).slice(0, this.config.graphTopK);
      case "entity_centric":
        return [...items].sort((a, b) => b.relevanceScore - a.relevanceScore).slice(0, this.config.graphTopK);
    }
  }
}
