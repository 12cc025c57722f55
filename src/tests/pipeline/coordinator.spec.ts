import { describe, expect, it } from "vitest";
import { RetrievalCoordinator, dedupeByPrefix } from "../../pipeline/coordinator";
import { outOfScopePlan } from "../../pipeline/planner";
import type { GraphTraversalMode, QueryPlan, RetrievalIntent } from "../../pipeline/types";
import type { GraphRow } from "../../stores/graphStore";
import { FakeGraphStore, FakeTextGenerator, FakeVectorStore, vectorHit } from "../fakes";

function retrievalPlan(
  rawQuery: string,
  {
    intent = "knowledge_query",
    mode = "entity_centric",
    entities = [],
    subQueries = [],
    expand = false
  }: {
    intent?: RetrievalIntent;
    mode?: GraphTraversalMode;
    entities?: string[];
    subQueries?: string[];
    expand?: boolean;
  } = {}
): QueryPlan {
  return {
    rawQuery,
    intent,
    complexity: expand ? "moderate" : "simple",
    entities,
    subQueries,
    retrievalStrategy: { useVector: true, useGraph: true, expandQuery: expand, graphTraversalMode: mode },
    isFollowUp: false
  };
}

const DEEP_WORK_NODE: GraphRow = { id: "n1", name: "Deep Work", aliases: [] };

function coordinator(vectorStore: FakeVectorStore, graphStore: FakeGraphStore, llm = new FakeTextGenerator()) {
  return new RetrievalCoordinator({ vectorStore, graphStore, llm, workspaceId: "ws-1" });
}

describe("RetrievalCoordinator", () => {
  it("issues no store calls for plans that need no retrieval", async () => {
    const vectorStore = new FakeVectorStore([vectorHit("anything", 0.9)]);
    const graphStore = new FakeGraphStore();
    const llm = new FakeTextGenerator();

    const outcome = await coordinator(vectorStore, graphStore, llm).retrieve(outOfScopePlan("What is 2+2?", "math"));

    expect(outcome).toEqual({ vector: [], graph: [], failures: [] });
    expect(vectorStore.calls).toHaveLength(0);
    expect(graphStore.queries).toHaveLength(0);
    expect(llm.embedCalls).toBe(0);
  });

  it("runs both sources concurrently", async () => {
    const vectorStore = new FakeVectorStore([vectorHit("Deep work needs long blocks of time.", 0.8)], { delayMs: 200 });
    // Two statements (node lookup, then traversal) at 150ms each.
    const graphStore = new FakeGraphStore(
      { node_lookup: [DEEP_WORK_NODE], entity_centric: [{ id: "n1", name: "Deep Work", score: 1 }] },
      { delayMs: 150 }
    );

    const started = Date.now();
    const outcome = await coordinator(vectorStore, graphStore).retrieve(
      retrievalPlan("What is Deep Work?", { entities: ["Deep Work"] })
    );
    const elapsed = Date.now() - started;

    expect(outcome.vector).toHaveLength(1);
    expect(outcome.graph).toHaveLength(1);
    expect(elapsed).toBeGreaterThanOrEqual(280);
    expect(elapsed).toBeLessThan(480);
  });

  it("keeps graph results when the vector store fails", async () => {
    const vectorStore = new FakeVectorStore([], { error: new Error("qdrant down") });
    const graphStore = new FakeGraphStore({
      node_lookup: [DEEP_WORK_NODE],
      entity_centric: [{ id: "n1", name: "Deep Work", type: "Concept", description: "Focused work", score: 1 }]
    });

    const outcome = await coordinator(vectorStore, graphStore).retrieve(
      retrievalPlan("What is Deep Work?", { entities: ["Deep Work"] })
    );

    expect(outcome.vector).toEqual([]);
    expect(outcome.graph.map((item) => item.content)).toEqual(["Deep Work (Concept): Focused work"]);
    expect(outcome.failures).toEqual([{ source: "vector", message: "All 1 vector searches failed: qdrant down" }]);
  });

  it("keeps vector results when the graph store fails", async () => {
    const vectorStore = new FakeVectorStore([vectorHit("Deep work needs long blocks of time.", 0.8)]);
    const graphStore = new FakeGraphStore({}, { error: new Error("neo4j down") });

    const outcome = await coordinator(vectorStore, graphStore).retrieve(
      retrievalPlan("What is Deep Work?", { entities: ["Deep Work"] })
    );

    expect(outcome.vector.map((item) => item.content)).toEqual(["Deep work needs long blocks of time."]);
    expect(outcome.graph).toEqual([]);
    expect(outcome.failures).toEqual([{ source: "graph", message: "neo4j down" }]);
  });

  it("searches every expanded variant within the workspace", async () => {
    const vectorStore = new FakeVectorStore([vectorHit("Deep work needs long blocks of time.", 0.8)]);
    const llm = new FakeTextGenerator({
      expansion: JSON.stringify({ variants: ["deep focus", "concentrated work", "distraction-free work"] })
    });

    const outcome = await coordinator(vectorStore, new FakeGraphStore(), llm).retrieve(
      retrievalPlan("How do deep work and focus relate?", {
        subQueries: ["What is deep work?", "What is focus?"],
        expand: true
      })
    );

    expect(llm.callsFor("expansion")).toBe(2);
    expect(vectorStore.calls).toHaveLength(5);
    expect(vectorStore.calls.every((call) => call.filter.workspaceId === "ws-1")).toBe(true);
    expect(outcome.vector).toHaveLength(1);
  });

  it("links entities deterministically and orders paths by hop count", async () => {
    const llm = new FakeTextGenerator();
    const graphStore = new FakeGraphStore({
      node_lookup: [DEEP_WORK_NODE],
      multi_hop: [
        {
          hops: 2,
          relationTypes: ["RELATED_TO", "CAUSES"],
          nodeNames: ["Deep Work", "Focus", "Flow"],
          documentIds: ["ep2"],
          score: 5
        },
        { hops: 1, relationTypes: ["INFLUENCES"], nodeNames: ["Deep Work", "Attention"], documentIds: ["ep1"], score: 0.1 },
        { hops: 1, relationTypes: ["CAUSES"], nodeNames: ["Deep Work", "Productivity"], documentIds: ["ep3"], score: 0.9 }
      ]
    });

    const outcome = await coordinator(new FakeVectorStore(), graphStore, llm).retrieve(
      retrievalPlan("Why does Deep Work improve output?", { intent: "causal", mode: "multi_hop", entities: ["Deep Work"] })
    );

    expect(outcome.graph.map((item) => item.content)).toEqual([
      "Deep Work -[CAUSES]- Productivity",
      "Deep Work -[INFLUENCES]- Attention",
      "Deep Work -[RELATED_TO]- Focus -[CAUSES]- Flow"
    ]);
    expect(outcome.graph[2].provenance.hopCount).toBe(2);
    expect(graphStore.kinds()).toEqual(["node_lookup", "multi_hop"]);
    expect(graphStore.queries[1].params.nodeIds).toEqual(["n1"]);
    expect(graphStore.queries[1].params.preferredRelations).toEqual(["CAUSES", "LEADS_TO", "RESULTS_IN"]);
    expect(graphStore.queries[1].text).toContain("[*1..3]");
    expect(llm.callsFor("entity_match")).toBe(0);
  });

  it("falls back to a term lookup when multi-hop has no anchor node", async () => {
    const graphStore = new FakeGraphStore({ entity_centric: [{ id: "n7", name: "Focus", score: 0.5 }] });

    const outcome = await coordinator(new FakeVectorStore(), graphStore).retrieve(
      retrievalPlan("Why does Focus matter?", { intent: "causal", mode: "multi_hop", entities: ["Focus"] })
    );

    expect(graphStore.kinds()).toEqual(["node_lookup", "node_sample", "entity_centric"]);
    expect(outcome.graph.map((item) => item.content)).toEqual(["Focus"]);
  });

  it("ranks every multi-document concept for generic cross-source questions", async () => {
    const llm = new FakeTextGenerator();
    const graphStore = new FakeGraphStore({
      cross_source: [
        { id: "a", name: "Focus", type: "Concept", description: "x", documentIds: ["e1", "e2"] },
        { id: "b", name: "Habits", documentIds: ["e1", "e2", "e3", "e3"] }
      ]
    });

    const outcome = await coordinator(new FakeVectorStore(), graphStore, llm).retrieve(
      retrievalPlan("What recurs across documents?", { intent: "cross_episode", mode: "cross_source" })
    );

    expect(outcome.graph.map((item) => item.content)).toEqual([
      "Habits (mentioned in 3 documents)",
      "Focus (Concept): x (mentioned in 2 documents)"
    ]);
    expect(outcome.graph[0].provenance.documentIds).toEqual(["e1", "e2", "e3"]);
    expect(graphStore.kinds()).toEqual(["cross_source"]);
    expect(graphStore.queries[0].params.terms).toEqual([]);
    expect(graphStore.queries[0].params.nodeIds).toEqual([]);
    expect(llm.callsFor("entity_match")).toBe(0);
  });

  it("scopes cross-source ranking to named entities", async () => {
    const graphStore = new FakeGraphStore({
      node_lookup: [DEEP_WORK_NODE],
      cross_source: [{ id: "n1", name: "Deep Work", documentIds: ["e1", "e2"] }]
    });

    await coordinator(new FakeVectorStore(), graphStore).retrieve(
      retrievalPlan("How is Deep Work discussed across talks?", {
        intent: "cross_episode",
        mode: "cross_source",
        entities: ["Deep Work"]
      })
    );

    expect(graphStore.kinds()).toEqual(["node_lookup", "cross_source"]);
    expect(graphStore.queries[1].params.nodeIds).toEqual(["n1"]);
  });
});

describe("dedupeByPrefix", () => {
  it("keeps the best-scoring copy of near-identical passages", () => {
    const items = [
      { sourceType: "vector" as const, content: "Same passage text", relevanceScore: 0.2, provenance: { documentId: "a" } },
      { sourceType: "vector" as const, content: "same   passage text", relevanceScore: 0.7, provenance: { documentId: "b" } },
      { sourceType: "vector" as const, content: "Different passage", relevanceScore: 0.5, provenance: { documentId: "c" } }
    ];

    expect(dedupeByPrefix(items).map((item) => item.provenance.documentId)).toEqual(["b", "c"]);
  });
});
