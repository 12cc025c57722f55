export const INTENTS = [
  "greeting",
  "knowledge_query",
  "definition",
  "comparison",
  "causal",
  "multi_entity",
  "cross_episode",
  "out_of_scope",
  "conversational"
] as const;

export type Intent = (typeof INTENTS)[number];

/** Intents that lead to retrieval. */
export const RETRIEVAL_INTENTS = [
  "knowledge_query",
  "definition",
  "comparison",
  "causal",
  "multi_entity",
  "cross_episode"
] as const;

export type RetrievalIntent = (typeof RETRIEVAL_INTENTS)[number];

export type SmallTalkIntent = "greeting" | "conversational";

export const COMPLEXITIES = ["simple", "moderate", "complex"] as const;

export type Complexity = (typeof COMPLEXITIES)[number];

export type GraphTraversalMode = "entity_centric" | "multi_hop" | "cross_source";

export interface RetrievalStrategy {
  useVector: boolean;
  useGraph: boolean;
  expandQuery: boolean;
  graphTraversalMode: GraphTraversalMode;
}

interface PlanBase {
  rawQuery: string;
  complexity: Complexity;
  entities: readonly string[];
  subQueries: readonly string[];
  retrievalStrategy: Readonly<RetrievalStrategy>;
  isFollowUp: boolean;
}

export interface OutOfScopePlan extends PlanBase {
  intent: "out_of_scope";
  rejectionReason: string;
}

export interface SmallTalkPlan extends PlanBase {
  intent: SmallTalkIntent;
}

export interface RetrievalPlan extends PlanBase {
  intent: RetrievalIntent;
}

export type QueryPlan = Readonly<OutOfScopePlan> | Readonly<SmallTalkPlan> | Readonly<RetrievalPlan>;

export type SourceType = "vector" | "graph";

export interface Provenance {
  documentId: string;
  documentTitle?: string;
  /** Seconds into the source (number) or a store-specific position marker. */
  locator?: string | number;
  speaker?: string;
  speakerName?: string;
  relationPath?: string[];
  hopCount?: number;
  documentIds?: string[];
}

export interface RetrievedItem {
  readonly sourceType: SourceType;
  readonly content: string;
  readonly provenance: Readonly<Provenance>;
  readonly relevanceScore: number;
}

export interface RankedItem extends RetrievedItem {
  readonly fusionScore: number;
  readonly diversityScore?: number;
  /** Provenance of every input item merged into this one, primary first. */
  readonly provenances: readonly Readonly<Provenance>[];
}

export interface Citation {
  sourceType: SourceType;
  documentLabel: string;
  locator: string;
  speakerLabel: string;
  confidence: number;
}

export interface SynthesisResult {
  answerText: string;
  citations: Citation[];
  grounded: boolean;
}

export interface EvidenceCounts {
  vector: number;
  graph: number;
}

export type ValidationOutcome = "ACCEPTED" | "REJECTED";

export type RejectionCheck = "grounding_evidence" | "citation_presence" | "self_check" | "synthesis_declined";

export interface GateVerdict {
  outcome: ValidationOutcome;
  result: SynthesisResult;
  failedCheck?: RejectionCheck;
  reason?: string;
  selfCheck?: {
    supported: boolean;
    confidence: number;
  };
}

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
  createdAt?: Date;
}

export interface RetrievalFailureNote {
  source: SourceType;
  message: string;
}

export interface RetrievalOutcome {
  vector: RetrievedItem[];
  graph: RetrievedItem[];
  failures: RetrievalFailureNote[];
}

export interface PipelineRequest {
  query: string;
  conversationId: string;
  tenantId: string;
}

export interface PipelineState {
  request: PipelineRequest;
  context: ConversationTurn[];
  plan: QueryPlan | null;
  vectorItems: RetrievedItem[];
  graphItems: RetrievedItem[];
  ranked: RankedItem[];
  synthesis: SynthesisResult | null;
  verdict: GateVerdict | null;
  retrievalFailures: RetrievalFailureNote[];
  warnings: string[];
}

export const CANONICAL_REJECTION =
  "I couldn't find information about that in the knowledge base. Could you rephrase your question or ask about a specific topic covered by the indexed documents?";

const RETRIEVAL_INTENT_SET: ReadonlySet<string> = new Set(RETRIEVAL_INTENTS);

export function isRetrievalPlan(plan: QueryPlan): plan is Readonly<RetrievalPlan> {
  return RETRIEVAL_INTENT_SET.has(plan.intent);
}

export function evidenceCounts(vector: readonly RetrievedItem[], graph: readonly RetrievedItem[]): EvidenceCounts {
  return { vector: vector.length, graph: graph.length };
}

export function rejectionResult(): SynthesisResult {
  return { answerText: CANONICAL_REJECTION, citations: [], grounded: false };
}
