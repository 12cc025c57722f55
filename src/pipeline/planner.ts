import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/pipeline";
import { PlanningFailure, describeError } from "../errors";
import { completeJson, type TextGenerator } from "../llm/client";
import {
  buildClassificationMessages,
  buildDecompositionMessages,
  buildRelevanceMessages
} from "../llm/prompt";
import { componentLogger, type AppLogger } from "../logger";
import {
  DecompositionSchema,
  QueryClassificationSchema,
  RelevanceJudgementSchema
} from "../parsers/model-output";
import { normalizeWhitespace, uniqueStrings, withTimeout } from "../utils";
import { extractEntities, questionTopic } from "./entities";
import { looksLikeFollowUp, matchOutOfScope, matchSmallTalk } from "./patterns";
import {
  RETRIEVAL_INTENTS,
  type Complexity,
  type ConversationTurn,
  type GraphTraversalMode,
  type Intent,
  type OutOfScopePlan,
  type QueryPlan,
  type RetrievalIntent,
  type RetrievalPlan,
  type SmallTalkIntent
} from "./types";

const SIMPLE_DEFINITION = /^(?:what|who)\s+(?:is|was|are|were)\s+(?:an?\s+|the\s+)?[\w\s'’.-]{1,60}\??$/i;
// Wording that asks how things relate rather than what one thing is.
const RELATIONAL_WORDING =
  /\b(?:differences?|differ|compare[sd]?|comparison|versus|vs\.?|relationship|relate[sd]?|between|causes?|caused|effects?|leads? to|impacts?|influences?)\b|\s(?:and|or)\s/i;
const CROSS_SOURCE_HINT = /\b(?:across|recurring|recur|recurs|common themes?|in (?:all|many|multiple|several) (?:documents|episodes|talks|sources)|most often|repeatedly)\b/i;
const MAX_SUB_QUERIES = 4;

type PlannerConfig = PipelineConfig["planner"];

const NO_RETRIEVAL = Object.freeze({
  useVector: false,
  useGraph: false,
  expandQuery: false,
  graphTraversalMode: "entity_centric"
} as const);

export function outOfScopePlan(rawQuery: string, rejectionReason: string, entities: readonly string[] = []): QueryPlan {
  const plan: OutOfScopePlan = {
    rawQuery,
    intent: "out_of_scope",
    complexity: "simple",
    entities: Object.freeze([...entities]),
    subQueries: Object.freeze([]),
    retrievalStrategy: NO_RETRIEVAL,
    rejectionReason,
    isFollowUp: false
  };
  return Object.freeze(plan);
}

function smallTalkPlan(rawQuery: string, intent: SmallTalkIntent): QueryPlan {
  return Object.freeze({
    rawQuery,
    intent,
    complexity: "simple",
    entities: Object.freeze([]),
    subQueries: Object.freeze([]),
    retrievalStrategy: NO_RETRIEVAL,
    isFollowUp: false
  } satisfies QueryPlan);
}

export function traversalModeFor(intent: RetrievalIntent): GraphTraversalMode {
  switch (intent) {
    case "causal":
    case "comparison":
    case "multi_entity":
      return "multi_hop";
    case "cross_episode":
      return "cross_source";
    case "definition":
    case "knowledge_query":
      return "entity_centric";
  }
}

/** "What is X?" where X is a single noun phrase; anything relational goes to the classifier. */
export function isBareDefinition(query: string): boolean {
  return SIMPLE_DEFINITION.test(query) && !RELATIONAL_WORDING.test(query) && !CROSS_SOURCE_HINT.test(query);
}

function toRetrievalIntent(intent: Intent): RetrievalIntent {
  return RETRIEVAL_INTENTS.find((candidate) => candidate === intent) ?? "knowledge_query";
}

export interface QueryPlannerOptions {
  config?: PlannerConfig;
  logger?: AppLogger;
}

export class QueryPlanner {
  private readonly config: PlannerConfig;

  private readonly logger: AppLogger;

  constructor(
    private readonly llm: TextGenerator,
    { config = DEFAULT_PIPELINE_CONFIG.planner, logger }: QueryPlannerOptions = {}
  ) {
    this.config = config;
    this.logger = logger ?? componentLogger("planner");
  }

  /** Never rejects: any failure yields the most restrictive plan. */
  async plan(query: string, context: ConversationTurn[]): Promise<QueryPlan> {
    try {
      const plan = await this.buildPlan(query, context);
      this.logger.info("plan:created", {
        intent: plan.intent,
        complexity: plan.complexity,
        entities: plan.entities,
        subQueries: plan.subQueries.length,
        mode: plan.retrievalStrategy.graphTraversalMode
      });
      return plan;
    } catch (error) {
      this.logger.warn("plan:failed_closed", { error: describeError(error) });
      return outOfScopePlan(query, "Query classification is unavailable, so the question cannot be answered safely.");
    }
  }

  private async buildPlan(query: string, context: ConversationTurn[]): Promise<QueryPlan> {
    const rawQuery = normalizeWhitespace(query);
    if (rawQuery.length === 0) {
      return outOfScopePlan(query, "The question is empty.");
    }

    const smallTalk = matchSmallTalk(rawQuery);
    if (smallTalk) {
      return smallTalkPlan(rawQuery, smallTalk.intent);
    }

    const outOfScope = matchOutOfScope(rawQuery);
    if (outOfScope) {
      return outOfScopePlan(rawQuery, outOfScope.reason);
    }

    const recent = this.config.contextTurns > 0 ? context.slice(-this.config.contextTurns) : [];
    const isFollowUp = recent.length > 0 && looksLikeFollowUp(rawQuery);
    const contextEntities = isFollowUp
      ? [...recent].reverse().flatMap((turn) => extractEntities(turn.content))
      : [];
    const queryEntities = extractEntities(rawQuery);

    const relevance = await this.modelCall("relevance", () =>
      completeJson(this.llm, buildRelevanceMessages(rawQuery, recent), RelevanceJudgementSchema, {
        operation: "relevance",
        temperature: 0,
        maxTokens: 200
      })
    );
    if (!relevance.relevant) {
      return outOfScopePlan(rawQuery, relevance.reason || "The question is outside the knowledge base.", queryEntities);
    }

    const { intent, complexity, modelEntities } = await this.classify(rawQuery, recent, queryEntities);
    const entities = uniqueStrings([...queryEntities, ...modelEntities, ...contextEntities]);
    const subQueries = complexity === "simple" ? [] : await this.decompose(rawQuery, intent, entities);

    const plan: RetrievalPlan = {
      rawQuery,
      intent,
      complexity,
      entities: Object.freeze(entities),
      subQueries: Object.freeze(subQueries),
      retrievalStrategy: Object.freeze({
        useVector: true,
        useGraph: true,
        expandQuery: complexity !== "simple",
        graphTraversalMode: traversalModeFor(intent)
      }),
      isFollowUp
    };
    return Object.freeze(plan);
  }

  private async classify(
    query: string,
    recent: ConversationTurn[],
    queryEntities: string[]
  ): Promise<{ intent: RetrievalIntent; complexity: Complexity; modelEntities: string[] }> {
    if (isBareDefinition(query) && queryEntities.length <= 1) {
      return { intent: "definition", complexity: "simple", modelEntities: [] };
    }

    const classification = await this.modelCall("classification", () =>
      completeJson(this.llm, buildClassificationMessages(query, recent), QueryClassificationSchema, {
        operation: "classification",
        temperature: 0,
        maxTokens: 300
      })
    );

    let intent = toRetrievalIntent(classification.intent);
    if (classification.crossDocument || CROSS_SOURCE_HINT.test(query)) {
      intent = "cross_episode";
    }

    let complexity = classification.complexity;
    if (complexity === "simple" && (intent === "comparison" || intent === "causal" || intent === "multi_entity")) {
      complexity = "moderate";
    }
    if (intent === "cross_episode") {
      complexity = "complex";
    }

    return { intent, complexity, modelEntities: classification.entities };
  }

  private async decompose(query: string, intent: RetrievalIntent, entities: string[]): Promise<string[]> {
    const patterned = patternDecomposition(query, intent, entities);
    if (patterned.length >= 2) {
      return patterned.slice(0, MAX_SUB_QUERIES);
    }

    try {
      const { subQueries } = await this.modelCall("decomposition", () =>
        completeJson(this.llm, buildDecompositionMessages(query, entities), DecompositionSchema, {
          operation: "decomposition",
          temperature: 0.2,
          maxTokens: 300
        })
      );
      const cleaned = uniqueStrings(subQueries).slice(0, MAX_SUB_QUERIES);
      if (cleaned.length >= 2) {
        return cleaned;
      }
    } catch (error) {
      this.logger.warn("plan:decomposition_fallback", { error: describeError(error) });
    }
    return fallbackDecomposition(query, entities);
  }

  private async modelCall<T>(step: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call(), this.config.classifierTimeoutMs, `planner ${step}`);
    } catch (error) {
      throw new PlanningFailure(`Planner ${step} failed: ${describeError(error)}`, error);
    }
  }
}

export function patternDecomposition(query: string, intent: RetrievalIntent, entities: string[]): string[] {
  switch (intent) {
    case "comparison":
      if (entities.length >= 2) {
        return uniqueStrings([...entities.slice(0, 3).map((entity) => `What is ${entity}?`), query]);
      }
      return [];
    case "multi_entity":
      if (entities.length >= 2) {
        return uniqueStrings([...entities.slice(0, 3).map((entity) => `What is said about ${entity}?`), query]);
      }
      return [];
    case "causal": {
      const topic = entities[0] ?? questionTopic(query);
      return topic ? uniqueStrings([`What causes ${topic}?`, `What are the effects of ${topic}?`, query]) : [];
    }
    default:
      return [];
  }
}

export function fallbackDecomposition(query: string, entities: string[]): string[] {
  const candidates = uniqueStrings([query, ...entities.map((entity) => `What is ${entity}?`)]);
  if (candidates.length >= 2) {
    return candidates.slice(0, MAX_SUB_QUERIES);
  }
  return uniqueStrings([query, `What is known about ${questionTopic(query)}?`]);
}
