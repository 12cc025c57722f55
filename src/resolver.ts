import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "./config/pipeline";
import { describeError } from "./errors";
import type { TextGenerator } from "./llm/client";
import { componentLogger, type AppLogger } from "./logger";
import { RetrievalCoordinator } from "./pipeline/coordinator";
import { DEFAULT_ALIASES, EntityLinker, type AliasTable } from "./pipeline/entityLinking";
import { QueryExpander } from "./pipeline/expansion";
import { Fuser } from "./pipeline/fusion";
import { runAnswerGraph, type PipelineComponents } from "./pipeline/graph";
import { QueryPlanner } from "./pipeline/planner";
import { EmbeddingVectorizer, LexicalVectorizer, type Vectorizer } from "./pipeline/similarity";
import { addWarning, createInitialPipelineState, requirePlan } from "./pipeline/state";
import { Synthesizer, type DeltaHandler } from "./pipeline/synthesizer";
import {
  CANONICAL_REJECTION,
  evidenceCounts,
  type ConversationTurn,
  type PipelineRequest,
  type PipelineState
} from "./pipeline/types";
import { ValidationGate } from "./pipeline/validation";
import type { ConversationStore } from "./stores/conversationStore";
import type { GraphStore } from "./stores/graphStore";
import type { VectorStore } from "./stores/vectorStore";
import type { AnswerRequest, AnswerResponse, AnswerStreamEvent } from "./types";

export type SimilarityMode = "lexical" | "embedding";

/** Handles shared by every request of one workspace. */
export interface TenantClients {
  llm: TextGenerator;
  vectorStore: VectorStore;
  graphStore: GraphStore;
}

export interface QuestionResolverOptions {
  clients: (tenantId: string) => Promise<TenantClients>;
  conversations: ConversationStore;
  defaultTenantId: string;
  config?: PipelineConfig;
  similarity?: SimilarityMode;
  aliases?: AliasTable;
  logger?: AppLogger;
}

export function toAnswerResponse(state: PipelineState): AnswerResponse {
  const plan = requirePlan(state);
  const { verdict } = state;
  if (!verdict) {
    throw new Error("Pipeline finished without a validation verdict");
  }

  const grounded = verdict.outcome === "ACCEPTED" && verdict.result.grounded;
  return {
    answer: grounded ? verdict.result.answerText : CANONICAL_REJECTION,
    citations: grounded ? verdict.result.citations : [],
    grounded,
    diagnostics: {
      intent: plan.intent,
      complexity: plan.complexity,
      evidenceCounts: evidenceCounts(state.vectorItems, state.graphItems),
      outcome: verdict.outcome,
      rejectionReason: verdict.outcome === "REJECTED" ? verdict.reason : undefined,
      failedCheck: verdict.failedCheck,
      retrievalFailures: state.retrievalFailures,
      warnings: state.warnings
    }
  };
}

/**
 * Entry point for callers. Stage objects are cheap and built per request
 * around the tenant's pooled clients; the clients themselves are long-lived.
 */
export class QuestionResolver {
  private readonly config: PipelineConfig;

  private readonly logger: AppLogger;

  constructor(private readonly options: QuestionResolverOptions) {
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG;
    this.logger = options.logger ?? componentLogger("resolver");
  }

  answerQuestion(request: AnswerRequest): Promise<AnswerResponse> {
    return this.execute(request);
  }

  /**
   * Answer text arrives as `delta` events, then exactly one `final` event once
   * the validation gate has run. Errors are thrown to the consumer after any
   * deltas already produced.
   */
  async *streamAnswer(request: AnswerRequest): AsyncGenerator<AnswerStreamEvent> {
    const queue: AnswerStreamEvent[] = [];
    const signal: { wake: (() => void) | null; done: boolean; failure: { error: unknown } | null } = {
      wake: null,
      done: false,
      failure: null
    };
    const notify = () => {
      const wake = signal.wake;
      signal.wake = null;
      wake?.();
    };

    const run = this.execute(request, (text) => {
      queue.push({ type: "delta", text });
      notify();
    })
      .then((response) => {
        queue.push({ type: "final", response });
      })
      .catch((error: unknown) => {
        signal.failure = { error };
      })
      .finally(() => {
        signal.done = true;
        notify();
      });

    for (;;) {
      const next = queue.shift();
      if (next) {
        yield next;
        continue;
      }
      if (signal.done) {
        break;
      }
      await new Promise<void>((resolve) => {
        signal.wake = resolve;
      });
    }

    await run;
    if (signal.failure) {
      throw signal.failure.error;
    }
  }

  private async execute(request: AnswerRequest, onDelta?: DeltaHandler): Promise<AnswerResponse> {
    const pipelineRequest: PipelineRequest = {
      query: request.query,
      conversationId: request.conversationId,
      tenantId: request.tenantId ?? this.options.defaultTenantId
    };
    const started = Date.now();

    const { context, warning } = await this.loadContext(pipelineRequest.conversationId);
    let initialState = createInitialPipelineState(pipelineRequest, context);
    if (warning) {
      initialState = addWarning(initialState, warning);
    }

    const clients = await this.options.clients(pipelineRequest.tenantId);
    const finalState = await runAnswerGraph(initialState, this.components(clients, pipelineRequest.tenantId), {
      onDelta,
      logger: this.logger
    });

    const response = toAnswerResponse(finalState);
    this.logger.info("resolver:answered", {
      tenantId: pipelineRequest.tenantId,
      intent: response.diagnostics.intent,
      grounded: response.grounded,
      elapsedMs: Date.now() - started
    });
    return response;
  }

  private async loadContext(conversationId: string): Promise<{ context: ConversationTurn[]; warning?: string }> {
    try {
      return { context: await this.options.conversations.recentTurns(conversationId, this.config.planner.contextTurns) };
    } catch (error) {
      const message = describeError(error);
      this.logger.warn("resolver:context_unavailable", { conversationId, error: message });
      return { context: [], warning: `Conversation context unavailable: ${message}` };
    }
  }

  private components({ llm, vectorStore, graphStore }: TenantClients, workspaceId: string): PipelineComponents {
    const vectorizer: Vectorizer =
      this.options.similarity === "embedding" ? new EmbeddingVectorizer(llm) : new LexicalVectorizer();

    return {
      planner: new QueryPlanner(llm, { config: this.config.planner, logger: componentLogger("planner", this.logger) }),
      coordinator: new RetrievalCoordinator({
        vectorStore,
        graphStore,
        llm,
        workspaceId,
        config: this.config.retrieval,
        expander: new QueryExpander(llm, {
          maxVariants: this.config.retrieval.maxExpansionVariants,
          timeoutMs: this.config.retrieval.timeoutMs
        }),
        linker: new EntityLinker(graphStore, llm, { aliases: this.options.aliases ?? DEFAULT_ALIASES }),
        logger: componentLogger("retrieval", this.logger)
      }),
      fuser: new Fuser(this.config.fusion, vectorizer),
      synthesizer: new Synthesizer(llm, {
        config: this.config.synthesis,
        logger: componentLogger("synthesizer", this.logger)
      }),
      gate: new ValidationGate(llm, { config: this.config.validation, logger: componentLogger("validation", this.logger) })
    };
  }
}
