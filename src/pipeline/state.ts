import type {
  ConversationTurn,
  GateVerdict,
  PipelineRequest,
  PipelineState,
  QueryPlan,
  RankedItem,
  RetrievalOutcome,
  SynthesisResult
} from "./types";

export function createInitialPipelineState(request: PipelineRequest, context: ConversationTurn[] = []): PipelineState {
  return {
    request,
    context,
    plan: null,
    vectorItems: [],
    graphItems: [],
    ranked: [],
    synthesis: null,
    verdict: null,
    retrievalFailures: [],
    warnings: []
  } satisfies PipelineState;
}

export function setPlan(state: PipelineState, plan: QueryPlan): PipelineState {
  return {
    ...state,
    plan
  };
}

export function setRetrieval(state: PipelineState, outcome: RetrievalOutcome): PipelineState {
  return {
    ...state,
    vectorItems: outcome.vector,
    graphItems: outcome.graph,
    retrievalFailures: [...state.retrievalFailures, ...outcome.failures]
  };
}

export function setRanked(state: PipelineState, ranked: RankedItem[]): PipelineState {
  return {
    ...state,
    ranked
  };
}

export function setSynthesis(state: PipelineState, synthesis: SynthesisResult): PipelineState {
  return {
    ...state,
    synthesis
  };
}

export function setVerdict(state: PipelineState, verdict: GateVerdict): PipelineState {
  return {
    ...state,
    verdict
  };
}

export function addWarning(state: PipelineState, warning: string): PipelineState {
  return {
    ...state,
    warnings: [...state.warnings, warning]
  };
}

export function requirePlan(state: PipelineState): QueryPlan {
  if (!state.plan) {
    throw new Error("Pipeline state has no plan; the plan stage must run first");
  }
  return state.plan;
}
