import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import { componentLogger, type AppLogger } from "../logger";
import type { RetrievalCoordinator } from "./coordinator";
import type { Fuser } from "./fusion";
import { matchSmallTalk, smallTalkReply } from "./patterns";
import type { QueryPlanner } from "./planner";
import {
  createInitialPipelineState,
  requirePlan,
  setPlan,
  setRanked,
  setRetrieval,
  setSynthesis,
  setVerdict
} from "./state";
import type { DeltaHandler, Synthesizer } from "./synthesizer";
import { evidenceCounts, isRetrievalPlan, rejectionResult, type PipelineState, type SynthesisResult } from "./types";
import type { ValidationGate } from "./validation";

const PipelineAnnotation = Annotation.Root({
  state: Annotation<PipelineState>({
    reducer: (_current, update) => update,
    default: () => createInitialPipelineState({ query: "", conversationId: "", tenantId: "" })
  })
});

type GraphChannels = {
  state: PipelineState;
};

export interface PipelineComponents {
  planner: QueryPlanner;
  coordinator: RetrievalCoordinator;
  fuser: Fuser;
  synthesizer: Synthesizer;
  gate: ValidationGate;
}

export interface PipelineHooks {
  /** Receives answer text as it is generated; only called once evidence exists. */
  onDelta?: DeltaHandler;
  logger?: AppLogger;
}

function directResponse(state: PipelineState): SynthesisResult {
  const plan = requirePlan(state);
  if (plan.intent === "greeting" || plan.intent === "conversational") {
    const match = matchSmallTalk(state.request.query);
    if (match) {
      return { answerText: smallTalkReply(match.kind), citations: [], grounded: true };
    }
  }
  return rejectionResult();
}

export function routeAfterPlan({ state }: GraphChannels): "retrieve" | "respond_directly" {
  const plan = requirePlan(state);
  const { useVector, useGraph } = plan.retrievalStrategy;
  return isRetrievalPlan(plan) && (useVector || useGraph) ? "retrieve" : "respond_directly";
}

export function routeAfterFusion({ state }: GraphChannels): "synthesize" | "respond_directly" {
  return state.ranked.length > 0 ? "synthesize" : "respond_directly";
}

export function buildAnswerGraph(components: PipelineComponents, hooks: PipelineHooks = {}) {
  const logger = hooks.logger ?? componentLogger("pipeline");

  return new StateGraph(PipelineAnnotation)
    .addNode("plan", async ({ state }: GraphChannels) => {
      const plan = await components.planner.plan(state.request.query, state.context);
      return { state: setPlan(state, plan) } satisfies GraphChannels;
    })
    .addNode("retrieve", async ({ state }: GraphChannels) => {
      const outcome = await components.coordinator.retrieve(requirePlan(state));
      return { state: setRetrieval(state, outcome) } satisfies GraphChannels;
    })
    .addNode("fuse", async ({ state }: GraphChannels) => {
      const ranked = await components.fuser.fuse(state.vectorItems, state.graphItems, requirePlan(state).rawQuery);
      return { state: setRanked(state, ranked) } satisfies GraphChannels;
    })
    .addNode("synthesize", async ({ state }: GraphChannels) => {
      const synthesis = await components.synthesizer.synthesize(
        state.request.query,
        state.ranked,
        state.context,
        hooks.onDelta
      );
      return { state: setSynthesis(state, synthesis) } satisfies GraphChannels;
    })
    .addNode("respond_directly", ({ state }: GraphChannels) => {
      return { state: setSynthesis(state, directResponse(state)) } satisfies GraphChannels;
    })
    .addNode("validate", async ({ state }: GraphChannels) => {
      const plan = requirePlan(state);
      const verdict = await components.gate.validate(
        state.request.query,
        plan,
        state.synthesis ?? rejectionResult(),
        evidenceCounts(state.vectorItems, state.graphItems),
        state.ranked
      );
      logger.info("pipeline:validated", {
        intent: plan.intent,
        outcome: verdict.outcome,
        check: verdict.failedCheck
      });
      return { state: setVerdict(state, verdict) } satisfies GraphChannels;
    })
    .addEdge(START, "plan")
    .addConditionalEdges("plan", routeAfterPlan, ["retrieve", "respond_directly"])
    .addEdge("retrieve", "fuse")
    .addConditionalEdges("fuse", routeAfterFusion, ["synthesize", "respond_directly"])
    .addEdge("synthesize", "validate")
    .addEdge("respond_directly", "validate")
    .addEdge("validate", END);
}

export async function runAnswerGraph(
  initialState: PipelineState,
  components: PipelineComponents,
  hooks: PipelineHooks = {}
): Promise<PipelineState> {
  const app = buildAnswerGraph(components, hooks).compile();
  const result = await app.invoke({ state: initialState });
  return result.state;
}
