import type { AppConfig } from "./env";

export type FusionStrategy = "rrf" | "mmr" | "hybrid";

export interface FusionOptions {
  strategy: FusionStrategy;
  rrfK: number;
  mmrLambda: number;
  mmrWindow: number;
  dedupPrefixLength: number;
}

export interface PipelineConfig {
  planner: {
    contextTurns: number;
    classifierTimeoutMs: number;
  };
  retrieval: {
    vectorTopK: number;
    graphTopK: number;
    expansionConcurrency: number;
    maxExpansionVariants: number;
    maxHops: number;
    timeoutMs: number;
  };
  fusion: FusionOptions;
  synthesis: {
    maxVectorEvidence: number;
    maxGraphEvidence: number;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  validation: {
    selfCheckThreshold: number;
    timeoutMs: number;
  };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  planner: {
    contextTurns: 6,
    classifierTimeoutMs: 10_000
  },
  retrieval: {
    vectorTopK: 10,
    graphTopK: 10,
    expansionConcurrency: 5,
    maxExpansionVariants: 5,
    maxHops: 3,
    timeoutMs: 8_000
  },
  fusion: {
    strategy: "hybrid",
    rrfK: 60,
    mmrLambda: 0.5,
    mmrWindow: 20,
    dedupPrefixLength: 200
  },
  synthesis: {
    maxVectorEvidence: 5,
    maxGraphEvidence: 10,
    temperature: 0.4,
    maxTokens: 900,
    timeoutMs: 30_000
  },
  validation: {
    selfCheckThreshold: 0.7,
    timeoutMs: 10_000
  }
};

export function toPipelineConfig(config: AppConfig): PipelineConfig {
  return {
    planner: {
      ...DEFAULT_PIPELINE_CONFIG.planner,
      contextTurns: config.CONTEXT_TURNS
    },
    retrieval: {
      ...DEFAULT_PIPELINE_CONFIG.retrieval,
      vectorTopK: config.VECTOR_TOP_K,
      graphTopK: config.GRAPH_TOP_K,
      expansionConcurrency: config.EXPANSION_CONCURRENCY,
      maxHops: config.MAX_HOPS,
      timeoutMs: config.RETRIEVAL_TIMEOUT_MS
    },
    fusion: {
      ...DEFAULT_PIPELINE_CONFIG.fusion,
      strategy: config.FUSION_STRATEGY,
      rrfK: config.RRF_K,
      mmrLambda: config.MMR_LAMBDA,
      mmrWindow: config.MMR_WINDOW
    },
    synthesis: {
      ...DEFAULT_PIPELINE_CONFIG.synthesis,
      timeoutMs: config.SYNTHESIS_TIMEOUT_MS
    },
    validation: {
      selfCheckThreshold: config.SELF_CHECK_THRESHOLD,
      timeoutMs: config.VALIDATION_TIMEOUT_MS
    }
  };
}
