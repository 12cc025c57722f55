import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/pipeline";
import { UpstreamTimeoutError, ValidationFailure, describeError } from "../errors";
import { completeJson, type TextGenerator } from "../llm/client";
import { buildSelfCheckMessages } from "../llm/prompt";
import { componentLogger, type AppLogger } from "../logger";
import { SelfCheckSchema, type SelfCheckJudgement } from "../parsers/model-output";
import { withTimeout } from "../utils";
import { SMALL_TALK_REPLIES, isVerifiedSmallTalk } from "./patterns";
import {
  CANONICAL_REJECTION,
  rejectionResult,
  type EvidenceCounts,
  type GateVerdict,
  type QueryPlan,
  type RankedItem,
  type RejectionCheck,
  type SynthesisResult
} from "./types";

type ValidationConfig = PipelineConfig["validation"];

const EXCERPT_LENGTH = 240;
const MAX_EXCERPTS = 5;

function hasNoEvidence(counts: EvidenceCounts): boolean {
  return counts.vector === 0 && counts.graph === 0;
}

/** Rejection text and canned small-talk replies carry no claims to check. */
export function isTrivialAnswer(answerText: string): boolean {
  return answerText === CANONICAL_REJECTION || SMALL_TALK_REPLIES.has(answerText);
}

export interface ValidationGateOptions {
  config?: ValidationConfig;
  logger?: AppLogger;
}

export class ValidationGate {
  private readonly config: ValidationConfig;

  private readonly logger: AppLogger;

  constructor(
    private readonly llm: TextGenerator | null,
    { config = DEFAULT_PIPELINE_CONFIG.validation, logger }: ValidationGateOptions = {}
  ) {
    this.config = config;
    this.logger = logger ?? componentLogger("validation");
  }

  /**
   * Final checkpoint for every request. The greeting exemption is decided
   * here from the query text alone, whatever the plan says.
   */
  async validate(
    query: string,
    plan: QueryPlan,
    result: SynthesisResult,
    counts: EvidenceCounts,
    evidence: readonly RankedItem[] = []
  ): Promise<GateVerdict> {
    const smallTalk = isVerifiedSmallTalk(query);

    if (hasNoEvidence(counts) && !smallTalk) {
      return this.reject(
        "grounding_evidence",
        plan.intent === "out_of_scope" ? plan.rejectionReason : "No retrieved evidence supports an answer."
      );
    }

    if (hasNoEvidence(counts) && result.citations.length === 0 && !isTrivialAnswer(result.answerText)) {
      return this.reject("citation_presence", "Answer has no citations and no evidence.");
    }

    if (!result.grounded) {
      return this.reject("synthesis_declined", "The evidence did not answer the question.");
    }

    if (smallTalk || isTrivialAnswer(result.answerText)) {
      return this.accept(result);
    }

    const judgement = await this.selfCheck(query, result, counts, evidence);
    if (judgement && !judgement.supported && judgement.confidence > this.config.selfCheckThreshold) {
      return {
        ...this.reject("self_check", judgement.reason || "Answer judged unsupported by the evidence."),
        selfCheck: { supported: judgement.supported, confidence: judgement.confidence }
      };
    }

    return {
      ...this.accept(result),
      selfCheck: judgement ? { supported: judgement.supported, confidence: judgement.confidence } : undefined
    };
  }

  private async selfCheck(
    query: string,
    result: SynthesisResult,
    counts: EvidenceCounts,
    evidence: readonly RankedItem[]
  ): Promise<SelfCheckJudgement | null> {
    if (!this.llm) {
      return null;
    }
    const excerpts = evidence.slice(0, MAX_EXCERPTS).map((item) => item.content.slice(0, EXCERPT_LENGTH));
    try {
      return await withTimeout(
        completeJson(this.llm, buildSelfCheckMessages(query, result.answerText, counts, excerpts), SelfCheckSchema, {
          operation: "self_check",
          temperature: 0,
          maxTokens: 200,
          timeoutMs: this.config.timeoutMs
        }),
        this.config.timeoutMs,
        "self-check"
      );
    } catch (error) {
      if (error instanceof UpstreamTimeoutError) {
        throw new ValidationFailure(`Answer validation timed out: ${error.message}`, error);
      }
      this.logger.warn("validation:self_check_skipped", { error: describeError(error) });
      return null;
    }
  }

  private accept(result: SynthesisResult): GateVerdict {
    this.logger.info("validation:accepted", { citations: result.citations.length });
    return { outcome: "ACCEPTED", result };
  }

  private reject(check: RejectionCheck, reason: string): GateVerdict {
    this.logger.info("validation:rejected", { check, reason });
    return { outcome: "REJECTED", result: rejectionResult(), failedCheck: check, reason };
  }
}
