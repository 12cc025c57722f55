import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/pipeline";
import { SynthesisFailure, describeError } from "../errors";
import type { TextGenerator } from "../llm/client";
import { DECLINE_SENTINEL, buildSynthesisMessages } from "../llm/prompt";
import { componentLogger, type AppLogger } from "../logger";
import { withTimeout } from "../utils";
import { documentLabel, formatLocator, speakerLabel, toCitation } from "./citations";
import { tokenize } from "./similarity";
import { rejectionResult, type Citation, type ConversationTurn, type RankedItem, type SynthesisResult } from "./types";

type SynthesisConfig = PipelineConfig["synthesis"];

export type DeltaHandler = (text: string) => void;

const MIN_SHARED_TERMS = 3;

/** Top items in fused order, capped per source. */
export function selectEvidence(ranked: readonly RankedItem[], maxVector: number, maxGraph: number): RankedItem[] {
  let vector = 0;
  let graph = 0;
  return ranked.filter((item) => {
    if (item.sourceType === "vector") {
      vector += 1;
      return vector <= maxVector;
    }
    graph += 1;
    return graph <= maxGraph;
  });
}

export function formatEvidence(evidence: readonly RankedItem[]): string {
  return evidence
    .map((item, index) => {
      const header =
        item.sourceType === "vector"
          ? `[${index + 1}] passage | ${documentLabel(item.provenance)} | ${formatLocator(item.provenance)} | ${speakerLabel(item.provenance)}`
          : `[${index + 1}] graph | ${documentLabel(item.provenance)} | ${formatLocator(item.provenance)}`;
      return `${header}\n${item.content}`;
    })
    .join("\n\n");
}

/** 1-based passage numbers cited as [n] or [n, m], in order of first appearance. */
export function extractCitationMarkers(answer: string, evidenceCount: number): number[] {
  const markers: number[] = [];
  for (const match of answer.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const part of match[1].split(",")) {
      const marker = Number(part.trim());
      if (marker >= 1 && marker <= evidenceCount && !markers.includes(marker)) {
        markers.push(marker);
      }
    }
  }
  return markers;
}

export function isDecline(text: string): boolean {
  return text.trim().length === 0 || text.includes(DECLINE_SENTINEL);
}

export function buildCitations(answer: string, evidence: readonly RankedItem[]): Citation[] {
  const topScore = evidence.reduce((max, item) => Math.max(max, item.fusionScore), 0);
  let used = extractCitationMarkers(answer, evidence.length).map((marker) => evidence[marker - 1]);

  if (used.length === 0) {
    const answerTerms = new Set(tokenize(answer));
    // Without markers, only evidence the answer shares terms with is cited.
    used = evidence.filter((item) => tokenize(item.content).filter((term) => answerTerms.has(term)).length >= MIN_SHARED_TERMS);
  }

  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const item of used) {
    const citation = toCitation(item, topScore);
    const key = `${citation.sourceType}|${citation.documentLabel}|${citation.locator}`;
    if (!seen.has(key)) {
      seen.add(key);
      citations.push(citation);
    }
  }
  return citations;
}

export interface SynthesizerOptions {
  config?: SynthesisConfig;
  logger?: AppLogger;
}

export class Synthesizer {
  private readonly config: SynthesisConfig;

  private readonly logger: AppLogger;

  constructor(
    private readonly llm: TextGenerator,
    { config = DEFAULT_PIPELINE_CONFIG.synthesis, logger }: SynthesizerOptions = {}
  ) {
    this.config = config;
    this.logger = logger ?? componentLogger("synthesizer");
  }

  async synthesize(
    query: string,
    topRanked: readonly RankedItem[],
    context: ConversationTurn[],
    onDelta?: DeltaHandler
  ): Promise<SynthesisResult> {
    if (topRanked.length === 0) {
      return rejectionResult();
    }

    const evidence = selectEvidence(topRanked, this.config.maxVectorEvidence, this.config.maxGraphEvidence);
    const messages = buildSynthesisMessages(query, formatEvidence(evidence), context);

    const controller = new AbortController();
    let answer: string;
    try {
      answer = onDelta
        ? await withTimeout(this.streamGuarded(messages, onDelta, controller.signal), this.config.timeoutMs, "synthesis")
        : await this.llm.complete(messages, {
            operation: "synthesis",
            temperature: this.config.temperature,
            maxTokens: this.config.maxTokens,
            timeoutMs: this.config.timeoutMs
          });
    } catch (error) {
      controller.abort();
      throw new SynthesisFailure(`Answer generation failed: ${describeError(error)}`, error);
    }

    if (isDecline(answer)) {
      this.logger.info("synthesis:declined", { evidence: evidence.length });
      return rejectionResult();
    }

    const answerText = answer.trim();
    const citations = buildCitations(answerText, evidence);
    this.logger.info("synthesis:answered", { evidence: evidence.length, citations: citations.length });
    return { answerText, citations, grounded: true };
  }

  // Output is held back until it cannot be the decline sentinel, so a decline is never streamed.
  private async streamGuarded(
    messages: ReturnType<typeof buildSynthesisMessages>,
    onDelta: DeltaHandler,
    signal: AbortSignal
  ): Promise<string> {
    let full = "";
    let pending = "";
    let state: "undecided" | "released" | "declined" = "undecided";

    for await (const delta of this.llm.stream(messages, {
      operation: "synthesis",
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
      timeoutMs: this.config.timeoutMs,
      signal
    })) {
      // Leaving the loop closes the iterator, which releases the upstream stream.
      if (signal.aborted) {
        break;
      }
      full += delta;
      if (state === "released") {
        onDelta(delta);
        continue;
      }
      if (state === "declined") {
        continue;
      }
      pending += delta;
      const head = pending.trimStart();
      if (head.startsWith(DECLINE_SENTINEL)) {
        state = "declined";
      } else if (!DECLINE_SENTINEL.startsWith(head)) {
        state = "released";
        onDelta(pending);
      }
    }

    if (state === "undecided" && pending.trim().length > 0 && !signal.aborted) {
      onDelta(pending);
    }
    return full;
  }
}
