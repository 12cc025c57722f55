import { describe, expect, it } from "vitest";
import { DEFAULT_PIPELINE_CONFIG } from "../../config/pipeline";
import { SynthesisFailure } from "../../errors";
import type { ChatMessage, CompletionOptions, TextGenerator } from "../../llm/client";
import { Synthesizer, extractCitationMarkers, selectEvidence } from "../../pipeline/synthesizer";
import { CANONICAL_REJECTION, type Provenance, type RankedItem, type SourceType } from "../../pipeline/types";
import { FakeTextGenerator, delay } from "../fakes";

function ranked(sourceType: SourceType, content: string, fusionScore: number, provenance: Provenance): RankedItem {
  return { sourceType, content, relevanceScore: 1, fusionScore, provenance, provenances: [provenance] };
}

const TALK = ranked("vector", "Deep work is professional activity performed in a state of distraction-free concentration.", 0.04, {
  documentId: "ep-1",
  documentTitle: "Deep Work Talk",
  locator: 125,
  speaker: "SPEAKER_00"
});

// Emits one chunk per interval and records how far the consumer read.
class SlowStream implements TextGenerator {
  pulled = 0;

  signal: AbortSignal | undefined;

  constructor(
    private readonly chunks: string[],
    private readonly intervalMs: number
  ) {}

  async complete(): Promise<string> {
    return this.chunks.join("");
  }

  async *stream(_messages: ChatMessage[], options: CompletionOptions): AsyncIterable<string> {
    this.signal = options.signal;
    for (const chunk of this.chunks) {
      await delay(this.intervalMs);
      this.pulled += 1;
      yield chunk;
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map(() => [1]);
  }
}

const PATH = ranked("graph", "Deep Work -[CAUSES]- Productivity", 0.02, {
  documentId: "ep-2",
  documentIds: ["ep-2"],
  relationPath: ["CAUSES"],
  hopCount: 1
});

describe("Synthesizer", () => {
  it("rejects without calling the model when there is no evidence", async () => {
    const llm = new FakeTextGenerator();
    const result = await new Synthesizer(llm).synthesize("What is deep work?", [], []);

    expect(result).toEqual({ answerText: CANONICAL_REJECTION, citations: [], grounded: false });
    expect(llm.calls).toHaveLength(0);
  });

  it("maps passage markers to citations of the evidence", async () => {
    const llm = new FakeTextGenerator({
      synthesis: "  Deep work is distraction-free concentration [1]. It drives productivity [2].  "
    });
    const result = await new Synthesizer(llm).synthesize("What is deep work?", [TALK, PATH], []);

    expect(result.grounded).toBe(true);
    expect(result.answerText).toBe("Deep work is distraction-free concentration [1]. It drives productivity [2].");
    expect(result.citations).toEqual([
      { sourceType: "vector", documentLabel: "Deep Work Talk", locator: "00:02:05", speakerLabel: "Speaker 1", confidence: 1 },
      { sourceType: "graph", documentLabel: "Ep 2", locator: "1-hop path via CAUSES", speakerLabel: "Unknown speaker", confidence: 0.5 }
    ]);
  });

  it("numbers the evidence in the prompt in fused order", async () => {
    const llm = new FakeTextGenerator({ synthesis: "Deep work matters [1]." });
    await new Synthesizer(llm).synthesize("What is deep work?", [TALK, PATH], []);

    const prompt = llm.calls[0].messages[1].content;
    expect(prompt).toContain("[1] passage | Deep Work Talk | 00:02:05 | Speaker 1\n" + TALK.content);
    expect(prompt).toContain("[2] graph | Ep 2 | 1-hop path via CAUSES\n" + PATH.content);
  });

  it("cites overlapping evidence when the answer carries no markers", async () => {
    const llm = new FakeTextGenerator({ synthesis: "Deep work causes productivity gains." });
    const result = await new Synthesizer(llm).synthesize("What does deep work cause?", [TALK, PATH], []);

    expect(result.citations.map((citation) => citation.documentLabel)).toEqual(["Ep 2"]);
  });

  it("leaves an answer without markers or shared terms uncited", async () => {
    const llm = new FakeTextGenerator({ synthesis: "Bananas grow well in tropical climates." });
    const result = await new Synthesizer(llm).synthesize("What is deep work?", [TALK, PATH], []);

    expect(result).toEqual({ answerText: "Bananas grow well in tropical climates.", citations: [], grounded: true });
  });

  it("only cites evidence it was given", async () => {
    const llm = new FakeTextGenerator({ synthesis: "Deep work matters [1][7]." });
    const result = await new Synthesizer(llm).synthesize("What is deep work?", [TALK], []);

    expect(result.citations.map((citation) => citation.documentLabel)).toEqual(["Deep Work Talk"]);
  });

  it("turns the decline marker into the canonical rejection", async () => {
    const llm = new FakeTextGenerator({ synthesis: "INSUFFICIENT_CONTEXT" });
    const result = await new Synthesizer(llm).synthesize("Who founded the company?", [TALK], []);

    expect(result).toEqual({ answerText: CANONICAL_REJECTION, citations: [], grounded: false });
  });

  it("streams answer text as it arrives", async () => {
    const llm = new FakeTextGenerator({ synthesis: ["Deep ", "work [1]."] });
    const deltas: string[] = [];
    const result = await new Synthesizer(llm).synthesize("What is deep work?", [TALK], [], (text) => deltas.push(text));

    expect(deltas).toEqual(["Deep ", "work [1]."]);
    expect(result.answerText).toBe("Deep work [1].");
  });

  it("never streams a decline", async () => {
    const llm = new FakeTextGenerator({ synthesis: ["INSUFF", "ICIENT_CONTEXT"] });
    const deltas: string[] = [];
    const result = await new Synthesizer(llm).synthesize("Who founded it?", [TALK], [], (text) => deltas.push(text));

    expect(deltas).toEqual([]);
    expect(result.grounded).toBe(false);
  });

  it("releases held-back text once it cannot be a decline", async () => {
    const llm = new FakeTextGenerator({ synthesis: ["IN", "SIGHT matters [1]."] });
    const deltas: string[] = [];
    await new Synthesizer(llm).synthesize("What matters?", [TALK], [], (text) => deltas.push(text));

    expect(deltas).toEqual(["INSIGHT matters [1]."]);
  });

  it("surfaces generation errors as retryable synthesis failures", async () => {
    const llm = new FakeTextGenerator({
      synthesis: () => {
        throw new Error("service unavailable");
      }
    });
    const failure = await new Synthesizer(llm).synthesize("What is deep work?", [TALK], []).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SynthesisFailure);
    expect(failure).toMatchObject({ retryable: true, code: "SYNTHESIS_FAILURE" });
  });

  it("stops reading the stream once generation times out", async () => {
    const llm = new SlowStream(["Deep ", "work ", "is ", "focused ", "effort ", "[1]."], 60);
    const synthesizer = new Synthesizer(llm, { config: { ...DEFAULT_PIPELINE_CONFIG.synthesis, timeoutMs: 150 } });
    const deltas: string[] = [];

    const failure = await synthesizer
      .synthesize("What is deep work?", [TALK], [], (text) => deltas.push(text))
      .catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(SynthesisFailure);
    expect(llm.signal?.aborted).toBe(true);

    const deliveredAtTimeout = deltas.length;
    await delay(400);
    expect(deltas).toHaveLength(deliveredAtTimeout);
    expect(llm.pulled).toBeLessThanOrEqual(3);
  });
});

describe("synthesis helpers", () => {
  it("caps evidence per source while keeping order", () => {
    const vector = Array.from({ length: 7 }, (_, index) => ranked("vector", `passage ${index}`, 1, { documentId: `v${index}` }));
    const graph = Array.from({ length: 12 }, (_, index) => ranked("graph", `fact ${index}`, 1, { documentId: `g${index}` }));
    const selected = selectEvidence([...vector, ...graph], 5, 10);

    expect(selected.filter((item) => item.sourceType === "vector")).toHaveLength(5);
    expect(selected.filter((item) => item.sourceType === "graph")).toHaveLength(10);
    expect(selected[0].content).toBe("passage 0");
  });

  it("reads grouped markers in order of first appearance", () => {
    expect(extractCitationMarkers("A [2, 1]. B [2]. C [3].", 2)).toEqual([2, 1]);
  });
});
