import { describe, expect, it } from "vitest";
import { ValidationFailure } from "../../errors";
import type { TextGenerator } from "../../llm/client";
import { smallTalkReply } from "../../pipeline/patterns";
import { outOfScopePlan } from "../../pipeline/planner";
import { CANONICAL_REJECTION, type QueryPlan, type SynthesisResult } from "../../pipeline/types";
import { ValidationGate, isTrivialAnswer } from "../../pipeline/validation";
import { FakeTextGenerator, supported } from "../fakes";

const DEFINITION_PLAN: QueryPlan = {
  rawQuery: "What is deep work?",
  intent: "definition",
  complexity: "simple",
  entities: [],
  subQueries: [],
  retrievalStrategy: { useVector: true, useGraph: true, expandQuery: false, graphTraversalMode: "entity_centric" },
  isFollowUp: false
};

const GREETING_PLAN: QueryPlan = {
  rawQuery: "Hi",
  intent: "greeting",
  complexity: "simple",
  entities: [],
  subQueries: [],
  retrievalStrategy: { useVector: false, useGraph: false, expandQuery: false, graphTraversalMode: "entity_centric" },
  isFollowUp: false
};

const ANSWER: SynthesisResult = {
  answerText: "Deep work is distraction-free concentration [1].",
  citations: [{ sourceType: "vector", documentLabel: "Deep Work Talk", locator: "00:02:05", speakerLabel: "Speaker 1", confidence: 1 }],
  grounded: true
};

describe("ValidationGate", () => {
  it("rejects any answer without evidence", async () => {
    const llm = new FakeTextGenerator();
    const verdict = await new ValidationGate(llm).validate("What is deep work?", DEFINITION_PLAN, ANSWER, { vector: 0, graph: 0 });

    expect(verdict.outcome).toBe("REJECTED");
    expect(verdict.failedCheck).toBe("grounding_evidence");
    expect(verdict.reason).toBe("No retrieved evidence supports an answer.");
    expect(verdict.result).toEqual({ answerText: CANONICAL_REJECTION, citations: [], grounded: false });
    expect(llm.calls).toHaveLength(0);
  });

  it("reports the planner's reason for out-of-scope questions", async () => {
    const plan = outOfScopePlan("What is 2+2?", "Arithmetic and math problems are outside the knowledge base.");
    const verdict = await new ValidationGate(null).validate("What is 2+2?", plan, ANSWER, { vector: 0, graph: 0 });

    expect(verdict.reason).toBe("Arithmetic and math problems are outside the knowledge base.");
  });

  it("does not trust a greeting label on a real question", async () => {
    const verdict = await new ValidationGate(null).validate("What is deep work?", GREETING_PLAN, ANSWER, { vector: 0, graph: 0 });
    expect(verdict.failedCheck).toBe("grounding_evidence");
  });

  it("accepts verified greetings without evidence or a model call", async () => {
    const llm = new FakeTextGenerator();
    const reply: SynthesisResult = { answerText: smallTalkReply("greeting"), citations: [], grounded: true };
    const verdict = await new ValidationGate(llm).validate("Hi", GREETING_PLAN, reply, { vector: 0, graph: 0 });

    expect(verdict.outcome).toBe("ACCEPTED");
    expect(verdict.result).toEqual(reply);
    expect(llm.calls).toHaveLength(0);
  });

  it("rejects uncited claims made in reply to small talk", async () => {
    const claim: SynthesisResult = { answerText: "Deep work was coined in 2016.", citations: [], grounded: true };
    const verdict = await new ValidationGate(null).validate("Hi", GREETING_PLAN, claim, { vector: 0, graph: 0 });

    expect(verdict.failedCheck).toBe("citation_presence");
    expect(verdict.result.answerText).toBe(CANONICAL_REJECTION);
  });

  it("rejects answers the synthesizer declined", async () => {
    const declined: SynthesisResult = { answerText: CANONICAL_REJECTION, citations: [], grounded: false };
    const verdict = await new ValidationGate(null).validate("What is deep work?", DEFINITION_PLAN, declined, { vector: 2, graph: 0 });

    expect(verdict.failedCheck).toBe("synthesis_declined");
  });

  it("rejects when the self-check is confident the answer is unsupported", async () => {
    const llm = new FakeTextGenerator({ self_check: JSON.stringify({ supported: false, confidence: 0.9 }) });
    const verdict = await new ValidationGate(llm).validate("What is deep work?", DEFINITION_PLAN, ANSWER, { vector: 1, graph: 0 });

    expect(verdict.outcome).toBe("REJECTED");
    expect(verdict.failedCheck).toBe("self_check");
    expect(verdict.reason).toBe("Answer judged unsupported by the evidence.");
    expect(verdict.selfCheck).toEqual({ supported: false, confidence: 0.9 });
  });

  it("keeps the answer when the self-check is unsure", async () => {
    const llm = new FakeTextGenerator({ self_check: JSON.stringify({ supported: false, confidence: 0.6, reason: "hedged" }) });
    const verdict = await new ValidationGate(llm).validate("What is deep work?", DEFINITION_PLAN, ANSWER, { vector: 1, graph: 0 });

    expect(verdict.outcome).toBe("ACCEPTED");
    expect(verdict.result).toEqual(ANSWER);
    expect(verdict.selfCheck).toEqual({ supported: false, confidence: 0.6 });
  });

  it("accepts supported answers", async () => {
    const llm = new FakeTextGenerator({ self_check: supported() });
    const verdict = await new ValidationGate(llm).validate("What is deep work?", DEFINITION_PLAN, ANSWER, { vector: 1, graph: 1 });

    expect(verdict.outcome).toBe("ACCEPTED");
    expect(llm.callsFor("self_check")).toBe(1);
  });

  it("ignores a malformed self-check", async () => {
    const llm = new FakeTextGenerator({ self_check: "maybe?" });
    const verdict = await new ValidationGate(llm).validate("What is deep work?", DEFINITION_PLAN, ANSWER, { vector: 1, graph: 0 });

    expect(verdict.outcome).toBe("ACCEPTED");
    expect(verdict.selfCheck).toBeUndefined();
  });

  it("fails the request when the self-check times out", async () => {
    const stalled: TextGenerator = {
      complete: () => new Promise<string>(() => undefined),
      stream: async function* () {
        yield "";
      },
      embed: async () => []
    };
    const gate = new ValidationGate(stalled, { config: { selfCheckThreshold: 0.7, timeoutMs: 20 } });

    await expect(
      gate.validate("What is deep work?", DEFINITION_PLAN, ANSWER, { vector: 1, graph: 0 })
    ).rejects.toBeInstanceOf(ValidationFailure);
  });
});

describe("isTrivialAnswer", () => {
  it("recognizes the rejection and canned replies", () => {
    expect(isTrivialAnswer(CANONICAL_REJECTION)).toBe(true);
    expect(isTrivialAnswer(smallTalkReply("thanks"))).toBe(true);
    expect(isTrivialAnswer("Deep work is rare.")).toBe(false);
  });
});
