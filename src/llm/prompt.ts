import type { ChatMessage } from "./client";
import type { ConversationTurn } from "../pipeline/types";

export const DECLINE_SENTINEL = "INSUFFICIENT_CONTEXT";

export function buildSystemPrompt(): string {
  return "You answer questions strictly from a private knowledge base of indexed documents. Be factual and concise. Never rely on general knowledge that the provided context does not contain.";
}

function formatContext(context: ConversationTurn[]): string {
  if (context.length === 0) {
    return "(no previous turns)";
  }
  return context.map((turn) => `${turn.role.toUpperCase()}: ${turn.content}`).join("\n");
}

export function buildRelevanceMessages(query: string, context: ConversationTurn[]): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt() },
    {
      role: "user",
      content: [
        "Decide whether the question below could plausibly be answered by a knowledge base of long-form documents",
        "(talks, interviews, articles) about people, ideas, practices and events they discuss.",
        "Questions that only look topical (generic advice, trivia, tasks) count as relevant only if such documents would plausibly discuss them.",
        "When unsure, answer relevant=true: retrieval will decide.",
        "Respond with a JSON object: {\"relevant\": boolean, \"reason\": string, \"confidence\": number between 0 and 1}.",
        "",
        "Recent conversation:",
        formatContext(context),
        "",
        `Question: ${query}`
      ].join("\n")
    }
  ];
}

export function buildClassificationMessages(query: string, context: ConversationTurn[]): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt() },
    {
      role: "user",
      content: [
        "Classify the question for retrieval planning. Respond with a JSON object:",
        "{",
        '  "intent": "knowledge_query" | "definition" | "comparison" | "causal" | "multi_entity" | "cross_episode",',
        '  "complexity": "simple" | "moderate" | "complex",',
        '  "entities": ["named people, concepts or works mentioned"],',
        '  "crossDocument": true if the question asks what recurs or is shared across many documents',
        "}",
        "simple = one entity or fact; moderate = a comparison or relationship between two entities;",
        "complex = several entities, multi-step reasoning or aggregation across documents.",
        "Every question is a knowledge question; never classify it as a greeting.",
        "",
        "Recent conversation:",
        formatContext(context),
        "",
        `Question: ${query}`
      ].join("\n")
    }
  ];
}

export function buildDecompositionMessages(query: string, entities: readonly string[]): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt() },
    {
      role: "user",
      content: [
        "Split the question into 2 to 4 standalone sub-questions that together cover it.",
        'Respond with a JSON object: {"subQueries": ["..."]}.',
        entities.length > 0 ? `Entities: ${entities.join(", ")}` : "",
        `Question: ${query}`
      ]
        .filter((line) => line.length > 0)
        .join("\n")
    }
  ];
}

export function buildExpansionMessages(query: string, count: number): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt() },
    {
      role: "user",
      content: [
        `Write ${count} alternative phrasings of the search query using synonyms and related terms.`,
        "Keep every named entity. Do not answer the query.",
        'Respond with a JSON object: {"variants": ["..."]}.',
        `Query: ${query}`
      ].join("\n")
    }
  ];
}

export function buildEntityMatchMessages(entities: readonly string[], candidates: readonly string[]): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt() },
    {
      role: "user",
      content: [
        "Match each mention to the knowledge-graph node it most likely refers to.",
        "Only use names from the candidate list; leave out mentions without a plausible match.",
        'Respond with a JSON object: {"matches": [{"surface": "mention", "canonical": "candidate name"}]}.',
        `Mentions: ${JSON.stringify(entities)}`,
        `Candidates: ${JSON.stringify(candidates)}`
      ].join("\n")
    }
  ];
}

export function buildSynthesisMessages(query: string, evidence: string, context: ConversationTurn[]): ChatMessage[] {
  return [
    {
      role: "system",
      content: [
        buildSystemPrompt(),
        "Use only the numbered context passages. Cite every fact with its passage number in square brackets, e.g. [2].",
        `If the passages do not answer the question, reply with exactly ${DECLINE_SENTINEL} and nothing else.`
      ].join(" ")
    },
    {
      role: "user",
      content: [
        "Recent conversation:",
        formatContext(context),
        "",
        "Context passages:",
        evidence,
        "",
        `Question: ${query}`
      ].join("\n")
    }
  ];
}

export function buildSelfCheckMessages(
  query: string,
  answer: string,
  counts: { vector: number; graph: number },
  excerpts: string[]
): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt() },
    {
      role: "user",
      content: [
        "Judge whether the answer is supported by the retrieved evidence.",
        'Respond with a JSON object: {"supported": boolean, "confidence": number between 0 and 1, "reason": string}.',
        `Evidence counts: ${counts.vector} passages, ${counts.graph} graph facts.`,
        "Evidence excerpts:",
        excerpts.length > 0 ? excerpts.map((excerpt, index) => `- (${index + 1}) ${excerpt}`).join("\n") : "(none)",
        "",
        `Question: ${query}`,
        `Answer: ${answer}`
      ].join("\n")
    }
  ];
}
