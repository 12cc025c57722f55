import { normalizeWhitespace } from "../utils";
import type { SmallTalkIntent } from "./types";

export type SmallTalkKind = "greeting" | "thanks" | "farewell" | "acknowledgement";

interface SmallTalkPattern {
  kind: SmallTalkKind;
  intent: SmallTalkIntent;
  pattern: RegExp;
}

const TRAILER = String.raw`(?:\s+(?:there|everyone|all|again|so much|a lot))?\s*[!.?]*\s*$`;

const SMALL_TALK_PATTERNS: SmallTalkPattern[] = [
  {
    kind: "greeting",
    intent: "greeting",
    pattern: new RegExp(String.raw`^(?:hi|hello|hey|hiya|howdy|greetings|good (?:morning|afternoon|evening))` + TRAILER)
  },
  {
    kind: "thanks",
    intent: "greeting",
    pattern: new RegExp(String.raw`^(?:thanks|thank you|thx|cheers|much appreciated)` + TRAILER)
  },
  {
    kind: "farewell",
    intent: "greeting",
    pattern: new RegExp(String.raw`^(?:bye|goodbye|good bye|see you|see ya|take care)` + TRAILER)
  },
  {
    kind: "acknowledgement",
    intent: "conversational",
    pattern: new RegExp(String.raw`^(?:ok|okay|k|cool|great|nice|got it|sounds good|hmm+|alright)` + TRAILER)
  }
];

export interface OutOfScopeCategory {
  category: "arithmetic" | "coding" | "weather" | "current_events";
  reason: string;
  patterns: RegExp[];
}

export const OUT_OF_SCOPE_CATEGORIES: OutOfScopeCategory[] = [
  {
    category: "arithmetic",
    reason: "Arithmetic and math problems are outside the knowledge base.",
    patterns: [
      // The whole question is an expression, optionally behind a short lead-in.
      /^(?:(?:what(?:'s|\s+is)|how much is|calculate|compute|evaluate)\s+)?[\d\s.()]*\d\s*[-+*/×÷^x]\s*[\d\s.()+\-*/×÷^x]*[?=]?$/,
      /\b(?:solve for|square root of|derivative of|integral of)\b/,
      /\b(?:algebra|calculus|trigonometry)\b/
    ]
  },
  {
    category: "coding",
    reason: "Programming help is outside the knowledge base.",
    patterns: [
      /\b(?:write|debug|fix|refactor|implement)\b.*\b(?:code|function|script|program|regex|class|sql query)\b/,
      /\b(?:python|javascript|typescript|java|c\+\+|rust|golang)\s+(?:code|function|script|snippet|error)\b/,
      /```/
    ]
  },
  {
    category: "weather",
    reason: "Weather questions are outside the knowledge base.",
    patterns: [/\b(?:weather|forecast|will it rain|is it raining|temperature outside)\b/]
  },
  {
    category: "current_events",
    reason: "Current events and live data are outside the knowledge base.",
    patterns: [
      /\b(?:latest news|breaking news|current events|today'?s news|headlines today)\b/,
      /\b(?:stock price|share price|exchange rate|bitcoin price)\b/,
      /\bwho won (?:the )?(?:game|match|election) (?:yesterday|today|last night)\b/
    ]
  }
];

const FOLLOW_UP_PATTERNS: RegExp[] = [
  /^(?:and|also|but|so)\b/,
  /\b(?:tell me more|more about (?:that|this|it)|what about|how about|elaborate|go on|expand on that)\b/,
  /\b(?:he|she|they|him|her|them|his|their|it|its|that|this|those|these)\b/
];

const REPLIES: Record<SmallTalkKind, string> = {
  greeting: "Hello! Ask me anything about the topics covered in the knowledge base.",
  thanks: "You're welcome! Let me know if there's anything else you'd like to know.",
  farewell: "Goodbye! Come back any time you have another question.",
  acknowledgement: "Sure. What would you like to know next?"
};

export const SMALL_TALK_REPLIES: ReadonlySet<string> = new Set(Object.values(REPLIES));

export function normalizeQuery(query: string): string {
  return normalizeWhitespace(query).toLowerCase();
}

export function matchSmallTalk(query: string): SmallTalkPattern | null {
  const normalized = normalizeQuery(query);
  if (normalized.length === 0) {
    return null;
  }
  return SMALL_TALK_PATTERNS.find(({ pattern }) => pattern.test(normalized)) ?? null;
}

/** Deterministic check shared by the planner fast path and the validation gate. */
export function isVerifiedSmallTalk(query: string): boolean {
  return matchSmallTalk(query) !== null;
}

export function smallTalkReply(kind: SmallTalkKind): string {
  return REPLIES[kind];
}

export function matchOutOfScope(query: string): OutOfScopeCategory | null {
  const normalized = normalizeQuery(query);
  return OUT_OF_SCOPE_CATEGORIES.find(({ patterns }) => patterns.some((pattern) => pattern.test(normalized))) ?? null;
}

export function looksLikeFollowUp(query: string): boolean {
  const normalized = normalizeQuery(query);
  return FOLLOW_UP_PATTERNS.some((pattern) => pattern.test(normalized));
}
