import { uniqueStrings } from "../utils";

const LEADING_STOPWORDS = new Set([
  "a",
  "an",
  "and",
  "are",
  "can",
  "compare",
  "could",
  "define",
  "describe",
  "did",
  "do",
  "does",
  "explain",
  "how",
  "i",
  "in",
  "is",
  "tell",
  "the",
  "what",
  "when",
  "where",
  "which",
  "who",
  "whom",
  "why",
  "would"
]);

const CAPITALIZED_RUN = /\b[A-Z][\w'’-]*(?:\s+(?:of|the|de|van|von)?\s*[A-Z][\w'’-]*)*/g;
const QUOTED = /["“]([^"”]{2,80})["”]/g;

function stripLeadingStopwords(phrase: string): string {
  const words = phrase.split(/\s+/);
  while (words.length > 0 && LEADING_STOPWORDS.has(words[0].toLowerCase())) {
    words.shift();
  }
  return words.join(" ").replace(/['’]s$/, "");
}

/** Deterministic surface-form extraction: quoted phrases and capitalized runs. */
export function extractEntities(text: string): string[] {
  const found: string[] = [];
  for (const match of text.matchAll(QUOTED)) {
    found.push(match[1]);
  }
  for (const match of text.matchAll(CAPITALIZED_RUN)) {
    const phrase = stripLeadingStopwords(match[0]);
    if (phrase.length > 0) {
      found.push(phrase);
    }
  }
  return uniqueStrings(found);
}

/** Strips the question framing so the remaining topic can seed sub-queries. */
export function questionTopic(query: string): string {
  return query
    .replace(/[?!.]+\s*$/, "")
    .replace(/^(?:what|who|how|why|when|where|which)\s+(?:is|are|was|were|does|do|did)\s+/i, "")
    .replace(/^(?:tell me about|explain|describe|define)\s+/i, "")
    .trim();
}

const KEYWORD_STOPWORDS = new Set([
  "about",
  "does",
  "from",
  "have",
  "into",
  "many",
  "more",
  "most",
  "much",
  "should",
  "some",
  "that",
  "their",
  "there",
  "these",
  "they",
  "this",
  "what",
  "when",
  "where",
  "which",
  "while",
  "with",
  "would",
  "your"
]);

/** Lower-cased content words, used as graph search terms when no entity was named. */
export function keywordTerms(query: string): string[] {
  const words = query.toLowerCase().match(/[a-z][a-z'-]{3,}/g) ?? [];
  return [...new Set(words.filter((word) => !KEYWORD_STOPWORDS.has(word)))];
}
