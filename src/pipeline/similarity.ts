import type { TextGenerator } from "../llm/client";

export interface Vectorizer {
  vectorize(texts: string[]): Promise<number[][]>;
}

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "has", "have", "he", "her", "his", "in",
  "is", "it", "its", "of", "on", "or", "she", "that", "the", "their", "they", "this", "to", "was", "were",
  "what", "which", "who", "will", "with"
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 1 && !STOPWORDS.has(token));
}

export function cosine(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    dot += a[index] * b[index];
    normA += a[index] * a[index];
    normB += b[index] * b[index];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Term-frequency vectors over the shared vocabulary of the batch. */
export class LexicalVectorizer implements Vectorizer {
  async vectorize(texts: string[]): Promise<number[][]> {
    const tokenized = texts.map(tokenize);
    const vocabulary = [...new Set(tokenized.flat())].sort();
    const position = new Map(vocabulary.map((term, index) => [term, index]));
    return tokenized.map((tokens) => {
      const vector = new Array<number>(vocabulary.length).fill(0);
      for (const token of tokens) {
        const index = position.get(token);
        if (index !== undefined) {
          vector[index] += 1;
        }
      }
      return vector;
    });
  }
}

export class EmbeddingVectorizer implements Vectorizer {
  constructor(private readonly llm: TextGenerator) {}

  vectorize(texts: string[]): Promise<number[][]> {
    return this.llm.embed(texts);
  }
}
