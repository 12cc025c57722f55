import { DEFAULT_PIPELINE_CONFIG, type FusionOptions } from "../config/pipeline";
import { contentKey } from "../utils";
import { LexicalVectorizer, cosine, type Vectorizer } from "./similarity";
import type { Provenance, RankedItem, RetrievedItem } from "./types";

interface FusionGroup {
  primary: RetrievedItem;
  provenances: Readonly<Provenance>[];
  provenanceKeys: Set<string>;
  fusionScore: number;
  order: number;
}

function locatorKey(item: RetrievedItem): string | null {
  const { documentId, locator } = item.provenance;
  return locator === undefined ? null : `${documentId}@${locator}`;
}

function provenanceKey(provenance: Readonly<Provenance>): string {
  return JSON.stringify([
    provenance.documentId,
    provenance.locator ?? null,
    provenance.speaker ?? null,
    provenance.relationPath ?? null
  ]);
}

/**
 * Reciprocal rank fusion with merge-on-duplicate. Items that share a content
 * prefix or a (document, locator) pair collapse into one group. A duplicate
 * within the same list does not take a rank of its own, so repeated entries
 * never inflate a score.
 */
export function reciprocalRankFusion(
  lists: ReadonlyArray<readonly RetrievedItem[]>,
  { rrfK = 60, dedupPrefixLength = 200 }: Partial<Pick<FusionOptions, "rrfK" | "dedupPrefixLength">> = {}
): RankedItem[] {
  const groups: FusionGroup[] = [];
  const index = new Map<string, number>();

  for (const list of lists) {
    const seenInList = new Set<number>();
    let rank = 0;

    for (const item of list) {
      const keys = [`content:${contentKey(item.content, dedupPrefixLength)}`];
      const byLocator = locatorKey(item);
      if (byLocator) {
        keys.push(`locator:${byLocator}`);
      }

      let groupIndex = keys.map((key) => index.get(key)).find((value): value is number => value !== undefined);
      if (groupIndex === undefined) {
        groupIndex = groups.length;
        groups.push({
          primary: item,
          provenances: [item.provenance],
          provenanceKeys: new Set([provenanceKey(item.provenance)]),
          fusionScore: 0,
          order: groupIndex
        });
      } else {
        mergeInto(groups[groupIndex], item);
      }
      for (const key of keys) {
        index.set(key, groupIndex);
      }

      if (!seenInList.has(groupIndex)) {
        seenInList.add(groupIndex);
        rank += 1;
        groups[groupIndex].fusionScore += 1 / (rrfK + rank);
      }
    }
  }

  return groups
    .slice()
    .sort((a, b) => b.fusionScore - a.fusionScore || a.order - b.order)
    .map((group) => ({
      ...group.primary,
      fusionScore: group.fusionScore,
      provenances: group.provenances
    }));
}

function mergeInto(group: FusionGroup, item: RetrievedItem): void {
  const key = provenanceKey(item.provenance);
  const isNewProvenance = !group.provenanceKeys.has(key);
  // Native scores only compare within one source.
  if (item.sourceType === group.primary.sourceType && item.relevanceScore > group.primary.relevanceScore) {
    group.primary = item;
    if (isNewProvenance) {
      group.provenances = [item.provenance, ...group.provenances];
    } else {
      group.provenances = [item.provenance, ...group.provenances.filter((entry) => provenanceKey(entry) !== key)];
    }
  } else if (isNewProvenance) {
    group.provenances = [...group.provenances, item.provenance];
  }
  group.provenanceKeys.add(key);
}

/**
 * Greedy maximal marginal relevance. The first pick is the most relevant item;
 * each later pick maximizes lambda * relevance - (1 - lambda) * max similarity
 * to what is already selected. Ties go to the earlier candidate.
 */
export function maximalMarginalRelevance(
  candidates: readonly RankedItem[],
  relevance: readonly number[],
  vectors: readonly number[][],
  lambda: number
): RankedItem[] {
  const remaining = candidates.map((_, position) => position);
  const selected: number[] = [];
  const result: RankedItem[] = [];

  while (remaining.length > 0) {
    let bestSlot = 0;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (let slot = 0; slot < remaining.length; slot += 1) {
      const candidate = remaining[slot];
      const redundancy =
        selected.length === 0 ? 0 : Math.max(...selected.map((chosen) => cosine(vectors[candidate], vectors[chosen])));
      const score =
        selected.length === 0 ? relevance[candidate] : lambda * relevance[candidate] - (1 - lambda) * redundancy;
      if (score > bestScore) {
        bestScore = score;
        bestSlot = slot;
      }
    }
    const [picked] = remaining.splice(bestSlot, 1);
    selected.push(picked);
    result.push({ ...candidates[picked], diversityScore: bestScore });
  }
  return result;
}

export class Fuser {
  private readonly options: FusionOptions;

  constructor(
    options: Partial<FusionOptions> = {},
    private readonly vectorizer: Vectorizer = new LexicalVectorizer()
  ) {
    this.options = { ...DEFAULT_PIPELINE_CONFIG.fusion, ...options };
  }

  async fuse(vectorItems: readonly RetrievedItem[], graphItems: readonly RetrievedItem[], query: string): Promise<RankedItem[]> {
    const fused = reciprocalRankFusion([vectorItems, graphItems], this.options);
    switch (this.options.strategy) {
      case "rrf":
        return fused;
      case "mmr":
        return this.diversify(fused, query);
      case "hybrid": {
        const head = fused.slice(0, this.options.mmrWindow);
        return [...(await this.diversify(head, query)), ...fused.slice(this.options.mmrWindow)];
      }
    }
  }

  /**
   * Relevance blends the normalized fused score with query similarity so that
   * items without lexical overlap keep the standing rank fusion gave them.
   */
  private async diversify(items: RankedItem[], query: string): Promise<RankedItem[]> {
    if (items.length < 2) {
      return items;
    }
    const [queryVector, ...vectors] = await this.vectorizer.vectorize([query, ...items.map((item) => item.content)]);
    const topScore = items.reduce((max, item) => Math.max(max, item.fusionScore), 0);
    const relevance = items.map(
      (item, position) => 0.5 * (topScore > 0 ? item.fusionScore / topScore : 0) + 0.5 * cosine(queryVector, vectors[position])
    );
    return maximalMarginalRelevance(items, relevance, vectors, this.options.mmrLambda);
  }
}
