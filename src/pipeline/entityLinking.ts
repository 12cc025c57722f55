import { z } from "zod";
import aliasData from "../data/entity-aliases.json";
import { describeError } from "../errors";
import { completeJson, type TextGenerator } from "../llm/client";
import { buildEntityMatchMessages } from "../llm/prompt";
import { componentLogger, type AppLogger } from "../logger";
import { EntityMatchSchema } from "../parsers/model-output";
import type { GraphRow, GraphStore } from "../stores/graphStore";
import { buildNodeLookupQuery, buildNodeSampleQuery } from "./cypher";

export type AliasTable = Record<string, string[]>;

export type LinkMethod = "exact" | "alias" | "substring" | "model";

export interface GraphNodeRef {
  id: string;
  name: string;
  aliases: string[];
}

export interface LinkedEntity {
  surface: string;
  nodeId: string;
  name: string;
  method: LinkMethod;
}

const NodeRefSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  aliases: z.array(z.string()).nullable().default([]).transform((aliases) => aliases ?? [])
});

const METHOD_RANK: Record<LinkMethod, number> = { exact: 0, alias: 1, substring: 2, model: 3 };
const MIN_SUBSTRING_LENGTH = 3;

export const DEFAULT_ALIASES: AliasTable = aliasData;

export function parseNodeRefs(rows: GraphRow[]): GraphNodeRef[] {
  return rows.flatMap((row) => {
    const parsed = NodeRefSchema.safeParse(row);
    return parsed.success ? [parsed.data] : [];
  });
}

/** Surface form plus every alias-table spelling that refers to the same canonical name. */
export function expandWithAliases(surface: string, aliases: AliasTable): string[] {
  const key = surface.trim().toLowerCase();
  const forms = new Set([key]);
  for (const [canonical, variants] of Object.entries(aliases)) {
    const spellings = [canonical, ...variants].map((value) => value.toLowerCase());
    if (spellings.includes(key)) {
      spellings.forEach((spelling) => forms.add(spelling));
    }
  }
  return [...forms];
}

function classify(forms: string[], node: GraphNodeRef): LinkMethod | null {
  const name = node.name.trim().toLowerCase();
  const [surface] = forms;
  if (name === surface) {
    return "exact";
  }
  if (forms.includes(name) || node.aliases.some((alias) => forms.includes(alias.trim().toLowerCase()))) {
    return "alias";
  }
  if (
    surface.length >= MIN_SUBSTRING_LENGTH &&
    name.length >= MIN_SUBSTRING_LENGTH &&
    (name.includes(surface) || surface.includes(name))
  ) {
    return "substring";
  }
  return null;
}

/** Exact, then alias, then substring; ties go to the closest name length, then alphabetical order. */
export function matchDeterministically(
  entities: readonly string[],
  candidates: readonly GraphNodeRef[],
  aliases: AliasTable = DEFAULT_ALIASES
): LinkedEntity[] {
  const linked: LinkedEntity[] = [];
  const usedNodes = new Set<string>();

  for (const surface of entities) {
    const forms = expandWithAliases(surface, aliases);
    let best: { node: GraphNodeRef; method: LinkMethod } | null = null;

    for (const node of candidates) {
      const method = classify(forms, node);
      if (!method) {
        continue;
      }
      if (!best || compareMatch(surface, { node, method }, best) < 0) {
        best = { node, method };
      }
    }

    if (best && !usedNodes.has(best.node.id)) {
      usedNodes.add(best.node.id);
      linked.push({ surface, nodeId: best.node.id, name: best.node.name, method: best.method });
    }
  }
  return linked;
}

function compareMatch(
  surface: string,
  a: { node: GraphNodeRef; method: LinkMethod },
  b: { node: GraphNodeRef; method: LinkMethod }
): number {
  const byMethod = METHOD_RANK[a.method] - METHOD_RANK[b.method];
  if (byMethod !== 0) {
    return byMethod;
  }
  const byLength = Math.abs(a.node.name.length - surface.length) - Math.abs(b.node.name.length - surface.length);
  if (byLength !== 0) {
    return byLength;
  }
  return a.node.name.localeCompare(b.node.name);
}

export interface EntityLinkerOptions {
  aliases?: AliasTable;
  sampleSize?: number;
  logger?: AppLogger;
}

export class EntityLinker {
  private readonly aliases: AliasTable;

  private readonly sampleSize: number;

  private readonly logger: AppLogger;

  constructor(
    private readonly graphStore: GraphStore,
    private readonly llm: TextGenerator,
    { aliases = DEFAULT_ALIASES, sampleSize = 100, logger }: EntityLinkerOptions = {}
  ) {
    this.aliases = aliases;
    this.sampleSize = sampleSize;
    this.logger = logger ?? componentLogger("entity-linker");
  }

  async link(entities: readonly string[], workspaceId: string): Promise<LinkedEntity[]> {
    if (entities.length === 0) {
      return [];
    }

    const terms = entities.flatMap((entity) => expandWithAliases(entity, this.aliases));
    const candidates = parseNodeRefs(await this.graphStore.run(buildNodeLookupQuery(workspaceId, terms)));
    const deterministic = matchDeterministically(entities, candidates, this.aliases);
    if (deterministic.length > 0) {
      this.logger.debug("link:deterministic", { linked: deterministic.length, candidates: candidates.length });
      return deterministic;
    }

    return this.linkWithModel(entities, workspaceId);
  }

  private async linkWithModel(entities: readonly string[], workspaceId: string): Promise<LinkedEntity[]> {
    const sample = parseNodeRefs(await this.graphStore.run(buildNodeSampleQuery(workspaceId, this.sampleSize)));
    if (sample.length === 0) {
      return [];
    }

    try {
      const { matches } = await completeJson(
        this.llm,
        buildEntityMatchMessages(entities, sample.map((node) => node.name)),
        EntityMatchSchema,
        { operation: "entity_match", temperature: 0, maxTokens: 300 }
      );
      const byName = new Map(sample.map((node) => [node.name.trim().toLowerCase(), node]));
      const linked: LinkedEntity[] = [];
      for (const match of matches) {
        // Names outside the sample are ignored, so the model cannot invent nodes.
        const node = byName.get(match.canonical.trim().toLowerCase());
        if (node && !linked.some((entry) => entry.nodeId === node.id)) {
          linked.push({ surface: match.surface, nodeId: node.id, name: node.name, method: "model" });
        }
      }
      this.logger.debug("link:model", { linked: linked.length, sample: sample.length });
      return linked;
    } catch (error) {
      this.logger.warn("link:model_failed", { error: describeError(error) });
      return [];
    }
  }
}
