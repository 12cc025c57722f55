import { describeError } from "../errors";
import { completeJson, type TextGenerator } from "../llm/client";
import { buildExpansionMessages } from "../llm/prompt";
import { componentLogger, type AppLogger } from "../logger";
import { ExpansionSchema } from "../parsers/model-output";
import { uniqueStrings } from "../utils";
import { questionTopic } from "./entities";

const SYNONYMS = new Map<string, string[]>(Object.entries({
  important: ["significant", "essential"],
  improve: ["enhance", "develop"],
  learn: ["study", "understand"],
  create: ["build", "make"],
  idea: ["concept", "notion"],
  ideas: ["concepts", "notions"],
  happy: ["content", "fulfilled"],
  happiness: ["contentment", "wellbeing"],
  fear: ["anxiety", "worry"],
  work: ["career", "job"],
  advice: ["guidance", "recommendations"],
  problem: ["challenge", "issue"],
  method: ["approach", "technique"],
  benefits: ["advantages", "upsides"],
  goal: ["objective", "aim"]
}));

export const MIN_VARIANTS = 3;
export const MAX_VARIANTS = 5;

/** Deterministic variants: the bare topic plus single-word synonym swaps. */
export function patternVariants(query: string, count: number): string[] {
  const variants = [query, questionTopic(query)];
  const words = query.split(/\s+/);
  for (let index = 0; index < words.length && variants.length < count + 2; index += 1) {
    const bare = words[index].toLowerCase().replace(/[^a-z]/g, "");
    for (const synonym of SYNONYMS.get(bare) ?? []) {
      const swapped = [...words];
      swapped[index] = words[index].replace(new RegExp(bare, "i"), synonym);
      variants.push(swapped.join(" "));
    }
  }
  return uniqueStrings(variants).slice(0, count);
}

export interface QueryExpanderOptions {
  maxVariants?: number;
  timeoutMs?: number;
  logger?: AppLogger;
}

export class QueryExpander {
  private readonly maxVariants: number;

  private readonly timeoutMs: number | undefined;

  private readonly logger: AppLogger;

  constructor(
    private readonly llm: TextGenerator,
    { maxVariants = MAX_VARIANTS, timeoutMs, logger }: QueryExpanderOptions = {}
  ) {
    this.timeoutMs = timeoutMs;
    this.maxVariants = Math.min(MAX_VARIANTS, Math.max(MIN_VARIANTS, maxVariants));
    this.logger = logger ?? componentLogger("query-expander");
  }

  /** Returns the query itself followed by its variants, at most `maxVariants` entries. */
  async expand(query: string): Promise<string[]> {
    try {
      const { variants } = await completeJson(this.llm, buildExpansionMessages(query, this.maxVariants - 1), ExpansionSchema, {
        operation: "expansion",
        temperature: 0.3,
        maxTokens: 300,
        timeoutMs: this.timeoutMs
      });
      const expanded = uniqueStrings([query, ...variants]).slice(0, this.maxVariants);
      if (expanded.length >= MIN_VARIANTS) {
        return expanded;
      }
      return uniqueStrings([...expanded, ...patternVariants(query, this.maxVariants)]).slice(0, this.maxVariants);
    } catch (error) {
      this.logger.warn("expansion:pattern_fallback", { error: describeError(error) });
      return patternVariants(query, this.maxVariants);
    }
  }
}
