import { z } from "zod";
import { COMPLEXITIES, INTENTS } from "../pipeline/types";

const Confidence = z.coerce.number().min(0).max(1);

export const RelevanceJudgementSchema = z.object({
  relevant: z.boolean(),
  reason: z.string().default(""),
  confidence: Confidence.default(0.5)
});

export type RelevanceJudgement = z.infer<typeof RelevanceJudgementSchema>;

export const QueryClassificationSchema = z.object({
  intent: z.enum(INTENTS),
  complexity: z.enum(COMPLEXITIES),
  entities: z.array(z.string()).max(12).default([]),
  crossDocument: z.boolean().default(false)
});

export type QueryClassification = z.infer<typeof QueryClassificationSchema>;

export const DecompositionSchema = z.object({
  subQueries: z.array(z.string().min(1)).min(1).max(6)
});

export const ExpansionSchema = z.object({
  variants: z.array(z.string().min(1)).min(1).max(8)
});

export const EntityMatchSchema = z.object({
  matches: z
    .array(
      z.object({
        surface: z.string(),
        canonical: z.string()
      })
    )
    .default([])
});

export type EntityMatches = z.infer<typeof EntityMatchSchema>;

export const SelfCheckSchema = z.object({
  supported: z.boolean(),
  confidence: Confidence,
  reason: z.string().default("")
});

export type SelfCheckJudgement = z.infer<typeof SelfCheckSchema>;
