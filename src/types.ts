import { z } from "zod";

export const BenchmarkModeSchema = z.enum(["researcher", "reviewer"]);
export type BenchmarkMode = z.infer<typeof BenchmarkModeSchema>;

export const AblationActionSchema = z.enum(["REMOVE", "REPLACE", "ADD"]);
export type AblationAction = z.infer<typeof AblationActionSchema>;

export const ReplacementValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.record(z.string(), z.unknown()),
]);
export type ReplacementValue = z.infer<typeof ReplacementValueSchema>;

const nonBlank = (label: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${label} must not be empty` });

export type AblationSuggestion = {
  readonly name: string;
  readonly ablated_part: string;
  readonly action: AblationAction;
  readonly replacement?: readonly ReplacementValue[];
  readonly metrics: readonly string[];
};

/**
 * One proposed ablation. `replacement` is required for REPLACE and ADD and must be empty for
 * REMOVE, where it is dropped from the parsed value.
 */
export const AblationSuggestionSchema = z
  .object({
    name: nonBlank("name"),
    ablated_part: nonBlank("ablated_part"),
    action: AblationActionSchema,
    replacement: z.array(ReplacementValueSchema).nullish(),
    metrics: z.array(z.string()).default([]),
  })
  .superRefine((value, ctx) => {
    const replacementCount = value.replacement?.length ?? 0;
    if ((value.action === "REPLACE" || value.action === "ADD") && replacementCount === 0) {
      ctx.addIssue({
        code: "custom",
        path: ["replacement"],
        message: `replacement is required when action is ${value.action}`,
      });
    }
    if (value.action === "REMOVE" && replacementCount > 0) {
      ctx.addIssue({
        code: "custom",
        path: ["replacement"],
        message: "replacement must be empty when action is REMOVE",
      });
    }
  })
  .transform((value): AblationSuggestion => {
    const { name, ablated_part, action, replacement } = value;
    const metrics = [...new Set(value.metrics)];
    if (action !== "REMOVE" && replacement) {
      return { name, ablated_part, action, replacement, metrics };
    }
    return { name, ablated_part, action, metrics };
  });

export const PaperMatchSchema = z.object({
  name_in_paper: nonBlank("name_in_paper"),
  name_in_plan: z
    .union([nonBlank("name_in_plan"), z.array(nonBlank("name_in_plan")).min(1)])
    .nullable()
    .default(null),
});
export type PaperMatch = z.infer<typeof PaperMatchSchema>;

export const ReviewMatchSchema = z.object({
  name_in_plan: nonBlank("name_in_plan"),
  appears_in_review: z.boolean().default(false),
});
export type ReviewMatch = z.infer<typeof ReviewMatchSchema>;

export type MatchResult = PaperMatch | ReviewMatch;

/** Paper-side or plan-side matches, tagged by the mode that produced them. */
export type MatchSet =
  | { readonly mode: "researcher"; readonly matches: readonly PaperMatch[] }
  | { readonly mode: "reviewer"; readonly matches: readonly ReviewMatch[] };

export const PaperRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  abstract: z.string(),
  source: z.string().default(""),
  ablations: z.array(AblationSuggestionSchema).default([]),
  reviews: z.array(z.string()).default([]),
  reviewAblationCount: z.number().int().nonnegative().default(0),
});
export type PaperRecord = z.infer<typeof PaperRecordSchema>;

export const PlanSchema = z.object({
  recordId: z.string(),
  planner: z.string(),
  model: z.string(),
  suggestions: z.array(AblationSuggestionSchema),
  discussion: z.string().default(""),
  costUsd: z.number().nonnegative().default(0),
});
export type Plan = z.infer<typeof PlanSchema>;

export const EvaluationResultSchema = z.object({
  recordId: z.string(),
  judge: z.string(),
  mode: BenchmarkModeSchema,
  precision: z.number().min(0).max(1),
  recall: z.number().min(0).max(1),
  f1: z.number().min(0).max(1),
  /** Ranking quality of the plan; researcher mode only. */
  ndcg: z.number().min(0).max(1).nullable().default(null),
  matches: z.array(z.union([PaperMatchSchema, ReviewMatchSchema])),
  costUsd: z.number().nonnegative().default(0),
});
export type EvaluationResult = z.infer<typeof EvaluationResultSchema>;

export function isMatched(match: MatchResult): boolean {
  if ("appears_in_review" in match) {
    return match.appears_in_review;
  }
  return match.name_in_plan !== null;
}

export function counterpartNames(match: PaperMatch): readonly string[] {
  if (match.name_in_plan === null) {
    return [];
  }
  return typeof match.name_in_plan === "string" ? [match.name_in_plan] : match.name_in_plan;
}
