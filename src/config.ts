import { readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError, getErrorCode, toError } from "./errors.js";
import { formatZodIssues } from "./parser.js";
import { compileTemplate, type PromptTemplate } from "./templates.js";
import { BenchmarkModeSchema, type BenchmarkMode } from "./types.js";

export const PLANNER_PLACEHOLDERS = ["paper_title", "abstract", "paper_source", "num_ablations"] as const;
export const RESEARCHER_JUDGE_PLACEHOLDERS = ["paper_title", "abstract", "paper_ablations", "plan"] as const;
export const REVIEWER_JUDGE_PLACEHOLDERS = ["paper_title", "abstract", "plan", "official_reviews"] as const;

export type PlannerPlaceholder = (typeof PLANNER_PLACEHOLDERS)[number];
export type JudgePlaceholder =
  | (typeof RESEARCHER_JUDGE_PLACEHOLDERS)[number]
  | (typeof REVIEWER_JUDGE_PLACEHOLDERS)[number];

export type LoadedPrompts<K extends string> = {
  readonly system: PromptTemplate<K>;
  readonly user: PromptTemplate<K>;
};

export const ModelConfigSchema = z.object({
  name: z.string().min(1),
  temperature: z.number().min(0).max(1).optional(),
  reasoningEffort: z.enum(["low", "medium", "high"]).optional(),
});
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

const PromptPathsSchema = z.object({
  system: z.string().min(1),
  user: z.string().min(1),
});

const episodeSettings = {
  maxSteps: z.number().int().min(1).default(40),
  episodeTimeoutMs: z.number().int().min(1_000).default(30 * 60_000),
  maxSubmitAttempts: z.number().int().min(1).default(3),
};

const SimpleLmPlannerSchema = z.object({
  kind: z.literal("simple_lm"),
  model: ModelConfigSchema,
  prompts: PromptPathsSchema,
  numAblations: z.number().int().min(1).default(5),
  cacheDir: z.string().min(1).optional(),
});

const SweAgentPlannerSchema = z.object({
  kind: z.literal("sweagent"),
  model: ModelConfigSchema,
  prompts: PromptPathsSchema,
  numAblations: z.number().int().min(1).default(5),
  ...episodeSettings,
});

export const PlannerConfigSchema = z.discriminatedUnion("kind", [SimpleLmPlannerSchema, SweAgentPlannerSchema]);
export const PlannerKindSchema = z.enum(["simple_lm", "sweagent"]);
export type PlannerKind = z.infer<typeof PlannerKindSchema>;

const SimpleLmJudgeSchema = z.object({
  kind: z.literal("simple_lm"),
  model: ModelConfigSchema,
  prompts: PromptPathsSchema,
  cacheDir: z.string().min(1).optional(),
});

const SweAgentJudgeSchema = z.object({
  kind: z.literal("sweagent"),
  model: ModelConfigSchema,
  prompts: PromptPathsSchema,
  shuffle: z.boolean().default(true),
  ...episodeSettings,
});

const StoredJudgeSchema = z.object({
  kind: z.literal("stored"),
  dir: z.string().min(1),
});

export const TiePolicySchema = z.enum(["unmatched", "matched"]);
export type TiePolicy = z.infer<typeof TiePolicySchema>;

const MajorityJudgeSchema = z.object({
  kind: z.literal("majority"),
  tiePolicy: TiePolicySchema.default("unmatched"),
  members: z
    .array(z.discriminatedUnion("kind", [SimpleLmJudgeSchema, SweAgentJudgeSchema, StoredJudgeSchema]))
    .min(1),
});

export const JudgeConfigSchema = z.intersection(
  z.object({ mode: BenchmarkModeSchema }),
  z.discriminatedUnion("kind", [SimpleLmJudgeSchema, SweAgentJudgeSchema, MajorityJudgeSchema]),
);
export const JudgeKindSchema = z.enum(["simple_lm", "sweagent", "majority"]);
export type JudgeKind = z.infer<typeof JudgeKindSchema>;

type WithPrompts<T, K extends string> = Omit<T, "prompts"> & { readonly prompts: LoadedPrompts<K> };
type WithMode<T> = T & { readonly mode: BenchmarkMode };

export type SimpleLmPlannerConfig = WithPrompts<z.infer<typeof SimpleLmPlannerSchema>, PlannerPlaceholder>;
export type SweAgentPlannerConfig = WithPrompts<z.infer<typeof SweAgentPlannerSchema>, PlannerPlaceholder>;
export type PlannerConfig = SimpleLmPlannerConfig | SweAgentPlannerConfig;

export type SimpleLmJudgeConfig = WithMode<WithPrompts<z.infer<typeof SimpleLmJudgeSchema>, JudgePlaceholder>>;
export type SweAgentJudgeConfig = WithMode<WithPrompts<z.infer<typeof SweAgentJudgeSchema>, JudgePlaceholder>>;
export type StoredJudgeConfig = WithMode<z.infer<typeof StoredJudgeSchema>>;
export type JudgeMemberConfig = SimpleLmJudgeConfig | SweAgentJudgeConfig | StoredJudgeConfig;
export type MajorityJudgeConfig = WithMode<{
  readonly kind: "majority";
  readonly tiePolicy: TiePolicy;
  readonly members: readonly JudgeMemberConfig[];
}>;
export type JudgeConfig = SimpleLmJudgeConfig | SweAgentJudgeConfig | MajorityJudgeConfig;

export function judgePlaceholdersFor(mode: BenchmarkMode): readonly JudgePlaceholder[] {
  return mode === "researcher" ? RESEARCHER_JUDGE_PLACEHOLDERS : REVIEWER_JUDGE_PLACEHOLDERS;
}

export async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error: unknown) {
    const reason = getErrorCode(error) === "ENOENT" ? "file not found" : toError(error).message;
    throw new ConfigurationError(`Cannot read ${label} ${filePath}: ${reason}`, { cause: error });
  }
  try {
    return JSON.parse(text);
  } catch (error: unknown) {
    throw new ConfigurationError(`${label} ${filePath} is not valid JSON: ${toError(error).message}`, {
      cause: error,
    });
  }
}

export function parseWithSchema<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${label}: ${formatZodIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

async function loadPrompts<K extends string>(
  prompts: z.infer<typeof PromptPathsSchema>,
  baseDir: string,
  allowed: readonly K[],
): Promise<LoadedPrompts<K>> {
  const load = async (relativePath: string): Promise<PromptTemplate<K>> => {
    const filePath = path.resolve(baseDir, relativePath);
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error: unknown) {
      throw new ConfigurationError(`Cannot read prompt template ${filePath}`, { cause: error });
    }
    return compileTemplate(text, allowed, relativePath);
  };
  const [system, user] = await Promise.all([load(prompts.system), load(prompts.user)]);
  return { system, user };
}

/** Validates a planner config file and compiles its prompt templates relative to the file. */
export async function loadPlannerConfig(filePath: string): Promise<PlannerConfig> {
  const raw = parseWithSchema(PlannerConfigSchema, await readJsonFile(filePath, "planner config"), "planner config");
  const prompts = await loadPrompts(raw.prompts, path.dirname(filePath), PLANNER_PLACEHOLDERS);
  return { ...raw, prompts };
}

type RawJudgeMember = z.infer<typeof MajorityJudgeSchema>["members"][number];

async function loadJudgeMember(
  raw: RawJudgeMember,
  mode: BenchmarkMode,
  baseDir: string,
): Promise<JudgeMemberConfig> {
  if (raw.kind === "stored") {
    return { ...raw, mode };
  }
  const prompts = await loadPrompts(raw.prompts, baseDir, judgePlaceholdersFor(mode));
  return { ...raw, mode, prompts };
}

export async function loadJudgeConfig(filePath: string): Promise<JudgeConfig> {
  const raw = parseWithSchema(JudgeConfigSchema, await readJsonFile(filePath, "judge config"), "judge config");
  const baseDir = path.dirname(filePath);
  if (raw.kind === "majority") {
    const members = await Promise.all(
      raw.members.map((member) => loadJudgeMember(member, raw.mode, baseDir)),
    );
    return { kind: "majority", mode: raw.mode, tiePolicy: raw.tiePolicy, members };
  }
  const prompts = await loadPrompts(raw.prompts, baseDir, judgePlaceholdersFor(raw.mode));
  return { ...raw, prompts };
}
