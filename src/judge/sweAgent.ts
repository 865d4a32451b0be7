import path from "node:path";

import { z } from "zod";

import type { SweAgentJudgeConfig } from "../config.js";
import { AblationBenchError, EvaluationFailedError } from "../errors.js";
import { tool } from "../llm/llm.js";
import type { LlmToolSet } from "../llm/types.js";
import { parseJsonLines, toJsonLines } from "../parser.js";
import { createAgentEpisodeRunner, SANDBOX_CWD, type EpisodeRunner } from "../sandbox/episode.js";
import type { SandboxFilesystem } from "../sandbox/filesystem.js";
import { renderTemplate } from "../templates.js";
import {
  PaperMatchSchema,
  ReviewMatchSchema,
  type BenchmarkMode,
  type MatchSet,
  type PaperRecord,
  type Plan,
} from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import {
  consideredSuggestions,
  judgePromptValues,
  reconcilePaperMatches,
  reconcileReviewMatches,
  unmatchedResults,
  type EvaluateOptions,
  type Judge,
  type JudgeOutput,
} from "./judge.js";

export const FINAL_SCORE_PATH = path.posix.join(SANDBOX_CWD, "final_score.jsonl");

const FINAL_SCORE_NAME = path.posix.basename(FINAL_SCORE_PATH);

export function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const result = [...items];
  for (let index = result.length - 1; index > 0; index -= 1) {
    const swap = Math.floor(random() * (index + 1));
    const current = result[index];
    const other = result[swap];
    if (current !== undefined && other !== undefined) {
      result[index] = other;
      result[swap] = current;
    }
  }
  return result;
}

/** The initial score file: one unanswered line per item the agent must grade. */
export function buildScaffold(mode: BenchmarkMode, keys: readonly string[]): string {
  const lines =
    mode === "researcher"
      ? keys.map((name) => ({ name_in_paper: name, name_in_plan: null }))
      : keys.map((name) => ({ name_in_plan: name, appears_in_review: false }));
  return `${toJsonLines(lines)}\n`;
}

function countKeys(keys: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const key of keys) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/** Describes how `actual` differs from `expected` as multisets, or returns undefined when equal. */
export function diffKeyMultisets(expected: readonly string[], actual: readonly string[]): string | undefined {
  const expectedCounts = countKeys(expected);
  const actualCounts = countKeys(actual);
  const missing: string[] = [];
  const unexpected: string[] = [];
  for (const [key, count] of expectedCounts) {
    const found = actualCounts.get(key) ?? 0;
    if (found < count) {
      missing.push(key);
    }
  }
  for (const [key, count] of actualCounts) {
    const allowed = expectedCounts.get(key) ?? 0;
    if (count > allowed) {
      unexpected.push(allowed === 0 ? key : `${key} (repeated)`);
    }
  }
  if (missing.length === 0 && unexpected.length === 0) {
    return undefined;
  }
  const parts: string[] = [];
  if (missing.length > 0) {
    parts.push(`missing entries: ${missing.map((key) => JSON.stringify(key)).join(", ")}`);
  }
  if (unexpected.length > 0) {
    parts.push(`unexpected entries: ${unexpected.map((key) => JSON.stringify(key)).join(", ")}`);
  }
  return `${FINAL_SCORE_NAME} must keep exactly the entries created by create_final_score; ${parts.join("; ")}.`;
}

/**
 * Validates a submitted score file against the scaffold keys. Every line must parse and the
 * protected key field must enumerate the scaffold exactly.
 */
export function validateScoreSubmission(
  content: string,
  mode: BenchmarkMode,
  record: PaperRecord,
  scaffoldKeys: readonly string[],
): MatchSet {
  if (mode === "researcher") {
    const { items } = parseJsonLines(content, PaperMatchSchema, { mode: "strict" });
    const difference = diffKeyMultisets(
      scaffoldKeys,
      items.map((item) => item.name_in_paper),
    );
    if (difference) {
      throw new Error(difference);
    }
    return { mode, matches: reconcilePaperMatches(items, record.ablations) };
  }
  const { items } = parseJsonLines(content, ReviewMatchSchema, { mode: "strict" });
  const difference = diffKeyMultisets(
    scaffoldKeys,
    items.map((item) => item.name_in_plan),
  );
  if (difference) {
    throw new Error(difference);
  }
  return { mode, matches: reconcileReviewMatches(items, scaffoldKeys) };
}

/**
 * Grades a plan through a tool-using agent that must create the score scaffold, fill it in and
 * submit it.
 */
export class SweAgentJudge implements Judge {
  readonly kind = "sweagent";
  readonly #config: SweAgentJudgeConfig;
  readonly #runner: EpisodeRunner;
  readonly #logger: Logger;
  readonly #random: () => number;

  constructor(
    config: SweAgentJudgeConfig,
    deps: { readonly episodeRunner?: EpisodeRunner; readonly logger?: Logger; readonly random?: () => number } = {},
  ) {
    this.#config = config;
    this.#logger = deps.logger ?? silentLogger;
    this.#random = deps.random ?? Math.random;
    this.#runner =
      deps.episodeRunner ??
      createAgentEpisodeRunner({
        model: config.model.name,
        temperature: config.model.temperature,
        reasoningEffort: config.model.reasoningEffort,
        maxSteps: config.maxSteps,
        timeoutMs: config.episodeTimeoutMs,
        maxSubmitAttempts: config.maxSubmitAttempts,
        logger: this.#logger,
      });
  }

  get mode(): SweAgentJudgeConfig["mode"] {
    return this.#config.mode;
  }

  get name(): string {
    return this.#config.model.name;
  }

  async evaluate(record: PaperRecord, plan: Plan, options: EvaluateOptions = {}): Promise<JudgeOutput> {
    const considered = consideredSuggestions(plan, options.topK);
    if (considered.length === 0) {
      this.#logger.warn(`${record.id}: empty plan, every item is unmatched`);
      return { matches: unmatchedResults(this.mode, record), costUsd: 0 };
    }

    const { mode } = this;
    const scaffoldKeys =
      mode === "researcher"
        ? record.ablations.map((ablation) => ablation.name)
        : considered.map((suggestion) => suggestion.name);
    const order = <T>(items: readonly T[]): T[] =>
      this.#config.shuffle ? shuffled(items, this.#random) : [...items];
    const values = judgePromptValues(record, order(considered), {
      groundTruth: order(record.ablations),
      reviews: order(record.reviews),
    });

    let scaffoldCreated = false;
    const scaffold = buildScaffold(mode, scaffoldKeys);
    const extraTools = (sandbox: SandboxFilesystem): LlmToolSet => ({
      create_final_score: tool({
        description: `Creates ${FINAL_SCORE_NAME} with one line per item to grade. Calling it again resets the file.`,
        inputSchema: z.object({}),
        execute: async () => {
          await sandbox.writeTextFile(FINAL_SCORE_PATH, scaffold);
          const reset = scaffoldCreated;
          scaffoldCreated = true;
          return reset
            ? `Reset ${FINAL_SCORE_NAME} to its initial content.`
            : `Created ${FINAL_SCORE_NAME} with ${scaffoldKeys.length} line(s). Edit the verdict fields only, then call submit.`;
        },
      }),
    });

    const outcome = await this.#runner.run(
      {
        id: record.id,
        instructions: renderTemplate(this.#config.prompts.system, values),
        prompt: renderTemplate(this.#config.prompts.user, values),
        extraTools,
        submission: {
          path: FINAL_SCORE_PATH,
          validate: (content) => {
            if (!scaffoldCreated) {
              throw new Error(`${FINAL_SCORE_NAME} was not created; call create_final_score first.`);
            }
            return validateScoreSubmission(content, mode, record, scaffoldKeys);
          },
        },
      },
      { signal: options.signal },
    );
    if (!outcome.ok) {
      if (outcome.error instanceof AblationBenchError) {
        throw outcome.error;
      }
      throw new EvaluationFailedError(`Judge episode failed for ${record.id}: ${outcome.error.message}`, {
        cause: outcome.error,
      });
    }
    return { matches: outcome.artifact, costUsd: outcome.costUsd };
  }
}
