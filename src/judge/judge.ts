import type { JudgePlaceholder } from "../config.js";
import { EvaluationFailedError, MalformedOutputError } from "../errors.js";
import type { TextGenerator } from "../llm/types.js";
import { parseStructuredOutput, toJsonLines, type JsonLinesResult } from "../parser.js";
import type { EpisodeRunner } from "../sandbox/episode.js";
import {
  PaperMatchSchema,
  ReviewMatchSchema,
  type AblationSuggestion,
  type BenchmarkMode,
  type MatchSet,
  type PaperMatch,
  type PaperRecord,
  type Plan,
  type ReviewMatch,
} from "../types.js";
import type { Logger } from "../utils/logger.js";

export const REVIEW_SEPARATOR = "\n</official_review>\n\n\n<official_review>\n";

export type EvaluateOptions = {
  /** Only the first `topK` plan entries take part in matching. */
  readonly topK?: number;
  readonly signal?: AbortSignal;
};

export type JudgeOutput = {
  readonly matches: MatchSet;
  readonly costUsd: number;
};

export interface Judge {
  readonly kind: string;
  readonly mode: BenchmarkMode;
  /** Label recorded on evaluation results. */
  readonly name: string;
  evaluate(record: PaperRecord, plan: Plan, options?: EvaluateOptions): Promise<JudgeOutput>;
}

export type JudgeDeps = {
  readonly generateText?: TextGenerator;
  readonly episodeRunner?: EpisodeRunner;
  readonly logger?: Logger;
  /** Returns a float in [0, 1); drives prompt shuffling. */
  readonly random?: () => number;
};

export function consideredSuggestions(plan: Plan, topK?: number): AblationSuggestion[] {
  return topK === undefined ? [...plan.suggestions] : plan.suggestions.slice(0, Math.max(0, topK));
}

export const paperMatchKey = (match: PaperMatch): string => match.name_in_paper;
export const reviewMatchKey = (match: ReviewMatch): string => match.name_in_plan;

/** One entry per paper ablation in dataset order; missing verdicts become `null`, first duplicate wins. */
export function reconcilePaperMatches(
  matches: readonly PaperMatch[],
  groundTruth: readonly AblationSuggestion[],
): PaperMatch[] {
  const byName = new Map<string, PaperMatch>();
  for (const match of matches) {
    if (!byName.has(match.name_in_paper)) {
      byName.set(match.name_in_paper, match);
    }
  }
  return groundTruth.map((ablation) => ({
    name_in_paper: ablation.name,
    name_in_plan: byName.get(ablation.name)?.name_in_plan ?? null,
  }));
}

/** One entry per considered plan item in rank order; missing verdicts become `false`. */
export function reconcileReviewMatches(
  matches: readonly ReviewMatch[],
  planNames: readonly string[],
): ReviewMatch[] {
  const byName = new Map<string, ReviewMatch>();
  for (const match of matches) {
    if (!byName.has(match.name_in_plan)) {
      byName.set(match.name_in_plan, match);
    }
  }
  return planNames.map((name) => ({
    name_in_plan: name,
    appears_in_review: byName.get(name)?.appears_in_review ?? false,
  }));
}

/** The verdicts a judge reports without asking anything: nothing in the plan can match. */
export function unmatchedResults(mode: BenchmarkMode, record: PaperRecord): MatchSet {
  if (mode === "researcher") {
    return { mode, matches: reconcilePaperMatches([], record.ablations) };
  }
  return { mode, matches: [] };
}

export function judgePromptValues(
  record: PaperRecord,
  considered: readonly AblationSuggestion[],
  order: { readonly groundTruth?: readonly AblationSuggestion[]; readonly reviews?: readonly string[] } = {},
): Record<JudgePlaceholder, string> {
  return {
    paper_title: record.title,
    abstract: record.abstract,
    paper_ablations: toJsonLines(order.groundTruth ?? record.ablations),
    plan: toJsonLines(considered),
    official_reviews: (order.reviews ?? record.reviews).join(REVIEW_SEPARATOR),
  };
}

function requireAnswers<T>(result: JsonLinesResult<T>, expected: number, recordId: string, logger: Logger): T[] {
  for (const lineError of result.errors) {
    logger.warn(`${recordId}: dropped verdict line ${lineError.lineNumber}: ${lineError.message}`);
  }
  if (expected > 0 && result.items.length === 0) {
    throw new EvaluationFailedError(`No valid verdicts for ${recordId}.`, { retryable: true });
  }
  return result.items;
}

/**
 * Parses a judge answer in `<discussion>`/`<predictions>` form into reconciled verdicts.
 * Malformed answers and answers without a single usable verdict are retryable failures.
 */
export function parseJudgeResponse(
  raw: string,
  mode: BenchmarkMode,
  record: PaperRecord,
  considered: readonly AblationSuggestion[],
  logger: Logger,
): MatchSet {
  try {
    if (mode === "researcher") {
      const parsed = parseStructuredOutput(raw, PaperMatchSchema, { uniqueKey: paperMatchKey });
      const items = requireAnswers(
        { items: parsed.predictions, errors: parsed.errors },
        record.ablations.length,
        record.id,
        logger,
      );
      return { mode, matches: reconcilePaperMatches(items, record.ablations) };
    }
    const parsed = parseStructuredOutput(raw, ReviewMatchSchema, { uniqueKey: reviewMatchKey });
    const items = requireAnswers(
      { items: parsed.predictions, errors: parsed.errors },
      considered.length,
      record.id,
      logger,
    );
    return {
      mode,
      matches: reconcileReviewMatches(
        items,
        considered.map((suggestion) => suggestion.name),
      ),
    };
  } catch (error: unknown) {
    if (error instanceof MalformedOutputError) {
      throw new EvaluationFailedError(`Malformed judge output for ${record.id}: ${error.message}`, {
        cause: error,
        retryable: true,
      });
    }
    throw error;
  }
}
