import path from "node:path";

import { AblationBenchError, EvaluationFailedError, TransientAPIError } from "../errors.js";
import { consideredSuggestions, type Judge, type JudgeOutput } from "../judge/judge.js";
import { JsonlRunManifest } from "../orchestrator/manifest.js";
import { runTasks, type TaskEvent, type TaskFailure } from "../orchestrator/orchestrator.js";
import { parseJsonLines } from "../parser.js";
import { aggregateScores, rankingScore, scoreMatches, type AggregateScores } from "../scoring.js";
import {
  AblationSuggestionSchema,
  EvaluationResultSchema,
  type BenchmarkMode,
  type EvaluationResult,
  type MatchResult,
  type PaperRecord,
  type Plan,
} from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { RetryPolicy } from "../utils/retry.js";

import { readOptionalTextFile, writeJsonFile, writeTextFile } from "./files.js";
import { renderReport } from "./report.js";

export const EVALUATIONS_FILE_NAME = "evaluations.json";
export const SUMMARY_JSON_FILE_NAME = "summary.json";
export const SUMMARY_MD_FILE_NAME = "summary.md";

export type EvaluationRunOptions = {
  readonly records: readonly PaperRecord[];
  readonly judge: Judge;
  /** Directory holding `<recordId>.jsonl` plans, as written by a planning run. */
  readonly plansDir: string;
  readonly outputDir: string;
  readonly topK?: number;
  readonly parallelism: number;
  readonly retry?: RetryPolicy;
  readonly taskTimeoutMs?: number;
  readonly stopSignal?: AbortSignal;
  readonly logger?: Logger;
  readonly onEvent?: (event: TaskEvent<EvaluationResult>) => void;
  readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type EvaluationSummary = {
  readonly judge: string;
  readonly mode: BenchmarkMode;
  readonly topK: number | null;
  readonly aggregate: AggregateScores;
  readonly failures: readonly TaskFailure[];
};

export type EvaluationRunResult = {
  readonly results: Map<string, EvaluationResult>;
  readonly summary: EvaluationSummary;
  readonly skipped: string[];
  readonly stopped: boolean;
};

export type EvaluationsFileEntry = {
  readonly precision: number;
  readonly recall: number;
  readonly f1_score: number;
  readonly ndcg_score: number | null;
  readonly cost: number;
  readonly matches: readonly MatchResult[];
};

/** Reads a plan file written by a planning run. Bad lines are skipped; a missing file fails the record. */
export async function loadStoredPlan(plansDir: string, recordId: string, logger: Logger = silentLogger): Promise<Plan> {
  const filePath = path.join(plansDir, `${recordId}.jsonl`);
  const text = await readOptionalTextFile(filePath);
  if (text === undefined) {
    throw new EvaluationFailedError(`No plan for ${recordId} at ${filePath}`);
  }
  const { items, errors } = parseJsonLines(text, AblationSuggestionSchema, { uniqueKey: (item) => item.name });
  if (errors.length > 0) {
    logger.warn(`${filePath}: skipped ${errors.length} invalid line(s)`);
  }
  return { recordId, planner: "stored", model: "", suggestions: items, discussion: "", costUsd: 0 };
}

/** Scores one judge output against the considered plan, given in rank order, and the record's ground-truth size. */
export function toEvaluationResult(
  record: PaperRecord,
  judgeName: string,
  output: JudgeOutput,
  consideredPlanNames: readonly string[],
): EvaluationResult {
  const { mode } = output.matches;
  const groundTruthSize = mode === "researcher" ? record.ablations.length : record.reviewAblationCount;
  const { precision, recall, f1 } = scoreMatches(output.matches, consideredPlanNames, groundTruthSize);
  return {
    recordId: record.id,
    judge: judgeName,
    mode,
    precision,
    recall,
    f1,
    ndcg: rankingScore(output.matches, consideredPlanNames, groundTruthSize),
    matches: [...output.matches.matches],
    costUsd: output.costUsd,
  };
}

export function promoteJudgeError(error: Error, record: PaperRecord): Error {
  if (error instanceof AblationBenchError && !(error instanceof TransientAPIError)) {
    return error;
  }
  return new EvaluationFailedError(`Evaluation failed for ${record.id}: ${error.message}`, { cause: error });
}

/**
 * Judges the stored plan of every record and writes per-record results plus a summary. Resuming
 * into an output directory written with another judge, top-k or plans directory fails.
 */
export async function runEvaluation(options: EvaluationRunOptions): Promise<EvaluationRunResult> {
  const logger = options.logger ?? silentLogger;
  const { judge, topK } = options;
  const manifest = new JsonlRunManifest<EvaluationResult>({
    outputDir: options.outputDir,
    outputSchema: EvaluationResultSchema,
    detailLines: (result) => result.matches,
    parameters: {
      judge: judge.name,
      judgeKind: judge.kind,
      mode: judge.mode,
      topK: topK ?? null,
      plansDir: path.resolve(options.plansDir),
    },
    logger,
  });
  const run = await runTasks({
    records: options.records,
    parallelism: options.parallelism,
    manifest,
    task: async (record, { signal }) => {
      const plan = await loadStoredPlan(options.plansDir, record.id, logger);
      const output = await judge.evaluate(record, plan, { topK, signal });
      const considered = consideredSuggestions(plan, topK).map((suggestion) => suggestion.name);
      return toEvaluationResult(record, judge.name, output, considered);
    },
    retry: options.retry,
    taskTimeoutMs: options.taskTimeoutMs,
    stopSignal: options.stopSignal,
    promoteError: promoteJudgeError,
    logger,
    onEvent: options.onEvent,
    wait: options.wait,
  });

  const ordered: EvaluationResult[] = [];
  for (const record of options.records) {
    const result = run.succeeded.get(record.id);
    if (result) {
      ordered.push(result);
    }
  }
  const summary: EvaluationSummary = {
    judge: judge.name,
    mode: judge.mode,
    topK: topK ?? null,
    aggregate: aggregateScores(ordered, run.failed.length),
    failures: run.failed,
  };
  await writeEvaluationArtifacts(options.outputDir, ordered, summary);
  return { results: run.succeeded, summary, skipped: run.skipped, stopped: run.stopped };
}

async function writeEvaluationArtifacts(
  outputDir: string,
  results: readonly EvaluationResult[],
  summary: EvaluationSummary,
): Promise<void> {
  const evaluations: Record<string, EvaluationsFileEntry> = {};
  for (const result of results) {
    evaluations[result.recordId] = {
      precision: result.precision,
      recall: result.recall,
      f1_score: result.f1,
      ndcg_score: result.ndcg,
      cost: result.costUsd,
      matches: result.matches,
    };
  }
  await writeJsonFile(path.join(outputDir, EVALUATIONS_FILE_NAME), evaluations);
  await writeJsonFile(path.join(outputDir, SUMMARY_JSON_FILE_NAME), summary);
  await writeTextFile(
    path.join(outputDir, SUMMARY_MD_FILE_NAME),
    renderReport({
      title: "Evaluation summary",
      details: [
        ["Judge", summary.judge],
        ["Mode", summary.mode],
        ["Top-k", summary.topK === null ? "all" : String(summary.topK)],
      ],
      aggregate: summary.aggregate,
      rows: results.map((result) => ({
        id: result.recordId,
        precision: result.precision,
        recall: result.recall,
        f1: result.f1,
        ndcg: result.ndcg,
        costUsd: result.costUsd,
      })),
      failures: summary.failures,
    }),
  );
}
