import path from "node:path";

import { AblationBenchError, GenerationFailedError, TransientAPIError } from "../errors.js";
import { JsonlRunManifest } from "../orchestrator/manifest.js";
import { runTasks, type TaskEvent, type TaskFailure } from "../orchestrator/orchestrator.js";
import { toJsonLines } from "../parser.js";
import type { Planner } from "../planner/planner.js";
import { PlanSchema, type PaperRecord, type Plan } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { RetryPolicy } from "../utils/retry.js";

import { writeJsonFile } from "./files.js";

export const PLANS_FILE_NAME = "plans.json";
export const FAILURES_FILE_NAME = "failures.json";

export type PlanningRunOptions = {
  readonly records: readonly PaperRecord[];
  readonly planner: Planner;
  readonly outputDir: string;
  readonly parallelism: number;
  readonly retry?: RetryPolicy;
  readonly taskTimeoutMs?: number;
  readonly stopSignal?: AbortSignal;
  readonly logger?: Logger;
  readonly onEvent?: (event: TaskEvent<Plan>) => void;
  readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type PlanningRunResult = {
  readonly plans: Map<string, Plan>;
  readonly failures: TaskFailure[];
  readonly skipped: string[];
  readonly stopped: boolean;
};

export type PlansFileEntry = {
  readonly predictions: string;
  readonly cost: number;
  readonly planner: string;
  readonly model: string;
};

/** Errors left after retries are reported as generation failures unless they already say more. */
export function promotePlannerError(error: Error, record: PaperRecord): Error {
  if (error instanceof AblationBenchError && !(error instanceof TransientAPIError)) {
    return error;
  }
  return new GenerationFailedError(`Plan generation failed for ${record.id}: ${error.message}`, { cause: error });
}

/** Generates a plan per record, resuming from `<outputDir>/manifest.jsonl`. */
export async function runPlanning(options: PlanningRunOptions): Promise<PlanningRunResult> {
  const logger = options.logger ?? silentLogger;
  const manifest = new JsonlRunManifest<Plan>({
    outputDir: options.outputDir,
    outputSchema: PlanSchema,
    detailLines: (plan) => plan.suggestions,
    parameters: { planner: options.planner.kind, model: options.planner.model },
    logger,
  });
  const result = await runTasks({
    records: options.records,
    parallelism: options.parallelism,
    manifest,
    task: (record, { signal }) => options.planner.generate(record, { signal }),
    retry: options.retry,
    taskTimeoutMs: options.taskTimeoutMs,
    stopSignal: options.stopSignal,
    promoteError: promotePlannerError,
    logger,
    onEvent: options.onEvent,
    wait: options.wait,
  });

  const plansFile: Record<string, PlansFileEntry> = {};
  for (const record of options.records) {
    const plan = result.succeeded.get(record.id);
    if (plan) {
      plansFile[record.id] = {
        predictions: toJsonLines(plan.suggestions),
        cost: plan.costUsd,
        planner: plan.planner,
        model: plan.model,
      };
    }
  }
  await writeJsonFile(path.join(options.outputDir, PLANS_FILE_NAME), plansFile);
  await writeJsonFile(path.join(options.outputDir, FAILURES_FILE_NAME), result.failed);

  return { plans: result.succeeded, failures: result.failed, skipped: result.skipped, stopped: result.stopped };
}
