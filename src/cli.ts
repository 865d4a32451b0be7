#!/usr/bin/env node
import path from "node:path";
import { parseArgs } from "node:util";

import { z } from "zod";

import { loadJudgeConfig, loadPlannerConfig } from "./config.js";
import { loadPaperRecords } from "./dataset.js";
import { ConfigurationError, describeError } from "./errors.js";
import { runEvaluation, SUMMARY_MD_FILE_NAME } from "./harness/evaluation.js";
import { runJudgeEvaluation } from "./harness/judgeEvaluation.js";
import { runPlanning } from "./harness/planning.js";
import { createJudge } from "./judge/index.js";
import type { TaskEvent } from "./orchestrator/orchestrator.js";
import { formatZodIssues } from "./parser.js";
import { createPlanner } from "./planner/index.js";
import type { AggregateScores } from "./scoring.js";
import { BenchmarkModeSchema } from "./types.js";
import { loadLocalEnv, readPrefixedEnv } from "./utils/env.js";
import { createConsoleLogger, type Logger } from "./utils/logger.js";
import { createExponentialBackoffPolicy } from "./utils/retry.js";

const USAGE = `Usage: ablation-bench <command> [options]

Commands:
  plan        Generate ablation plans for a dataset
  eval        Judge stored plans and score them
  eval-judge  Score stored judge verdicts against labels

Common run options (plan, eval):
  --dataset <file>          Dataset JSONL
  --config <file>           Planner or judge config JSON
  --output-dir <dir>        Output directory (ABLATIONS_OUTPUT_DIR)
  --parallelism <n>         Records in flight (ABLATIONS_PARALLELISM, default 1)
  --max-attempts <n>        Attempts per record (ABLATIONS_MAX_ATTEMPTS, default 5)
  --task-timeout-ms <n>     Budget per record (ABLATIONS_TASK_TIMEOUT_MS)
  --ids <a,b,...>           Only these record ids
  --limit <n>               Only the first n records

eval:
  --plans-dir <dir>         Directory with <id>.jsonl plans
  --top-k <n>               Grade only the first n plan entries

eval-judge:
  --mode <researcher|reviewer>
  --labels <file>           Labels JSONL
  --judge-dir <dir>         Directory with <model>/<id>.jsonl verdicts
  --output-dir <dir>        Defaults to --judge-dir
`;

const RunSettingsSchema = z.object({
  dataset: z.string({ error: "--dataset is required" }).min(1, { message: "--dataset is required" }),
  config: z.string({ error: "--config is required" }).min(1, { message: "--config is required" }),
  outputDir: z.string({ error: "--output-dir is required" }).min(1, { message: "--output-dir is required" }),
  parallelism: z.coerce.number().int().min(1).default(1),
  maxAttempts: z.coerce.number().int().min(1).default(5),
  taskTimeoutMs: z.coerce.number().int().min(1).optional(),
  ids: z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    )
    .optional(),
  limit: z.coerce.number().int().min(1).optional(),
});
type RunSettings = z.infer<typeof RunSettingsSchema>;

const EvalSettingsSchema = RunSettingsSchema.extend({
  plansDir: z.string({ error: "--plans-dir is required" }).min(1, { message: "--plans-dir is required" }),
  topK: z.coerce.number().int().min(1).optional(),
});

const JudgeEvalSettingsSchema = z.object({
  mode: BenchmarkModeSchema,
  labels: z.string({ error: "--labels is required" }).min(1, { message: "--labels is required" }),
  judgeDir: z.string({ error: "--judge-dir is required" }).min(1, { message: "--judge-dir is required" }),
  outputDir: z.string().min(1).optional(),
});

function parseSettings<T>(schema: z.ZodType<T>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid options: ${formatZodIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

function parseCommandArgs(args: readonly string[]) {
  const { values } = parseArgs({
    args: [...args],
    options: {
      dataset: { type: "string" },
      config: { type: "string" },
      "output-dir": { type: "string" },
      parallelism: { type: "string" },
      "max-attempts": { type: "string" },
      "task-timeout-ms": { type: "string" },
      ids: { type: "string" },
      limit: { type: "string" },
      "plans-dir": { type: "string" },
      "top-k": { type: "string" },
      mode: { type: "string" },
      labels: { type: "string" },
      "judge-dir": { type: "string" },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });
  return values;
}

type CommandValues = ReturnType<typeof parseCommandArgs>;

function runSettingsInput(values: CommandValues): Record<string, unknown> {
  return {
    dataset: values.dataset,
    config: values.config,
    outputDir: values["output-dir"] ?? readPrefixedEnv("OUTPUT_DIR"),
    parallelism: values.parallelism ?? readPrefixedEnv("PARALLELISM"),
    maxAttempts: values["max-attempts"] ?? readPrefixedEnv("MAX_ATTEMPTS"),
    taskTimeoutMs: values["task-timeout-ms"] ?? readPrefixedEnv("TASK_TIMEOUT_MS"),
    ids: values.ids,
    limit: values.limit,
  };
}

function createStopSignal(logger: Logger): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Stopping: waiting for in-flight records (press Ctrl+C again to quit now)");
    controller.abort();
    process.once("SIGINT", () => {
      process.exit(130);
    });
  });
  return controller.signal;
}

function printStatus<T>(event: TaskEvent<T>): void {
  if (event.type === "succeeded") {
    console.log(`[OK] ${event.id}`);
  } else if (event.type === "failed") {
    console.log(`[FAIL] ${event.failure.id} ${event.failure.errorClass}: ${event.failure.message}`);
  }
}

function formatAggregate(aggregate: AggregateScores): string {
  const metric = (label: string, summary: { mean: number; stdDev: number }): string =>
    `${label}: ${summary.mean.toFixed(2)} ± ${summary.stdDev.toFixed(2)}`;
  return [
    metric("Precision", aggregate.precision),
    metric("Recall", aggregate.recall),
    metric("F1", aggregate.f1),
    `Cost: $${aggregate.totalCostUsd.toFixed(4)}`,
    `Succeeded: ${aggregate.succeeded}`,
    `Failed: ${aggregate.failed}`,
  ].join(", ");
}

async function loadRecords(settings: RunSettings) {
  return loadPaperRecords(settings.dataset, { ids: settings.ids, limit: settings.limit });
}

async function plan(values: CommandValues, logger: Logger): Promise<void> {
  const settings = parseSettings(RunSettingsSchema, runSettingsInput(values));
  const config = await loadPlannerConfig(settings.config);
  const records = await loadRecords(settings);
  const planner = createPlanner(config, { logger: logger.child("planner") });
  logger.info(`Planning ${records.length} record(s) with ${config.kind} (${planner.model})`);
  const result = await runPlanning({
    records,
    planner,
    outputDir: settings.outputDir,
    parallelism: settings.parallelism,
    retry: createExponentialBackoffPolicy({ maxAttempts: settings.maxAttempts }),
    taskTimeoutMs: settings.taskTimeoutMs,
    stopSignal: createStopSignal(logger),
    logger,
    onEvent: printStatus,
  });
  logger.info(
    `Plans: ${result.plans.size} succeeded (${result.skipped.length} resumed), ${result.failures.length} failed` +
      (result.stopped ? ", stopped early" : ""),
  );
  if (result.stopped) {
    process.exitCode = 130;
  }
}

async function evaluate(values: CommandValues, logger: Logger): Promise<void> {
  const settings = parseSettings(EvalSettingsSchema, {
    ...runSettingsInput(values),
    plansDir: values["plans-dir"],
    topK: values["top-k"],
  });
  const config = await loadJudgeConfig(settings.config);
  const records = await loadRecords(settings);
  const judge = createJudge(config, { logger: logger.child("judge") });
  logger.info(`Evaluating ${records.length} record(s) with ${config.kind} judge in ${config.mode} mode`);
  const result = await runEvaluation({
    records,
    judge,
    plansDir: settings.plansDir,
    outputDir: settings.outputDir,
    topK: settings.topK,
    parallelism: settings.parallelism,
    retry: createExponentialBackoffPolicy({ maxAttempts: settings.maxAttempts }),
    taskTimeoutMs: settings.taskTimeoutMs,
    stopSignal: createStopSignal(logger),
    logger,
    onEvent: printStatus,
  });
  logger.info(`Evaluation completed. ${formatAggregate(result.summary.aggregate)}`);
  logger.info(`Wrote ${path.join(settings.outputDir, SUMMARY_MD_FILE_NAME)}`);
  if (result.stopped) {
    process.exitCode = 130;
  }
}

async function evaluateJudge(values: CommandValues, logger: Logger): Promise<void> {
  const settings = parseSettings(JudgeEvalSettingsSchema, {
    mode: values.mode,
    labels: values.labels,
    judgeDir: values["judge-dir"],
    outputDir: values["output-dir"],
  });
  const result = await runJudgeEvaluation({
    mode: settings.mode,
    labelsPath: settings.labels,
    judgeDir: settings.judgeDir,
    outputDir: settings.outputDir,
    logger,
  });
  logger.info(`Judge evaluation completed. ${formatAggregate(result.aggregate)}`);
}

const COMMANDS: Record<string, (values: CommandValues, logger: Logger) => Promise<void>> = {
  plan,
  eval: evaluate,
  "eval-judge": evaluateJudge,
};

async function main(): Promise<void> {
  loadLocalEnv();
  const [command, ...rest] = process.argv.slice(2);
  if (command === undefined || command === "--help" || command === "-h") {
    console.log(USAGE);
    return;
  }
  const handler = COMMANDS[command];
  if (!handler) {
    throw new ConfigurationError(`Unknown command "${command}".\n\n${USAGE}`);
  }
  const values = parseCommandArgs(rest);
  if (values.help) {
    console.log(USAGE);
    return;
  }
  await handler(values, createConsoleLogger(command));
}

void main().catch((error: unknown) => {
  const { errorClass, message } = describeError(error);
  console.error(`${errorClass}: ${message}`);
  process.exitCode = 1;
});
