import { readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { decodeEmbeddedList } from "../dataset.js";
import { ConfigurationError, toError } from "../errors.js";
import { formatZodIssues, parseJsonLines } from "../parser.js";
import { aggregateScores, score, type AggregateScores, type Scores } from "../scoring.js";
import {
  isMatched,
  PaperMatchSchema,
  ReviewMatchSchema,
  type BenchmarkMode,
  type MatchResult,
} from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import { EVALUATIONS_FILE_NAME } from "./evaluation.js";
import { readOptionalTextFile, writeJsonFile, writeTextFile } from "./files.js";
import { renderReport } from "./report.js";

export const JUDGE_EVALUATION_JSON_FILE_NAME = "judge_evaluation.json";
export const JUDGE_EVALUATION_MD_FILE_NAME = "judge_evaluation.md";

export type JudgeEvaluationOptions = {
  readonly mode: BenchmarkMode;
  /** JSONL rows `{id: "<model>/<recordId>", labels}`. */
  readonly labelsPath: string;
  /** Holds the judge outputs as `<model>/<recordId>.jsonl`. */
  readonly judgeDir: string;
  readonly outputDir?: string;
  readonly logger?: Logger;
};

export type JudgeInstanceResult = Scores & {
  readonly id: string;
  readonly costUsd: number;
};

export type JudgeEvaluationResult = {
  readonly aggregate: AggregateScores;
  readonly instances: readonly JudgeInstanceResult[];
};

const matchSchemaFor = (mode: BenchmarkMode): z.ZodType<MatchResult> =>
  mode === "researcher" ? PaperMatchSchema : ReviewMatchSchema;

const CostsFileSchema = z.record(z.string(), z.object({ cost: z.number().default(0) }));

function verdictKey(match: MatchResult): string {
  return "name_in_paper" in match ? match.name_in_paper : match.name_in_plan;
}

/**
 * Grades judge verdicts against human labels: a judge positive is a predicted match, a label
 * positive a true one. Labelled items the judge never answered count as negatives.
 */
export function scoreJudgeVerdicts(labels: readonly MatchResult[], predictions: readonly MatchResult[]): Scores {
  const predicted = new Map<string, boolean>();
  for (const prediction of predictions) {
    const key = verdictKey(prediction);
    if (!predicted.has(key)) {
      predicted.set(key, isMatched(prediction));
    }
  }
  let truePositives = 0;
  let predictedPositives = 0;
  let labelPositives = 0;
  for (const label of labels) {
    const expected = isMatched(label);
    const actual = predicted.get(verdictKey(label)) ?? false;
    if (expected) {
      labelPositives += 1;
    }
    if (actual) {
      predictedPositives += 1;
    }
    if (expected && actual) {
      truePositives += 1;
    }
  }
  return score({
    matchedPlan: truePositives,
    matchedTruth: truePositives,
    planSize: predictedPositives,
    groundTruthSize: labelPositives,
  });
}

async function loadLabels(
  filePath: string,
  mode: BenchmarkMode,
): Promise<{ readonly id: string; readonly labels: MatchResult[] }[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read judge labels ${filePath}: ${toError(error).message}`, { cause: error });
  }
  const rowSchema = z.object({
    id: z.string().min(1),
    labels: z.preprocess(decodeEmbeddedList, z.array(matchSchemaFor(mode))),
  });
  const { items, errors } = parseJsonLines(text, rowSchema, { uniqueKey: (row) => row.id });
  const firstError = errors[0];
  if (firstError) {
    throw new ConfigurationError(
      `Judge labels ${filePath} line ${firstError.lineNumber} is invalid: ${firstError.message}`,
    );
  }
  return items;
}

function parseCosts(text: string, costsPath: string, logger: Logger): Record<string, { cost: number }> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error: unknown) {
    logger.warn(`Cost file ${costsPath} is not valid JSON: ${toError(error).message}`);
    return undefined;
  }
  const parsed = CostsFileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(`Cost file ${costsPath} is invalid: ${formatZodIssues(parsed.error.issues)}`);
    return undefined;
  }
  return parsed.data;
}

function splitInstanceId(id: string): { readonly model: string; readonly recordId: string } | undefined {
  const separator = id.lastIndexOf("/");
  if (separator <= 0) {
    return undefined;
  }
  return { model: id.slice(0, separator), recordId: id.slice(separator + 1) };
}

/** Evaluates stored judge verdicts against labels and writes `judge_evaluation.{json,md}`. */
export async function runJudgeEvaluation(options: JudgeEvaluationOptions): Promise<JudgeEvaluationResult> {
  const logger = options.logger ?? silentLogger;
  const { judgeDir, mode } = options;
  const rows = await loadLabels(options.labelsPath, mode);
  const costsByModel = new Map<string, Record<string, { cost: number }> | undefined>();

  const loadCost = async (id: string): Promise<number> => {
    const parts = splitInstanceId(id);
    if (!parts) {
      logger.warn(`${id}: not of the form <model>/<record>; cost taken as 0`);
      return 0;
    }
    if (!costsByModel.has(parts.model)) {
      const costsPath = path.join(judgeDir, parts.model, EVALUATIONS_FILE_NAME);
      const text = await readOptionalTextFile(costsPath);
      if (text === undefined) {
        logger.warn(`Cost file ${costsPath} does not exist`);
      }
      costsByModel.set(parts.model, text === undefined ? undefined : parseCosts(text, costsPath, logger));
    }
    return costsByModel.get(parts.model)?.[parts.recordId]?.cost ?? 0;
  };

  const instances: JudgeInstanceResult[] = [];
  for (const row of rows) {
    const predictionsPath = path.join(judgeDir, `${row.id}.jsonl`);
    const text = await readOptionalTextFile(predictionsPath);
    let predictions: MatchResult[] = [];
    if (text === undefined) {
      logger.warn(`${row.id}: no judge output at ${predictionsPath}; every verdict counts as unmatched`);
    } else {
      const parsed = parseJsonLines(text, matchSchemaFor(mode));
      if (parsed.errors.length > 0) {
        logger.warn(`${predictionsPath}: skipped ${parsed.errors.length} invalid line(s)`);
      }
      predictions = parsed.items;
    }
    const scores = scoreJudgeVerdicts(row.labels, predictions);
    instances.push({ id: row.id, ...scores, costUsd: await loadCost(row.id) });
  }

  const aggregate = aggregateScores(instances, 0);
  const outputDir = options.outputDir ?? judgeDir;
  const byId: Record<string, { precision: number; recall: number; f1_score: number; cost: number }> = {};
  for (const instance of instances) {
    byId[instance.id] = {
      precision: instance.precision,
      recall: instance.recall,
      f1_score: instance.f1,
      cost: instance.costUsd,
    };
  }
  await writeJsonFile(path.join(outputDir, JUDGE_EVALUATION_JSON_FILE_NAME), { mode, aggregate, instances: byId });
  await writeTextFile(
    path.join(outputDir, JUDGE_EVALUATION_MD_FILE_NAME),
    renderReport({
      title: "Judge evaluation",
      details: [
        ["Mode", mode],
        ["Judge outputs", judgeDir],
      ],
      aggregate,
      rows: instances,
      failures: [],
    }),
  );
  return { aggregate, instances };
}
