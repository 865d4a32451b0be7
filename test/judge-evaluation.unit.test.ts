import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../src/errors.js";
import {
  JUDGE_EVALUATION_JSON_FILE_NAME,
  JUDGE_EVALUATION_MD_FILE_NAME,
  runJudgeEvaluation,
  scoreJudgeVerdicts,
} from "../src/harness/judgeEvaluation.js";

import { makeTempDir, recordingLogger } from "./fixtures.js";

function writeLines(filePath: string, rows: readonly unknown[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${rows.map((row) => JSON.stringify(row)).join("\n")}\n`);
}

describe("scoreJudgeVerdicts", () => {
  it("treats predicted matches as positives against the labels", () => {
    const scores = scoreJudgeVerdicts(
      [
        { name_in_plan: "X", appears_in_review: true },
        { name_in_plan: "Y", appears_in_review: true },
        { name_in_plan: "Z", appears_in_review: false },
      ],
      [
        { name_in_plan: "X", appears_in_review: true },
        { name_in_plan: "Z", appears_in_review: true },
      ],
    );

    expect(scores).toEqual({ precision: 0.5, recall: 0.5, f1: 0.5 });
  });

  it("scores 0 when the judge answered nothing", () => {
    expect(scoreJudgeVerdicts([{ name_in_paper: "A", name_in_plan: "X" }], [])).toEqual({
      precision: 0,
      recall: 0,
      f1: 0,
    });
  });
});

describe("runJudgeEvaluation", () => {
  it("grades every labelled instance and writes the report", async () => {
    const judgeDir = makeTempDir();
    const labelsPath = path.join(judgeDir, "labels.jsonl");
    writeLines(labelsPath, [
      { id: "gpt-5-mini/r1", labels: [{ name_in_paper: "A", name_in_plan: "X" }] },
      {
        id: "gpt-5-mini/r2",
        labels: [
          JSON.stringify({ name_in_paper: "A", name_in_plan: null }),
          JSON.stringify({ name_in_paper: "B", name_in_plan: "Y" }),
        ].join("\n"),
      },
      { id: "gpt-5-mini/r3", labels: [{ name_in_paper: "A", name_in_plan: "X" }] },
    ]);
    writeLines(path.join(judgeDir, "gpt-5-mini", "r1.jsonl"), [{ name_in_paper: "A", name_in_plan: "X" }]);
    writeLines(path.join(judgeDir, "gpt-5-mini", "r2.jsonl"), [
      { name_in_paper: "A", name_in_plan: "X" },
      { name_in_paper: "B", name_in_plan: null },
    ]);
    fs.writeFileSync(
      path.join(judgeDir, "gpt-5-mini", "evaluations.json"),
      JSON.stringify({ r1: { cost: 0.02 }, r2: { cost: 0.04 } }),
    );
    const logger = recordingLogger();
    const outputDir = makeTempDir();

    const result = await runJudgeEvaluation({ mode: "researcher", labelsPath, judgeDir, outputDir, logger });

    expect(result.instances).toEqual([
      { id: "gpt-5-mini/r1", precision: 1, recall: 1, f1: 1, costUsd: 0.02 },
      { id: "gpt-5-mini/r2", precision: 0, recall: 0, f1: 0, costUsd: 0.04 },
      { id: "gpt-5-mini/r3", precision: 0, recall: 0, f1: 0, costUsd: 0 },
    ]);
    expect(result.aggregate.precision.mean).toBeCloseTo(1 / 3, 10);
    expect(result.aggregate.totalCostUsd).toBeCloseTo(0.06, 10);
    expect(logger.entries).toEqual([
      {
        level: "warn",
        message: `gpt-5-mini/r3: no judge output at ${path.join(judgeDir, "gpt-5-mini", "r3.jsonl")}; every verdict counts as unmatched`,
      },
    ]);

    const written: unknown = JSON.parse(fs.readFileSync(path.join(outputDir, JUDGE_EVALUATION_JSON_FILE_NAME), "utf8"));
    expect(written).toMatchObject({
      mode: "researcher",
      instances: { "gpt-5-mini/r1": { precision: 1, recall: 1, f1_score: 1, cost: 0.02 } },
    });
    const markdown = fs.readFileSync(path.join(outputDir, JUDGE_EVALUATION_MD_FILE_NAME), "utf8");
    expect(markdown.split("\n")).toContain("| gpt-5-mini/r2 | 0.000 | 0.000 | 0.000 | 0.0400 |");
  });

  it("rejects an invalid labels row", async () => {
    const dir = makeTempDir();
    const labelsPath = path.join(dir, "labels.jsonl");
    writeLines(labelsPath, [{ id: "m/r1", labels: [{ name_in_plan: "X" }] }]);

    const failure = await runJudgeEvaluation({ mode: "researcher", labelsPath, judgeDir: dir }).catch(
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(ConfigurationError);
    expect(failure).toHaveProperty("message", expect.stringMatching(/line 1 is invalid: labels\.0\.name_in_paper: /u));
  });
});
