import { createHash } from "node:crypto";
import fs from "node:fs";

import { describe, expect, it } from "vitest";

import {
  RESEARCHER_JUDGE_PLACEHOLDERS,
  REVIEWER_JUDGE_PLACEHOLDERS,
  type SimpleLmJudgeConfig,
} from "../src/config.js";
import { EvaluationFailedError, isRetryableError } from "../src/errors.js";
import { toEvaluationResult } from "../src/harness/evaluation.js";
import {
  consideredSuggestions,
  judgeCacheKey,
  reconcilePaperMatches,
  reconcileReviewMatches,
  REVIEW_SEPARATOR,
  SimpleLmJudge,
  unmatchedResults,
} from "../src/judge/index.js";
import { ResponseCache } from "../src/llm/responseCache.js";
import { renderStructuredOutput, toJsonLines } from "../src/parser.js";
import { compileTemplate } from "../src/templates.js";

import { fakeTextGenerator, makePlan, makeRecord, makeTempDir, recordingLogger, suggestion } from "./fixtures.js";

const researcherPrompts = {
  system: compileTemplate("Match ablations of {{paper_title}}.", RESEARCHER_JUDGE_PLACEHOLDERS, "system"),
  user: compileTemplate("Plan:\n{{plan}}\nPaper:\n{{paper_ablations}}", RESEARCHER_JUDGE_PLACEHOLDERS, "user"),
};

const reviewerPrompts = {
  system: compileTemplate("Read the reviews.", REVIEWER_JUDGE_PLACEHOLDERS, "system"),
  user: compileTemplate("{{official_reviews}}\n---\n{{plan}}", REVIEWER_JUDGE_PLACEHOLDERS, "user"),
};

function researcherConfig(overrides: Partial<SimpleLmJudgeConfig> = {}): SimpleLmJudgeConfig {
  return {
    kind: "simple_lm",
    mode: "researcher",
    model: { name: "gpt-5-mini", temperature: 0 },
    prompts: researcherPrompts,
    ...overrides,
  };
}

const reviewerConfig: SimpleLmJudgeConfig = {
  kind: "simple_lm",
  mode: "reviewer",
  model: { name: "gpt-5-mini" },
  prompts: reviewerPrompts,
};

function verdicts(predictions: readonly unknown[]): string {
  return renderStructuredOutput({ discussion: "Compared both lists.", predictions });
}

describe("SimpleLmJudge (researcher)", () => {
  it("scores a plan that reproduces the paper's ablation", async () => {
    const { generate, requests } = fakeTextGenerator([verdicts([{ name_in_paper: "A", name_in_plan: "X" }])], 0.03);
    const judge = new SimpleLmJudge(researcherConfig(), { generateText: generate });
    const record = makeRecord();
    const plan = makePlan(["X"]);

    const output = await judge.evaluate(record, plan);
    const result = toEvaluationResult(record, judge.name, output, ["X"]);

    expect(requests[0]?.instructions).toBe("Match ablations of Gated Widgets.");
    expect(requests[0]?.input).toBe(
      `Plan:\n${JSON.stringify(suggestion("X"))}\nPaper:\n${JSON.stringify(suggestion("A", "attention module"))}`,
    );
    expect(result).toEqual({
      recordId: "paper-1",
      judge: "gpt-5-mini",
      mode: "researcher",
      precision: 1,
      recall: 1,
      f1: 1,
      matches: [{ name_in_paper: "A", name_in_plan: "X" }],
      costUsd: 0.03,
    });
  });

  it("shows only the top-k plan entries", async () => {
    const { generate, requests } = fakeTextGenerator([verdicts([{ name_in_paper: "A", name_in_plan: "Z" }])]);
    const judge = new SimpleLmJudge(researcherConfig(), { generateText: generate });
    const record = makeRecord();
    const plan = makePlan(["X", "Y", "Z"]);

    const output = await judge.evaluate(record, plan, { topK: 2 });
    const considered = consideredSuggestions(plan, 2).map((item) => item.name);

    expect(requests[0]?.input).toBe(
      `Plan:\n${JSON.stringify(suggestion("X"))}\n${JSON.stringify(suggestion("Y"))}\nPaper:\n${JSON.stringify(
        suggestion("A", "attention module"),
      )}`,
    );
    expect(toEvaluationResult(record, judge.name, output, considered)).toMatchObject({
      precision: 0,
      recall: 0,
      f1: 0,
    });
  });

  it("fills in paper ablations the judge left out", async () => {
    const record = makeRecord({ ablations: [suggestion("A"), suggestion("B")] });
    const judge = new SimpleLmJudge(researcherConfig(), {
      generateText: fakeTextGenerator([verdicts([{ name_in_paper: "B", name_in_plan: "X" }])]).generate,
    });

    const output = await judge.evaluate(record, makePlan(["X"]));

    expect(output.matches).toEqual({
      mode: "researcher",
      matches: [
        { name_in_paper: "A", name_in_plan: null },
        { name_in_paper: "B", name_in_plan: "X" },
      ],
    });
  });

  it("reports every ablation unmatched for an empty plan without calling the model", async () => {
    const { generate, requests } = fakeTextGenerator(["unused"]);
    const logger = recordingLogger();
    const judge = new SimpleLmJudge(researcherConfig(), { generateText: generate, logger });

    const output = await judge.evaluate(makeRecord(), makePlan([]));

    expect(requests).toHaveLength(0);
    expect(output).toEqual({
      matches: { mode: "researcher", matches: [{ name_in_paper: "A", name_in_plan: null }] },
      costUsd: 0,
    });
    expect(logger.entries).toEqual([{ level: "warn", message: "paper-1: empty plan, every item is unmatched" }]);
  });

  it("fails retryably on malformed output or no usable verdict", async () => {
    const malformed = new SimpleLmJudge(researcherConfig(), {
      generateText: fakeTextGenerator(["<predictions></predictions>"]).generate,
    });
    const malformedError = await malformed.evaluate(makeRecord(), makePlan(["X"])).catch((error: unknown) => error);
    expect(malformedError).toBeInstanceOf(EvaluationFailedError);
    expect(malformedError).toHaveProperty(
      "message",
      "Malformed judge output for paper-1: Missing <discussion> block.",
    );
    expect(isRetryableError(malformedError)).toBe(true);

    const empty = new SimpleLmJudge(researcherConfig(), {
      generateText: fakeTextGenerator([verdicts([{ name_in_plan: "X" }])]).generate,
    });
    const emptyError = await empty.evaluate(makeRecord(), makePlan(["X"])).catch((error: unknown) => error);
    expect(emptyError).toHaveProperty("message", "No valid verdicts for paper-1.");
    expect(isRetryableError(emptyError)).toBe(true);
  });

  it("caches responses per record and judged plan entries", async () => {
    const cacheDir = makeTempDir();
    const { generate, requests } = fakeTextGenerator([verdicts([{ name_in_paper: "A", name_in_plan: null }])]);
    const judge = new SimpleLmJudge(researcherConfig({ cacheDir }), { generateText: generate });
    const record = makeRecord();

    await judge.evaluate(record, makePlan(["X", "Y"]), { topK: 1 });
    await judge.evaluate(record, makePlan(["X"]));
    await judge.evaluate(record, makePlan(["X", "Y"]));
    await judge.evaluate(record, makePlan(["Z"]));

    expect(requests).toHaveLength(3);
    const digest = createHash("sha256").update(toJsonLines([suggestion("X")])).digest("hex").slice(0, 16);
    const key = judgeCacheKey(record, [suggestion("X")]);
    expect(key).toBe(`paper-1.${digest}`);
    expect(fs.existsSync(new ResponseCache(cacheDir).pathFor(key))).toBe(true);
    expect(judgeCacheKey(record, [suggestion("Z")])).not.toBe(key);
  });
});

describe("SimpleLmJudge (reviewer)", () => {
  it("joins the reviews and treats missing verdicts as absent from the reviews", async () => {
    const { generate, requests } = fakeTextGenerator([verdicts([{ name_in_plan: "X", appears_in_review: true }])]);
    const judge = new SimpleLmJudge(reviewerConfig, { generateText: generate });
    const record = makeRecord({ reviews: ["First review.", "Second review."], reviewAblationCount: 1 });

    const output = await judge.evaluate(record, makePlan(["X", "Y"]));

    expect(requests[0]?.input).toBe(
      `First review.${REVIEW_SEPARATOR}Second review.\n---\n${JSON.stringify(suggestion("X"))}\n${JSON.stringify(
        suggestion("Y"),
      )}`,
    );
    expect(output.matches).toEqual({
      mode: "reviewer",
      matches: [
        { name_in_plan: "X", appears_in_review: true },
        { name_in_plan: "Y", appears_in_review: false },
      ],
    });
    expect(toEvaluationResult(record, judge.name, output, ["X", "Y"])).toMatchObject({
      precision: 0.5,
      recall: 1,
    });
  });
});

describe("reconciliation", () => {
  it("keeps the first verdict for a repeated paper ablation", () => {
    expect(
      reconcilePaperMatches(
        [
          { name_in_paper: "A", name_in_plan: "X" },
          { name_in_paper: "A", name_in_plan: null },
          { name_in_paper: "Q", name_in_plan: "Y" },
        ],
        [suggestion("A"), suggestion("B")],
      ),
    ).toEqual([
      { name_in_paper: "A", name_in_plan: "X" },
      { name_in_paper: "B", name_in_plan: null },
    ]);
  });

  it("orders review verdicts by plan rank and drops unknown names", () => {
    expect(
      reconcileReviewMatches(
        [
          { name_in_plan: "Y", appears_in_review: true },
          { name_in_plan: "Q", appears_in_review: true },
        ],
        ["X", "Y"],
      ),
    ).toEqual([
      { name_in_plan: "X", appears_in_review: false },
      { name_in_plan: "Y", appears_in_review: true },
    ]);
  });

  it("has nothing to report for a reviewer with an empty plan", () => {
    expect(unmatchedResults("reviewer", makeRecord())).toEqual({ mode: "reviewer", matches: [] });
  });
});
