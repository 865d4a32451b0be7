import fs from "node:fs";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { EvaluationFailedError, isRetryableError } from "../src/errors.js";
import {
  combinePaperVerdicts,
  combineReviewVerdicts,
  createJudge,
  MajorityJudge,
  majorityVerdict,
  StoredJudge,
  type Judge,
  type JudgeOutput,
} from "../src/judge/index.js";
import type { PaperMatch } from "../src/types.js";

import { makePlan, makeRecord, makeTempDir, recordingLogger, suggestion } from "./fixtures.js";

const record = makeRecord({ ablations: [suggestion("A"), suggestion("B")] });

function fixedJudge(name: string, result: readonly PaperMatch[] | Error, costUsd = 0.1): Judge {
  return {
    kind: "fixed",
    mode: "researcher",
    name,
    evaluate: async (): Promise<JudgeOutput> => {
      if (result instanceof Error) {
        throw result;
      }
      return { matches: { mode: "researcher", matches: result }, costUsd };
    },
  };
}

describe("majorityVerdict", () => {
  it("needs a strict majority unless the tie policy says otherwise", () => {
    expect(majorityVerdict(2, 3, "unmatched")).toBe(true);
    expect(majorityVerdict(1, 3, "matched")).toBe(false);
    expect(majorityVerdict(1, 2, "unmatched")).toBe(false);
    expect(majorityVerdict(1, 2, "matched")).toBe(true);
    expect(majorityVerdict(0, 0, "matched")).toBe(false);
  });
});

describe("combinePaperVerdicts", () => {
  it("keeps the most frequent counterpart, comparing lists as sets", () => {
    const combined = combinePaperVerdicts(
      [
        [{ name_in_paper: "A", name_in_plan: ["Y", "X"] }],
        [{ name_in_paper: "A", name_in_plan: ["X", "Y"] }],
        [{ name_in_paper: "A", name_in_plan: "Z" }],
      ],
      record,
      "unmatched",
    );

    expect(combined).toEqual([
      { name_in_paper: "A", name_in_plan: ["Y", "X"] },
      { name_in_paper: "B", name_in_plan: null },
    ]);
  });
});

describe("combineReviewVerdicts", () => {
  it("votes per plan item", () => {
    expect(
      combineReviewVerdicts(
        [
          [
            { name_in_plan: "X", appears_in_review: true },
            { name_in_plan: "Y", appears_in_review: false },
          ],
          [
            { name_in_plan: "X", appears_in_review: true },
            { name_in_plan: "Y", appears_in_review: true },
          ],
          [{ name_in_plan: "X", appears_in_review: false }],
        ],
        ["X", "Y"],
        "unmatched",
      ),
    ).toEqual([
      { name_in_plan: "X", appears_in_review: true },
      { name_in_plan: "Y", appears_in_review: false },
    ]);
  });
});

describe("MajorityJudge", () => {
  it("combines member verdicts and sums their cost", async () => {
    const judge = new MajorityJudge({
      mode: "researcher",
      tiePolicy: "unmatched",
      members: [
        fixedJudge("m1", [{ name_in_paper: "A", name_in_plan: "X" }]),
        fixedJudge("m2", [
          { name_in_paper: "A", name_in_plan: "X" },
          { name_in_paper: "B", name_in_plan: "Y" },
        ]),
        fixedJudge("m3", [
          { name_in_paper: "A", name_in_plan: null },
          { name_in_paper: "B", name_in_plan: null },
        ]),
      ],
    });

    const output = await judge.evaluate(record, makePlan(["X", "Y"]));

    expect(output.matches).toEqual({
      mode: "researcher",
      matches: [
        { name_in_paper: "A", name_in_plan: "X" },
        { name_in_paper: "B", name_in_plan: null },
      ],
    });
    expect(output.costUsd).toBeCloseTo(0.3, 10);
  });

  it("breaks ties with the configured policy", async () => {
    const members = [
      fixedJudge("m1", [{ name_in_paper: "A", name_in_plan: "X" }]),
      fixedJudge("m2", [{ name_in_paper: "A", name_in_plan: null }]),
    ];

    const strict = await new MajorityJudge({ mode: "researcher", tiePolicy: "unmatched", members }).evaluate(
      record,
      makePlan(["X"]),
    );
    const lenient = await new MajorityJudge({ mode: "researcher", tiePolicy: "matched", members }).evaluate(
      record,
      makePlan(["X"]),
    );

    expect(strict.matches.matches[0]).toEqual({ name_in_paper: "A", name_in_plan: null });
    expect(lenient.matches.matches[0]).toEqual({ name_in_paper: "A", name_in_plan: "X" });
  });

  it("votes among the members that answered", async () => {
    const logger = recordingLogger();
    const judge = new MajorityJudge(
      {
        mode: "researcher",
        tiePolicy: "unmatched",
        members: [
          fixedJudge("m1", new Error("quota exceeded")),
          fixedJudge("m2", [{ name_in_paper: "A", name_in_plan: "X" }], 0.2),
          fixedJudge("m3", [{ name_in_paper: "A", name_in_plan: "X" }], 0.2),
        ],
      },
      logger,
    );

    const output = await judge.evaluate(record, makePlan(["X"]));

    expect(output.matches.matches[0]).toEqual({ name_in_paper: "A", name_in_plan: "X" });
    expect(output.costUsd).toBeCloseTo(0.4, 10);
    expect(logger.entries).toEqual([{ level: "warn", message: "paper-1: member 1 (m1) failed: quota exceeded" }]);
  });

  it("fails when every member fails", async () => {
    const judge = new MajorityJudge({
      mode: "researcher",
      tiePolicy: "unmatched",
      members: [
        fixedJudge("m1", new EvaluationFailedError("bad answer", { retryable: true })),
        fixedJudge("m2", new Error("boom")),
      ],
    });

    const failure = await judge.evaluate(record, makePlan(["X"])).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(EvaluationFailedError);
    expect(failure).toHaveProperty("message", "All 2 member judge(s) failed for paper-1: bad answer");
    expect(isRetryableError(failure)).toBe(true);
  });
});

describe("StoredJudge", () => {
  it("replays stored verdicts and skips bad lines", async () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "paper-1.jsonl"), '{"name_in_paper": "B", "name_in_plan": "Y"}\nnot json\n');
    const logger = recordingLogger();
    const judge = new StoredJudge({ kind: "stored", mode: "researcher", dir }, logger);

    const output = await judge.evaluate(record, makePlan(["Y"]));

    expect(judge.name).toBe(`stored:${path.basename(dir)}`);
    expect(output).toEqual({
      matches: {
        mode: "researcher",
        matches: [
          { name_in_paper: "A", name_in_plan: null },
          { name_in_paper: "B", name_in_plan: "Y" },
        ],
      },
      costUsd: 0,
    });
    expect(logger.entries).toEqual([
      { level: "warn", message: `${path.join(dir, "paper-1.jsonl")}: skipped 1 invalid line(s)` },
    ]);
  });

  it("limits reviewer verdicts to the considered plan", async () => {
    const dir = makeTempDir();
    fs.writeFileSync(
      path.join(dir, "paper-1.jsonl"),
      '{"name_in_plan": "X", "appears_in_review": true}\n{"name_in_plan": "Y", "appears_in_review": true}\n',
    );
    const judge = new StoredJudge({ kind: "stored", mode: "reviewer", dir });

    const output = await judge.evaluate(record, makePlan(["X", "Y"]), { topK: 1 });

    expect(output.matches).toEqual({ mode: "reviewer", matches: [{ name_in_plan: "X", appears_in_review: true }] });
  });

  it("fails a record without stored verdicts", async () => {
    const dir = makeTempDir();
    const judge = new StoredJudge({ kind: "stored", mode: "researcher", dir });

    await expect(judge.evaluate(makeRecord({ id: "paper-2" }), makePlan(["X"]))).rejects.toThrow(
      `no stored verdicts for paper-2 at ${path.join(dir, "paper-2.jsonl")}`,
    );
  });
});

describe("createJudge", () => {
  it("builds a majority of stored members", async () => {
    const dirs = [makeTempDir(), makeTempDir(), makeTempDir()];
    const answers = ["X", "X", null];
    dirs.forEach((dir, index) => {
      fs.writeFileSync(
        path.join(dir, "paper-1.jsonl"),
        `${JSON.stringify({ name_in_paper: "A", name_in_plan: answers[index] ?? null })}\n`,
      );
    });

    const judge = createJudge({
      kind: "majority",
      mode: "researcher",
      tiePolicy: "unmatched",
      members: dirs.map((dir) => ({ kind: "stored" as const, mode: "researcher" as const, dir })),
    });
    const output = await judge.evaluate(makeRecord(), makePlan(["X"]));

    expect(judge).toBeInstanceOf(MajorityJudge);
    expect(judge.name).toBe("majority");
    expect(output).toEqual({
      matches: { mode: "researcher", matches: [{ name_in_paper: "A", name_in_plan: "X" }] },
      costUsd: 0,
    });
  });
});
