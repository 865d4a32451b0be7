import { readFile } from "node:fs/promises";
import path from "node:path";

import type { StoredJudgeConfig } from "../config.js";
import { EvaluationFailedError, getErrorCode } from "../errors.js";
import { parseJsonLines } from "../parser.js";
import { PaperMatchSchema, ReviewMatchSchema, type PaperRecord, type Plan } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import {
  consideredSuggestions,
  paperMatchKey,
  reconcilePaperMatches,
  reconcileReviewMatches,
  reviewMatchKey,
  type EvaluateOptions,
  type Judge,
  type JudgeOutput,
} from "./judge.js";

/** Replays verdicts an earlier evaluation run wrote to `<dir>/<recordId>.jsonl`. */
export class StoredJudge implements Judge {
  readonly kind = "stored";
  readonly #config: StoredJudgeConfig;
  readonly #logger: Logger;

  constructor(config: StoredJudgeConfig, logger: Logger = silentLogger) {
    this.#config = config;
    this.#logger = logger;
  }

  get mode(): StoredJudgeConfig["mode"] {
    return this.#config.mode;
  }

  get name(): string {
    return `stored:${path.basename(this.#config.dir)}`;
  }

  async evaluate(record: PaperRecord, plan: Plan, options: EvaluateOptions = {}): Promise<JudgeOutput> {
    const filePath = path.join(this.#config.dir, `${record.id}.jsonl`);
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (error: unknown) {
      const reason = getErrorCode(error) === "ENOENT" ? "no stored verdicts" : "cannot read stored verdicts";
      throw new EvaluationFailedError(`${reason} for ${record.id} at ${filePath}`, { cause: error });
    }
    if (this.mode === "researcher") {
      const { items, errors } = parseJsonLines(text, PaperMatchSchema, { uniqueKey: paperMatchKey });
      this.#reportErrors(filePath, errors.length);
      return { matches: { mode: "researcher", matches: reconcilePaperMatches(items, record.ablations) }, costUsd: 0 };
    }
    const { items, errors } = parseJsonLines(text, ReviewMatchSchema, { uniqueKey: reviewMatchKey });
    this.#reportErrors(filePath, errors.length);
    const planNames = consideredSuggestions(plan, options.topK).map((suggestion) => suggestion.name);
    return { matches: { mode: "reviewer", matches: reconcileReviewMatches(items, planNames) }, costUsd: 0 };
  }

  #reportErrors(filePath: string, count: number): void {
    if (count > 0) {
      this.#logger.warn(`${filePath}: skipped ${count} invalid line(s)`);
    }
  }
}
