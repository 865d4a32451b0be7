import { createHash } from "node:crypto";

import type { SimpleLmJudgeConfig } from "../config.js";
import { generateText } from "../llm/llm.js";
import { ResponseCache } from "../llm/responseCache.js";
import type { TextGenerator } from "../llm/types.js";
import { toJsonLines } from "../parser.js";
import { renderTemplate } from "../templates.js";
import type { AblationSuggestion, PaperRecord, Plan } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import {
  consideredSuggestions,
  judgePromptValues,
  parseJudgeResponse,
  unmatchedResults,
  type EvaluateOptions,
  type Judge,
  type JudgeOutput,
} from "./judge.js";

/** Cache key for a verdict: the record id plus a digest of the plan entries that were judged. */
export function judgeCacheKey(record: PaperRecord, considered: readonly AblationSuggestion[]): string {
  const digest = createHash("sha256").update(toJsonLines(considered)).digest("hex").slice(0, 16);
  return `${record.id}.${digest}`;
}

export class SimpleLmJudge implements Judge {
  readonly kind = "simple_lm";
  readonly #config: SimpleLmJudgeConfig;
  readonly #generateText: TextGenerator;
  readonly #logger: Logger;
  readonly #cache: ResponseCache | undefined;

  constructor(
    config: SimpleLmJudgeConfig,
    deps: { readonly generateText?: TextGenerator; readonly logger?: Logger } = {},
  ) {
    this.#config = config;
    this.#generateText = deps.generateText ?? generateText;
    this.#logger = deps.logger ?? silentLogger;
    this.#cache = config.cacheDir ? new ResponseCache(config.cacheDir, this.#logger) : undefined;
  }

  get mode(): SimpleLmJudgeConfig["mode"] {
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

    const cacheKey = judgeCacheKey(record, considered);
    const cached = await this.#cache?.get(cacheKey);
    if (cached) {
      this.#logger.debug(`${record.id}: reusing cached judge response`);
      const matches = parseJudgeResponse(cached.text, this.mode, record, considered, this.#logger);
      return { matches, costUsd: cached.costUsd };
    }

    const { model, prompts } = this.#config;
    const values = judgePromptValues(record, considered);
    const result = await this.#generateText({
      model: model.name,
      instructions: renderTemplate(prompts.system, values),
      input: renderTemplate(prompts.user, values),
      temperature: model.temperature,
      reasoningEffort: model.reasoningEffort,
      signal: options.signal,
    });
    const matches = parseJudgeResponse(result.text, this.mode, record, considered, this.#logger);
    await this.#cache?.put(cacheKey, result);
    return { matches, costUsd: result.costUsd };
  }
}
