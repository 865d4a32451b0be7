import type { SimpleLmPlannerConfig } from "../config.js";
import { generateText } from "../llm/llm.js";
import { ResponseCache } from "../llm/responseCache.js";
import type { TextGenerator } from "../llm/types.js";
import { renderTemplate } from "../templates.js";
import type { PaperRecord, Plan } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import { parsePlanResponse, plannerPromptValues, type Planner, type PlanOptions } from "./planner.js";

/** One model call per record; the answer is parsed into a ranked plan and truncated. */
export class SimpleLmPlanner implements Planner {
  readonly kind = "simple_lm";
  readonly #config: SimpleLmPlannerConfig;
  readonly #generateText: TextGenerator;
  readonly #logger: Logger;
  readonly #cache: ResponseCache | undefined;

  constructor(
    config: SimpleLmPlannerConfig,
    deps: { readonly generateText?: TextGenerator; readonly logger?: Logger } = {},
  ) {
    this.#config = config;
    this.#generateText = deps.generateText ?? generateText;
    this.#logger = deps.logger ?? silentLogger;
    this.#cache = config.cacheDir ? new ResponseCache(config.cacheDir, this.#logger) : undefined;
  }

  get model(): string {
    return this.#config.model.name;
  }

  async generate(record: PaperRecord, options: PlanOptions = {}): Promise<Plan> {
    const { model, prompts, numAblations } = this.#config;
    const cached = await this.#cache?.get(record.id);
    if (cached) {
      this.#logger.debug(`${record.id}: reusing cached planner response`);
      const { discussion, suggestions } = parsePlanResponse(cached.text, record.id, this.#logger);
      return this.#toPlan(record, discussion, suggestions.slice(0, numAblations), cached.costUsd);
    }

    const values = plannerPromptValues(record, numAblations);
    const result = await this.#generateText({
      model: model.name,
      instructions: renderTemplate(prompts.system, values),
      input: renderTemplate(prompts.user, values),
      temperature: model.temperature,
      reasoningEffort: model.reasoningEffort,
      signal: options.signal,
    });
    const { discussion, suggestions } = parsePlanResponse(result.text, record.id, this.#logger);
    await this.#cache?.put(record.id, result);
    return this.#toPlan(record, discussion, suggestions.slice(0, numAblations), result.costUsd);
  }

  #toPlan(record: PaperRecord, discussion: string, suggestions: Plan["suggestions"], costUsd: number): Plan {
    return {
      recordId: record.id,
      planner: this.kind,
      model: this.model,
      suggestions,
      discussion,
      costUsd,
    };
  }
}
