import path from "node:path";

import type { SweAgentPlannerConfig } from "../config.js";
import { AblationBenchError, GenerationFailedError } from "../errors.js";
import { parseJsonLines } from "../parser.js";
import { createAgentEpisodeRunner, SANDBOX_CWD, type EpisodeRunner } from "../sandbox/episode.js";
import { renderTemplate } from "../templates.js";
import { AblationSuggestionSchema, type AblationSuggestion, type PaperRecord, type Plan } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import { plannerPromptValues, suggestionKey, type Planner, type PlanOptions } from "./planner.js";

export const PAPER_SOURCE_PATH = path.posix.join(SANDBOX_CWD, "paper", "source.txt");
export const PLAN_SUBMISSION_PATH = path.posix.join(SANDBOX_CWD, "ablations.jsonl");

/** Parses a submitted plan file; any bad line rejects the submission. */
export function validatePlanSubmission(content: string): AblationSuggestion[] {
  const { items } = parseJsonLines(content, AblationSuggestionSchema, {
    mode: "strict",
    uniqueKey: suggestionKey,
  });
  if (items.length === 0) {
    throw new Error(`${path.posix.basename(PLAN_SUBMISSION_PATH)} contains no ablation suggestions.`);
  }
  return items;
}

/**
 * Delegates planning to a tool-using agent. The paper is seeded read-only into the sandbox and
 * the agent submits `ablations.jsonl`.
 */
export class SweAgentPlanner implements Planner {
  readonly kind = "sweagent";
  readonly #config: SweAgentPlannerConfig;
  readonly #runner: EpisodeRunner;
  readonly #logger: Logger;

  constructor(
    config: SweAgentPlannerConfig,
    deps: { readonly episodeRunner?: EpisodeRunner; readonly logger?: Logger } = {},
  ) {
    this.#config = config;
    this.#logger = deps.logger ?? silentLogger;
    this.#runner =
      deps.episodeRunner ??
      createAgentEpisodeRunner({
        model: config.model.name,
        temperature: config.model.temperature,
        reasoningEffort: config.model.reasoningEffort,
        maxSteps: config.maxSteps,
        timeoutMs: config.episodeTimeoutMs,
        maxSubmitAttempts: config.maxSubmitAttempts,
        logger: this.#logger,
      });
  }

  get model(): string {
    return this.#config.model.name;
  }

  async generate(record: PaperRecord, options: PlanOptions = {}): Promise<Plan> {
    const { prompts, numAblations } = this.#config;
    const values = plannerPromptValues(
      record,
      numAblations,
      path.posix.relative(SANDBOX_CWD, PAPER_SOURCE_PATH),
    );
    const outcome = await this.#runner.run(
      {
        id: record.id,
        instructions: renderTemplate(prompts.system, values),
        prompt: renderTemplate(prompts.user, values),
        files: { [PAPER_SOURCE_PATH]: record.source },
        readOnlyPaths: [PAPER_SOURCE_PATH],
        submission: { path: PLAN_SUBMISSION_PATH, validate: validatePlanSubmission },
      },
      { signal: options.signal },
    );
    if (!outcome.ok) {
      this.#logger.debug(`${record.id}: episode failed after ${outcome.steps} step(s)`);
      if (outcome.error instanceof AblationBenchError) {
        throw outcome.error;
      }
      throw new GenerationFailedError(`Planner episode failed for ${record.id}: ${outcome.error.message}`, {
        cause: outcome.error,
      });
    }
    return {
      recordId: record.id,
      planner: this.kind,
      model: this.model,
      suggestions: outcome.artifact.slice(0, numAblations),
      discussion: "",
      costUsd: outcome.costUsd,
    };
  }
}
