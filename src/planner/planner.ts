import type { PlannerKind, PlannerPlaceholder } from "../config.js";
import { GenerationFailedError, MalformedOutputError } from "../errors.js";
import type { TextGenerator } from "../llm/types.js";
import { parseStructuredOutput, type StructuredOutput } from "../parser.js";
import type { EpisodeRunner } from "../sandbox/episode.js";
import { AblationSuggestionSchema, type AblationSuggestion, type PaperRecord, type Plan } from "../types.js";
import type { Logger } from "../utils/logger.js";

export type PlanOptions = {
  readonly signal?: AbortSignal;
};

export interface Planner {
  readonly kind: PlannerKind;
  readonly model: string;
  generate(record: PaperRecord, options?: PlanOptions): Promise<Plan>;
}

/** Collaborators a planner calls out to; tests pass fakes. */
export type PlannerDeps = {
  readonly generateText?: TextGenerator;
  readonly episodeRunner?: EpisodeRunner;
  readonly logger?: Logger;
};

export function plannerPromptValues(
  record: PaperRecord,
  numAblations: number,
  paperSource: string = record.source,
): Record<PlannerPlaceholder, string> {
  return {
    paper_title: record.title,
    abstract: record.abstract,
    paper_source: paperSource,
    num_ablations: String(numAblations),
  };
}

export const suggestionKey = (suggestion: AblationSuggestion): string => suggestion.name;

function parseOrFail(raw: string, recordId: string): StructuredOutput<AblationSuggestion> {
  try {
    return parseStructuredOutput(raw, AblationSuggestionSchema, { uniqueKey: suggestionKey });
  } catch (error: unknown) {
    if (error instanceof MalformedOutputError) {
      throw new GenerationFailedError(`Malformed planner output for ${recordId}: ${error.message}`, {
        cause: error,
        retryable: true,
      });
    }
    throw error;
  }
}

export type ParsedPlanResponse = {
  readonly discussion: string;
  readonly suggestions: AblationSuggestion[];
};

/**
 * Parses a planner answer leniently. Bad lines are logged and dropped; a response with no usable
 * suggestion fails the attempt so the orchestrator samples again.
 */
export function parsePlanResponse(raw: string, recordId: string, logger: Logger): ParsedPlanResponse {
  const parsed = parseOrFail(raw, recordId);
  for (const lineError of parsed.errors) {
    logger.warn(`${recordId}: dropped suggestion line ${lineError.lineNumber}: ${lineError.message}`);
  }
  if (parsed.predictions.length === 0) {
    throw new GenerationFailedError(`No valid ablation suggestions for ${recordId}.`, { retryable: true });
  }
  return { discussion: parsed.discussion, suggestions: parsed.predictions };
}
