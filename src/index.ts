export {
  AblationActionSchema,
  AblationSuggestionSchema,
  BenchmarkModeSchema,
  counterpartNames,
  EvaluationResultSchema,
  isMatched,
  PaperMatchSchema,
  PaperRecordSchema,
  PlanSchema,
  ReplacementValueSchema,
  ReviewMatchSchema,
} from "./types.js";

export type {
  AblationAction,
  AblationSuggestion,
  BenchmarkMode,
  EvaluationResult,
  MatchResult,
  MatchSet,
  PaperMatch,
  PaperRecord,
  Plan,
  ReplacementValue,
  ReviewMatch,
} from "./types.js";

export {
  AblationBenchError,
  ConfigurationError,
  describeError,
  EvaluationFailedError,
  GenerationFailedError,
  isRetryableError,
  MalformedOutputError,
  SandboxProtocolError,
  TaskTimeoutError,
  toError,
  TransientAPIError,
} from "./errors.js";

export type { LineError } from "./errors.js";

export {
  formatZodIssues,
  parseJsonLines,
  parseStructuredOutput,
  renderStructuredOutput,
  toJsonLines,
} from "./parser.js";

export type { JsonLinesOptions, JsonLinesResult, ParseMode, StructuredOutput } from "./parser.js";

export { compileTemplate, listPlaceholders, renderTemplate } from "./templates.js";
export type { PromptTemplate } from "./templates.js";

export {
  judgePlaceholdersFor,
  loadJudgeConfig,
  loadPlannerConfig,
  PLANNER_PLACEHOLDERS,
  RESEARCHER_JUDGE_PLACEHOLDERS,
  REVIEWER_JUDGE_PLACEHOLDERS,
} from "./config.js";

export type {
  JudgeConfig,
  JudgeMemberConfig,
  MajorityJudgeConfig,
  ModelConfig,
  PlannerConfig,
  SimpleLmJudgeConfig,
  SimpleLmPlannerConfig,
  StoredJudgeConfig,
  SweAgentJudgeConfig,
  SweAgentPlannerConfig,
  TiePolicy,
} from "./config.js";

export { loadPaperRecords, loadPaperSource } from "./dataset.js";
export type { LoadPaperRecordsOptions } from "./dataset.js";

export { aggregateScores, countMatches, ndcgAtK, rankingScore, score, scoreMatches } from "./scoring.js";
export type { AggregateScores, MetricSummary, ScoreCounts, Scores } from "./scoring.js";

export { createPlanner, SimpleLmPlanner, SweAgentPlanner } from "./planner/index.js";
export type { Planner, PlannerDeps, PlanOptions } from "./planner/index.js";

export {
  createJudge,
  MajorityJudge,
  reconcilePaperMatches,
  reconcileReviewMatches,
  SimpleLmJudge,
  StoredJudge,
  SweAgentJudge,
} from "./judge/index.js";
export type { EvaluateOptions, Judge, JudgeDeps, JudgeOutput } from "./judge/index.js";

export { JsonlRunManifest } from "./orchestrator/manifest.js";
export type { ManifestEntry, RunManifest, RunParameters } from "./orchestrator/manifest.js";
export { runTasks } from "./orchestrator/orchestrator.js";
export type { RunTasksOptions, RunTasksResult, TaskContext, TaskEvent, TaskFailure } from "./orchestrator/orchestrator.js";

export { runPlanning } from "./harness/planning.js";
export type { PlanningRunOptions, PlanningRunResult } from "./harness/planning.js";
export { runEvaluation } from "./harness/evaluation.js";
export type { EvaluationRunOptions, EvaluationRunResult, EvaluationSummary } from "./harness/evaluation.js";
export { runJudgeEvaluation, scoreJudgeVerdicts } from "./harness/judgeEvaluation.js";
export type { JudgeEvaluationOptions, JudgeEvaluationResult } from "./harness/judgeEvaluation.js";

export { generateText, runToolLoop, tool } from "./llm/llm.js";
export type {
  LlmFunctionTool,
  LlmTextRequest,
  LlmTextResult,
  LlmToolLoopRequest,
  LlmToolLoopResult,
  LlmToolSet,
  TextGenerator,
  ToolLoopRunner,
} from "./llm/types.js";

export { createAgentEpisodeRunner, SANDBOX_CWD } from "./sandbox/episode.js";
export type { EpisodeOutcome, EpisodeRunner, EpisodeTask } from "./sandbox/episode.js";
export { InMemorySandboxFilesystem } from "./sandbox/filesystem.js";
export type { SandboxFilesystem } from "./sandbox/filesystem.js";

export { loadLocalEnv } from "./utils/env.js";
export { createConsoleLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { createExponentialBackoffPolicy, runWithRetry } from "./utils/retry.js";
export type { RetryPolicy } from "./utils/retry.js";
