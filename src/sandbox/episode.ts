import path from "node:path";

import { z } from "zod";

import { SandboxProtocolError, TaskTimeoutError, toError } from "../errors.js";
import { runToolLoop, tool } from "../llm/llm.js";
import type { LlmReasoningEffort, LlmToolSet, ToolLoopRunner } from "../llm/types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import { createSandboxFileTools } from "./fileTools.js";
import { InMemorySandboxFilesystem, type SandboxFilesystem } from "./filesystem.js";

export const SANDBOX_CWD = "/repo";

const DEFAULT_MAX_STEPS = 40;
const DEFAULT_EPISODE_TIMEOUT_MS = 30 * 60_000;
const DEFAULT_MAX_SUBMIT_ATTEMPTS = 3;

export type EpisodeSubmission<T> = {
  /** Absolute path of the line-delimited JSON file the `submit` tool reads. */
  readonly path: string;
  /** Returns the validated artifact or throws; the error message is shown to the agent. */
  readonly validate: (content: string) => T | Promise<T>;
};

export type EpisodeTask<T> = {
  readonly id: string;
  readonly instructions: string;
  readonly prompt: string;
  readonly files?: Record<string, string>;
  readonly readOnlyPaths?: readonly string[];
  readonly extraTools?: (sandbox: SandboxFilesystem) => LlmToolSet;
  readonly submission: EpisodeSubmission<T>;
};

export type EpisodeOutcome<T> =
  | {
      readonly ok: true;
      readonly artifact: T;
      readonly submission: string;
      readonly costUsd: number;
      readonly steps: number;
    }
  | { readonly ok: false; readonly error: Error; readonly costUsd: number; readonly steps: number };

export type EpisodeRunOptions = {
  readonly signal?: AbortSignal;
};

/** Runs one isolated agent episode; the sandbox lives exactly as long as the call. */
export interface EpisodeRunner {
  run<T>(task: EpisodeTask<T>, options?: EpisodeRunOptions): Promise<EpisodeOutcome<T>>;
}

export type AgentEpisodeRunnerOptions = {
  readonly model: string;
  readonly temperature?: number;
  readonly reasoningEffort?: LlmReasoningEffort;
  readonly maxSteps?: number;
  readonly timeoutMs?: number;
  readonly maxSubmitAttempts?: number;
  readonly runLoop?: ToolLoopRunner;
  readonly logger?: Logger;
};

type Accepted<T> = { readonly artifact: T; readonly submission: string };

export function createAgentEpisodeRunner(options: AgentEpisodeRunnerOptions): EpisodeRunner {
  const runLoop = options.runLoop ?? runToolLoop;
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_EPISODE_TIMEOUT_MS;
  const maxSubmitAttempts = options.maxSubmitAttempts ?? DEFAULT_MAX_SUBMIT_ATTEMPTS;
  const logger = options.logger ?? silentLogger;

  async function run<T>(task: EpisodeTask<T>, runOptions: EpisodeRunOptions = {}): Promise<EpisodeOutcome<T>> {
    const sandbox = new InMemorySandboxFilesystem(task.files);
    await sandbox.ensureDir(SANDBOX_CWD);
    const displayPath = path.posix.relative(SANDBOX_CWD, task.submission.path);

    let accepted: Accepted<T> | undefined;
    let rejections = 0;
    let lastRejection = "";

    const submit = tool({
      description: `Submits ${displayPath} as the final answer. Call it once the file is complete.`,
      inputSchema: z.object({}),
      execute: async () => {
        if (accepted) {
          return "Submission already accepted. Stop now.";
        }
        try {
          const content = await sandbox.readTextFile(task.submission.path);
          const artifact = await task.submission.validate(content);
          accepted = { artifact, submission: content };
          logger.debug(`${task.id}: submission accepted`);
          return "Submission accepted. The task is complete; stop now.";
        } catch (error: unknown) {
          rejections += 1;
          lastRejection = toError(error).message;
          logger.debug(`${task.id}: submission ${rejections} rejected: ${lastRejection}`);
          return [
            `Submission rejected (${rejections}/${maxSubmitAttempts}):`,
            lastRejection,
            `Fix ${displayPath} and call submit again.`,
          ].join("\n");
        }
      },
    });

    const tools: LlmToolSet = {
      ...createSandboxFileTools({
        filesystem: sandbox,
        cwd: SANDBOX_CWD,
        readOnlyPaths: task.readOnlyPaths,
      }),
      ...task.extraTools?.(sandbox),
      submit,
    };

    const abortController = new AbortController();
    const episodeTimeout = setTimeout(() => {
      abortController.abort(new TaskTimeoutError(`Episode timeout exceeded after ${timeoutMs} ms.`));
    }, timeoutMs);
    const onParentAbort = (): void => {
      abortController.abort(runOptions.signal?.reason);
    };
    if (runOptions.signal?.aborted) {
      onParentAbort();
    } else {
      runOptions.signal?.addEventListener("abort", onParentAbort, { once: true });
    }

    let costUsd = 0;
    let steps = 0;
    try {
      const result = await runLoop({
        model: options.model,
        instructions: task.instructions,
        input: task.prompt,
        temperature: options.temperature,
        reasoningEffort: options.reasoningEffort,
        tools,
        maxSteps,
        signal: abortController.signal,
        shouldStop: () => accepted !== undefined || rejections >= maxSubmitAttempts,
        onStep: (step) => {
          costUsd += step.costUsd;
          steps = step.step;
        },
      });
      costUsd = result.totalCostUsd;
      steps = result.steps.length;
      if (accepted) {
        return { ok: true, artifact: accepted.artifact, submission: accepted.submission, costUsd, steps };
      }
      const error =
        rejections >= maxSubmitAttempts
          ? new SandboxProtocolError(
              `Submission rejected ${rejections} time(s); last error: ${lastRejection}`,
            )
          : new SandboxProtocolError(
              `Episode ended (${result.stopReason}) without an accepted submission.`,
            );
      return { ok: false, error, costUsd, steps };
    } catch (error: unknown) {
      const reason: unknown = abortController.signal.aborted ? abortController.signal.reason : error;
      return { ok: false, error: toError(reason ?? error), costUsd, steps };
    } finally {
      clearTimeout(episodeTimeout);
      runOptions.signal?.removeEventListener("abort", onParentAbort);
      sandbox.dispose();
    }
  }

  return { run };
}
