import { describeError, TaskTimeoutError, toError } from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { createExponentialBackoffPolicy, runWithRetry, type RetryPolicy } from "../utils/retry.js";

import type { RunManifest } from "./manifest.js";

export type TaskFailure = {
  readonly id: string;
  readonly errorClass: string;
  readonly message: string;
  readonly attempts: number;
};

export type TaskEvent<T> =
  | { readonly type: "pending"; readonly id: string }
  | { readonly type: "running"; readonly id: string; readonly attempt: number }
  | {
      readonly type: "retrying";
      readonly id: string;
      readonly attempt: number;
      readonly delayMs: number;
      readonly error: Error;
    }
  | { readonly type: "succeeded"; readonly id: string; readonly output: T; readonly attempts: number }
  | { readonly type: "failed"; readonly failure: TaskFailure };

export type TaskContext = {
  readonly attempt: number;
  /** Aborted on task timeout or when the run is cancelled outright. */
  readonly signal: AbortSignal;
};

export type RunTasksOptions<R extends { readonly id: string }, T> = {
  readonly records: readonly R[];
  readonly parallelism: number;
  readonly manifest: RunManifest<T>;
  readonly task: (record: R, context: TaskContext) => Promise<T>;
  readonly retry?: RetryPolicy;
  /** Budget for one record across all of its attempts. */
  readonly taskTimeoutMs?: number;
  /** Once aborted, no new record starts; records already running finish. */
  readonly stopSignal?: AbortSignal;
  /** Maps the error that ended a record's attempts to the error that is reported. */
  readonly promoteError?: (error: Error, record: R) => Error;
  readonly logger?: Logger;
  readonly onEvent?: (event: TaskEvent<T>) => void;
  /** Backoff wait; tests replace it. */
  readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type RunTasksResult<T> = {
  /** Outputs of this run and of runs recorded in the manifest before it. */
  readonly succeeded: Map<string, T>;
  readonly failed: TaskFailure[];
  /** Ids already completed by an earlier run. */
  readonly skipped: string[];
  readonly stopped: boolean;
};

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(toError(signal.reason));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Runs `task` for every record not yet in the manifest with at most `parallelism` records in
 * flight. A record's failure is contained to that record; only a manifest that cannot be loaded
 * rejects the whole run.
 */
export async function runTasks<R extends { readonly id: string }, T>(
  options: RunTasksOptions<R, T>,
): Promise<RunTasksResult<T>> {
  const logger = options.logger ?? silentLogger;
  const policy = options.retry ?? createExponentialBackoffPolicy();
  const emit = (event: TaskEvent<T>): void => {
    options.onEvent?.(event);
  };

  const succeeded = await options.manifest.load();
  const skipped: string[] = [];
  const pending: R[] = [];
  for (const record of options.records) {
    if (succeeded.has(record.id)) {
      skipped.push(record.id);
    } else {
      pending.push(record);
    }
  }
  if (skipped.length > 0) {
    logger.info(`Resuming: ${skipped.length} record(s) already completed`);
  }
  for (const record of pending) {
    emit({ type: "pending", id: record.id });
  }

  const failed: TaskFailure[] = [];

  const runOne = async (record: R): Promise<void> => {
    const controller = new AbortController();
    const timeout =
      options.taskTimeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            controller.abort(
              new TaskTimeoutError(`Task ${record.id} exceeded its ${options.taskTimeoutMs} ms budget.`),
            );
          }, options.taskTimeoutMs);
    const fail = (error: Error, attempts: number): void => {
      const promoted = options.promoteError?.(error, record) ?? error;
      const failure: TaskFailure = { id: record.id, ...describeError(promoted), attempts };
      failed.push(failure);
      logger.warn(`${record.id} failed after ${attempts} attempt(s): ${failure.errorClass}: ${failure.message}`);
      emit({ type: "failed", failure });
    };

    try {
      const result = await runWithRetry(
        async (attempt) => {
          emit({ type: "running", id: record.id, attempt });
          return raceAbort(options.task(record, { attempt, signal: controller.signal }), controller.signal);
        },
        policy,
        {
          signal: controller.signal,
          wait: options.wait,
          onRetry: ({ attempt, delayMs, error }) => {
            logger.debug(`${record.id} attempt ${attempt} failed (${error.message}); retrying in ${delayMs} ms`);
            emit({ type: "retrying", id: record.id, attempt, delayMs, error });
          },
        },
      );
      if (!result.ok) {
        fail(result.error, result.attempts);
        return;
      }
      try {
        await options.manifest.recordSuccess(record.id, result.value);
      } catch (error: unknown) {
        fail(toError(error), result.attempts);
        return;
      }
      succeeded.set(record.id, result.value);
      emit({ type: "succeeded", id: record.id, output: result.value, attempts: result.attempts });
    } finally {
      if (timeout !== undefined) {
        clearTimeout(timeout);
      }
    }
  };

  let cursor = 0;
  const worker = async (): Promise<void> => {
    for (;;) {
      if (options.stopSignal?.aborted) {
        return;
      }
      const record = pending[cursor];
      cursor += 1;
      if (record === undefined) {
        return;
      }
      await runOne(record);
    }
  };
  const workerCount = Math.max(1, Math.min(Math.floor(options.parallelism), pending.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const stopped = options.stopSignal?.aborted === true && cursor < pending.length;
  if (stopped) {
    logger.info(`Stopped with ${pending.length - Math.min(cursor, pending.length)} record(s) not started`);
  }
  return { succeeded, failed, skipped, stopped };
}
