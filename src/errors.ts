export type AblationBenchErrorOptions = {
  readonly cause?: unknown;
  readonly retryable?: boolean;
};

export class AblationBenchError extends Error {
  readonly retryable: boolean;

  constructor(message: string, options: AblationBenchErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AblationBenchError";
    this.retryable = options.retryable ?? false;
  }
}

/** Invalid configuration, template or dataset. Fatal to the whole run. */
export class ConfigurationError extends AblationBenchError {
  constructor(message: string, options: AblationBenchErrorOptions = {}) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export type LineError = {
  readonly lineNumber: number;
  readonly line: string;
  readonly message: string;
};

export class MalformedOutputError extends AblationBenchError {
  readonly lineErrors: readonly LineError[];

  constructor(message: string, lineErrors: readonly LineError[] = [], options: AblationBenchErrorOptions = {}) {
    super(message, options);
    this.name = "MalformedOutputError";
    this.lineErrors = lineErrors;
  }
}

export class GenerationFailedError extends AblationBenchError {
  constructor(message: string, options: AblationBenchErrorOptions = {}) {
    super(message, options);
    this.name = "GenerationFailedError";
  }
}

export class EvaluationFailedError extends AblationBenchError {
  constructor(message: string, options: AblationBenchErrorOptions = {}) {
    super(message, options);
    this.name = "EvaluationFailedError";
  }
}

export class TransientAPIError extends AblationBenchError {
  readonly status: number | undefined;

  constructor(message: string, options: AblationBenchErrorOptions & { status?: number } = {}) {
    super(message, { cause: options.cause, retryable: true });
    this.name = "TransientAPIError";
    this.status = options.status;
  }
}

export class SandboxProtocolError extends AblationBenchError {
  constructor(message: string, options: AblationBenchErrorOptions = {}) {
    super(message, { cause: options.cause, retryable: false });
    this.name = "SandboxProtocolError";
  }
}

export class TaskTimeoutError extends AblationBenchError {
  constructor(message: string) {
    super(message, { retryable: false });
    this.name = "TaskTimeoutError";
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === "string") {
    return new Error(value);
  }
  return new Error("Unknown error");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function getStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  for (const candidate of [error.status, error.statusCode]) {
    if (typeof candidate === "number") {
      return candidate;
    }
    if (typeof candidate === "string") {
      const parsed = Number.parseInt(candidate, 10);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
  }
  if (typeof error.code === "number") {
    return error.code;
  }
  return undefined;
}

export function getErrorCode(error: unknown): string | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.code === "string") {
    return error.code;
  }
  return getErrorCode(error.cause);
}

/** True when the error (or anything on its `cause` chain) may succeed on another attempt. */
export function isRetryableError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 8 && current !== undefined; depth += 1) {
    if (current instanceof AblationBenchError) {
      if (current.retryable) {
        return true;
      }
      // Non-retryable bench errors stop the walk; their cause was already classified.
      return false;
    }
    current = isRecord(current) ? current.cause : undefined;
  }
  return false;
}

export function describeError(error: unknown): { readonly errorClass: string; readonly message: string } {
  const err = toError(error);
  return { errorClass: err.name, message: err.message };
}
