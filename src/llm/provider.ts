import { TransientAPIError, getErrorCode, getStatusCode, toError } from "../errors.js";
import { readPrefixedEnvNumber } from "../utils/env.js";

export type LlmProvider = "openai" | "gemini";

const DEFAULT_REQUEST_TIMEOUT_MS = 15 * 60_000;

/** `gemini/<id>` and `openai/<id>` pick a provider explicitly; bare `gemini-*` ids go to Gemini. */
export function resolveModel(modelId: string): { provider: LlmProvider; model: string } {
  const trimmed = modelId.trim();
  if (trimmed.startsWith("gemini/")) {
    return { provider: "gemini", model: trimmed.slice("gemini/".length) };
  }
  if (trimmed.startsWith("openai/")) {
    return { provider: "openai", model: trimmed.slice("openai/".length) };
  }
  if (trimmed.startsWith("gemini-")) {
    return { provider: "gemini", model: trimmed };
  }
  return { provider: "openai", model: trimmed };
}

export function resolveRequestTimeoutMs(): number {
  const configured = readPrefixedEnvNumber("REQUEST_TIMEOUT_MS");
  return configured !== undefined && configured > 0 ? configured : DEFAULT_REQUEST_TIMEOUT_MS;
}

const RETRYABLE_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504, 529]);
const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);
const CONNECTION_ERROR_NAMES = new Set(["APIConnectionError", "APIConnectionTimeoutError"]);

export function isTransientProviderError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status !== undefined && RETRYABLE_STATUSES.has(status)) {
    return true;
  }
  const code = getErrorCode(error);
  if (code !== undefined && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }
  if (error instanceof Error && CONNECTION_ERROR_NAMES.has(error.name)) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("rate limit") ||
    message.includes("resource exhausted") ||
    message.includes("resource_exhausted") ||
    message.includes("overloaded")
  );
}

/**
 * Runs one provider request, rethrowing retryable failures as `TransientAPIError`.
 * Aborts and client errors pass through unchanged.
 */
export async function callProvider<T>(
  provider: string,
  signal: AbortSignal | undefined,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (signal?.aborted) {
      throw toError(signal.reason ?? error);
    }
    if (isTransientProviderError(error)) {
      const err = toError(error);
      throw new TransientAPIError(`${provider} request failed: ${err.message}`, {
        cause: error,
        status: getStatusCode(error),
      });
    }
    throw error;
  }
}
