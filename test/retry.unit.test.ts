import { describe, expect, it } from "vitest";

import { EvaluationFailedError, GenerationFailedError, TransientAPIError } from "../src/errors.js";
import { createExponentialBackoffPolicy, runWithRetry, sleep } from "../src/utils/retry.js";

describe("createExponentialBackoffPolicy", () => {
  it("doubles the delay up to the cap for retryable errors", () => {
    const policy = createExponentialBackoffPolicy({ baseDelayMs: 1_000, maxDelayMs: 5_000 });
    const transient = new TransientAPIError("busy");

    expect([1, 2, 3, 4].map((attempt) => policy.getDelayMs(attempt, transient))).toEqual([1_000, 2_000, 4_000, 5_000]);
    expect(policy.maxAttempts).toBe(5);
  });

  it("does not retry errors that are not retryable", () => {
    const policy = createExponentialBackoffPolicy();

    expect(policy.getDelayMs(1, new Error("bad request"))).toBeNull();
    expect(policy.getDelayMs(1, new EvaluationFailedError("no plan"))).toBeNull();
    expect(policy.getDelayMs(1, new GenerationFailedError("malformed", { retryable: true }))).toBe(4_000);
  });

  it("finds a retryable cause on a wrapped error", () => {
    const policy = createExponentialBackoffPolicy();
    const wrapped = new Error("outer", { cause: new TransientAPIError("inner") });

    expect(policy.getDelayMs(2, wrapped)).toBe(8_000);
  });
});

describe("runWithRetry", () => {
  it("returns the first success with its attempt count", async () => {
    const delays: number[] = [];
    const retried: number[] = [];

    const result = await runWithRetry(
      async (attempt) => {
        if (attempt < 3) {
          throw new TransientAPIError(`attempt ${attempt}`);
        }
        return "done";
      },
      createExponentialBackoffPolicy({ baseDelayMs: 10 }),
      {
        wait: async (ms) => {
          delays.push(ms);
        },
        onRetry: ({ attempt }) => retried.push(attempt),
      },
    );

    expect(result).toEqual({ ok: true, value: "done", attempts: 3 });
    expect(delays).toEqual([10, 20]);
    expect(retried).toEqual([1, 2]);
  });

  it("stops at the attempt limit", async () => {
    const result = await runWithRetry(
      async () => {
        throw new TransientAPIError("still busy");
      },
      createExponentialBackoffPolicy({ maxAttempts: 2, baseDelayMs: 0 }),
    );

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(2);
    if (!result.ok) {
      expect(result.error.message).toBe("still busy");
    }
  });

  it("ends the backoff wait when aborted", async () => {
    const controller = new AbortController();
    const result = await runWithRetry(
      async () => {
        setTimeout(() => controller.abort(new Error("cancelled")), 0);
        throw new TransientAPIError("busy");
      },
      createExponentialBackoffPolicy({ baseDelayMs: 60_000 }),
      { signal: controller.signal },
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("cancelled");
    }
  });
});

describe("sleep", () => {
  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error("stop"));

    await expect(pending).rejects.toThrow("stop");
  });
});
