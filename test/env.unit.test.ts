import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { loadEnvFromFile, readPrefixedEnvFlag, readPrefixedEnvNumber } from "../src/utils/env.js";

function withEnv<T>(updates: Record<string, string | undefined>, fn: () => T): T {
  const prev: Record<string, string | undefined> = {};
  for (const key of Object.keys(updates)) {
    prev[key] = process.env[key];
    const next = updates[key];
    if (next === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = next;
    }
  }
  try {
    return fn();
  } finally {
    for (const key of Object.keys(updates)) {
      const value = prev[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

describe("env", () => {
  it("loads .env.local entries without replacing variables that are already set", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ablation-bench-env-"));
    const filePath = path.join(tmpDir, ".env.local");
    fs.writeFileSync(
      filePath,
      [
        "# provider keys",
        "OPENAI_API_KEY=test-secret",
        'export ABLATIONS_OUTPUT_DIR="runs/planning"',
        "GEMINI_API_KEY='test-gemini-secret'",
        "ABLATIONS_PARALLELISM=  4  ",
        "ABLATIONS_DEBUG=1 # verbose",
        "",
      ].join("\n"),
      "utf8",
    );

    withEnv(
      {
        OPENAI_API_KEY: "already-set",
        ABLATIONS_OUTPUT_DIR: undefined,
        GEMINI_API_KEY: undefined,
        ABLATIONS_PARALLELISM: undefined,
        ABLATIONS_DEBUG: undefined,
      },
      () => {
        loadEnvFromFile(filePath);

        expect(process.env.OPENAI_API_KEY).toBe("already-set");
        expect(process.env.ABLATIONS_OUTPUT_DIR).toBe("runs/planning");
        expect(process.env.GEMINI_API_KEY).toBe("test-gemini-secret");
        expect(process.env.ABLATIONS_PARALLELISM).toBe("4");
        expect(process.env.ABLATIONS_DEBUG).toBe("1");
      },
    );
  });

  it("replaces existing variables when override is set", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ablation-bench-env-"));
    const filePath = path.join(tmpDir, ".env.local");
    fs.writeFileSync(filePath, "ABLATIONS_MAX_ATTEMPTS=2\n", "utf8");

    withEnv({ ABLATIONS_MAX_ATTEMPTS: "5" }, () => {
      loadEnvFromFile(filePath, { override: true });
      expect(process.env.ABLATIONS_MAX_ATTEMPTS).toBe("2");
    });
  });

  it("reads prefixed numbers and flags", () => {
    withEnv({ ABLATIONS_PARALLELISM: " 8 ", ABLATIONS_DEBUG: "Yes", ABLATIONS_MAX_ATTEMPTS: "" }, () => {
      expect(readPrefixedEnvNumber("PARALLELISM")).toBe(8);
      expect(readPrefixedEnvNumber("MAX_ATTEMPTS")).toBeUndefined();
      expect(readPrefixedEnvFlag("DEBUG")).toBe(true);
    });
    withEnv({ ABLATIONS_PARALLELISM: "many" }, () => {
      expect(() => readPrefixedEnvNumber("PARALLELISM")).toThrow('ABLATIONS_PARALLELISM must be a number, got "many".');
    });
  });

  it("ignores a missing file", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ablation-bench-env-"));
    expect(() => loadEnvFromFile(path.join(tmpDir, "absent.env"))).not.toThrow();
  });
});
