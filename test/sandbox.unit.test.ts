import { describe, expect, it } from "vitest";

import { SandboxProtocolError, TaskTimeoutError } from "../src/errors.js";
import { executeToolCall } from "../src/llm/llm.js";
import type { LlmToolSet, ToolLoopRunner } from "../src/llm/types.js";
import { createAgentEpisodeRunner, type EpisodeTask } from "../src/sandbox/episode.js";
import { createSandboxFileTools, resolveSandboxPath } from "../src/sandbox/fileTools.js";
import { InMemorySandboxFilesystem } from "../src/sandbox/filesystem.js";

import { scriptedToolLoop } from "./fixtures.js";

function createTools(files: Record<string, string> = {}): {
  readonly filesystem: InMemorySandboxFilesystem;
  readonly tools: LlmToolSet;
} {
  const filesystem = new InMemorySandboxFilesystem(files);
  const tools = createSandboxFileTools({ filesystem, cwd: "/repo", readOnlyPaths: ["/repo/paper/source.txt"] });
  return { filesystem, tools };
}

async function call(tools: LlmToolSet, name: string, input: unknown): Promise<{ output: unknown; error?: string }> {
  const result = await executeToolCall({ callId: "c", name, rawInput: input }, tools);
  return { output: result.output, error: result.error };
}

describe("sandbox file tools", () => {
  it("reads, pages and lists files", async () => {
    const { tools } = createTools({ "/repo/notes.txt": "one\ntwo\nthree", "/repo/src/a.ts": "" });

    expect((await call(tools, "read_file", { file_path: "notes.txt" })).output).toBe("one\ntwo\nthree");
    expect((await call(tools, "read_file", { file_path: "/repo/notes.txt", offset: 1, limit: 1 })).output).toBe("two");
    expect((await call(tools, "list_directory", { dir_path: "." })).output).toBe("notes.txt\n[DIR] src");
  });

  it("writes and replaces text", async () => {
    const { filesystem, tools } = createTools();

    expect((await call(tools, "write_file", { file_path: "out/plan.jsonl", content: "a a b" })).output).toBe(
      "Successfully wrote file: out/plan.jsonl",
    );
    expect(
      (await call(tools, "replace", { file_path: "out/plan.jsonl", old_string: "a", new_string: "c", expected_replacements: 2 }))
        .output,
    ).toBe("Successfully replaced 2 occurrence(s) in out/plan.jsonl.");
    expect((await call(tools, "replace", { file_path: "out/plan.jsonl", old_string: "a", new_string: "c" })).error).toBe(
      "Failed to edit, could not find old_string in file.",
    );
    expect(filesystem.snapshot()).toEqual({ "/repo/out/plan.jsonl": "c c b" });
  });

  it("keeps the agent inside the working directory and off read-only files", async () => {
    const { tools } = createTools({ "/repo/paper/source.txt": "paper", "/etc/passwd": "root" });

    expect((await call(tools, "read_file", { file_path: "../etc/passwd" })).error).toBe(
      'path "../etc/passwd" resolves outside cwd "/repo"',
    );
    expect((await call(tools, "replace", { file_path: "paper/source.txt", old_string: "paper", new_string: "x" })).error).toBe(
      "paper/source.txt is read-only.",
    );
    expect((await call(tools, "read_file", { file_path: "missing.txt" })).error).toBe(
      "ENOENT: no such file or directory, open '/repo/missing.txt'",
    );
    expect(resolveSandboxPath("a/../b.txt", "/repo")).toBe("/repo/b.txt");
  });

  it("refuses access after disposal", async () => {
    const filesystem = new InMemorySandboxFilesystem({ "/a.txt": "x" });
    filesystem.dispose();

    await expect(filesystem.readTextFile("/a.txt")).rejects.toThrow("Sandbox filesystem has been disposed.");
  });
});

const task: EpisodeTask<string[]> = {
  id: "task-1",
  instructions: "Write lines.",
  prompt: "Go.",
  submission: {
    path: "/repo/out.txt",
    validate: (content) => {
      const lines = content.split("\n").filter((line) => line.length > 0);
      if (lines.length === 0) {
        throw new Error("out.txt is empty.");
      }
      return lines;
    },
  },
};

describe("createAgentEpisodeRunner", () => {
  it("returns the validated artifact and the episode cost", async () => {
    const loop = scriptedToolLoop(
      [
        [{ name: "write_file", input: { file_path: "out.txt", content: "x\ny\n" } }],
        [{ name: "submit", input: {} }],
        [{ name: "read_file", input: { file_path: "out.txt" } }],
      ],
      0.5,
    );
    const runner = createAgentEpisodeRunner({ model: "gpt-5-mini", runLoop: loop.runLoop });

    const outcome = await runner.run(task);

    expect(outcome).toEqual({ ok: true, artifact: ["x", "y"], submission: "x\ny\n", costUsd: 1, steps: 2 });
    expect(loop.requests[0]).toMatchObject({ model: "gpt-5-mini", instructions: "Write lines.", input: "Go.", maxSteps: 40 });
  });

  it("fails after too many rejected submissions", async () => {
    const loop = scriptedToolLoop([
      [{ name: "write_file", input: { file_path: "out.txt", content: "" } }],
      [{ name: "submit", input: {} }],
      [{ name: "submit", input: {} }],
    ]);
    const runner = createAgentEpisodeRunner({ model: "m", maxSubmitAttempts: 2, runLoop: loop.runLoop });

    const outcome = await runner.run(task);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(SandboxProtocolError);
      expect(outcome.error.message).toBe("Submission rejected 2 time(s); last error: out.txt is empty.");
    }
  });

  it("fails when the step budget runs out", async () => {
    const loop = scriptedToolLoop([
      [{ name: "list_directory", input: { dir_path: "." } }],
      [{ name: "list_directory", input: { dir_path: "." } }],
    ]);
    const runner = createAgentEpisodeRunner({ model: "m", maxSteps: 1, runLoop: loop.runLoop });

    const outcome = await runner.run(task);

    expect(outcome).toMatchObject({ ok: false, steps: 1 });
    if (!outcome.ok) {
      expect(outcome.error.message).toBe("Episode ended (max_steps) without an accepted submission.");
    }
  });

  it("reports the timeout when the episode overruns", async () => {
    const hang: ToolLoopRunner = (request) =>
      new Promise((_resolve, reject) => {
        request.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    const runner = createAgentEpisodeRunner({ model: "m", timeoutMs: 10, runLoop: hang });

    const outcome = await runner.run(task);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(TaskTimeoutError);
      expect(outcome.error.message).toBe("Episode timeout exceeded after 10 ms.");
    }
  });
});
