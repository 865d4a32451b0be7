import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { executeToolCall } from "../src/llm/llm.js";
import type {
  LlmTextRequest,
  LlmTextResult,
  LlmToolCallResult,
  LlmToolLoopRequest,
  LlmToolLoopResult,
  LlmToolLoopStep,
  TextGenerator,
  ToolLoopRunner,
} from "../src/llm/types.js";
import type { AblationSuggestion, PaperRecord, Plan } from "../src/types.js";
import type { Logger } from "../src/utils/logger.js";

export function makeTempDir(prefix = "ablation-bench-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function suggestion(name: string, ablatedPart = `${name} part`): AblationSuggestion {
  return { name, ablated_part: ablatedPart, action: "REMOVE", metrics: ["accuracy"] };
}

export function makeRecord(overrides: Partial<PaperRecord> = {}): PaperRecord {
  return {
    id: "paper-1",
    title: "Gated Widgets",
    abstract: "We gate widgets.",
    source: "\\section{Method} Widgets are gated.",
    ablations: [suggestion("A", "attention module")],
    reviews: [],
    reviewAblationCount: 0,
    ...overrides,
  };
}

export function makePlan(names: readonly string[], overrides: Partial<Plan> = {}): Plan {
  return {
    recordId: "paper-1",
    planner: "test",
    model: "test-model",
    suggestions: names.map((name) => suggestion(name)),
    discussion: "",
    costUsd: 0,
    ...overrides,
  };
}

/** Answers every request with the next scripted text. */
export function fakeTextGenerator(
  responses: readonly string[],
  costUsd = 0.01,
): { readonly generate: TextGenerator; readonly requests: LlmTextRequest[] } {
  const requests: LlmTextRequest[] = [];
  let index = 0;
  const generate: TextGenerator = async (request): Promise<LlmTextResult> => {
    requests.push(request);
    const text = responses[Math.min(index, responses.length - 1)];
    index += 1;
    if (text === undefined) {
      throw new Error("No scripted response");
    }
    return { text, modelVersion: request.model, costUsd };
  };
  return { generate, requests };
}

export type ScriptedCall = { readonly name: string; readonly input: unknown };

export type ScriptedToolLoop = {
  readonly runLoop: ToolLoopRunner;
  readonly requests: LlmToolLoopRequest[];
  /** Tool results of every executed call, in order. */
  readonly results: LlmToolCallResult[];
};

/**
 * A tool loop whose "model" issues the scripted calls turn by turn, executing them against the
 * real tools. An empty turn ends the loop like a final text answer.
 */
export function scriptedToolLoop(
  turns: readonly (readonly ScriptedCall[])[],
  costPerStepUsd = 0.001,
): ScriptedToolLoop {
  const requests: LlmToolLoopRequest[] = [];
  const results: LlmToolCallResult[] = [];
  const runLoop: ToolLoopRunner = async (request): Promise<LlmToolLoopResult> => {
    requests.push(request);
    const steps: LlmToolLoopStep[] = [];
    const finish = (stopReason: LlmToolLoopResult["stopReason"]): LlmToolLoopResult => ({
      text: "",
      steps,
      totalCostUsd: steps.length * costPerStepUsd,
      stopReason,
    });
    const maxSteps = request.maxSteps ?? 40;
    for (const [turnIndex, turn] of turns.entries()) {
      if (turnIndex >= maxSteps) {
        return finish("max_steps");
      }
      const toolCalls: LlmToolCallResult[] = [];
      for (const [callIndex, call] of turn.entries()) {
        const result = await executeToolCall(
          { callId: `call_${turnIndex}_${callIndex}`, name: call.name, rawInput: call.input },
          request.tools,
        );
        toolCalls.push(result);
        results.push(result);
      }
      const step: LlmToolLoopStep = {
        step: turnIndex + 1,
        modelVersion: "scripted",
        toolCalls,
        costUsd: costPerStepUsd,
      };
      steps.push(step);
      request.onStep?.(step);
      if (toolCalls.length === 0) {
        return finish("completed");
      }
      if (request.shouldStop?.()) {
        return finish("stopped");
      }
    }
    return finish("completed");
  };
  return { runLoop, requests, results };
}

export type RecordedLog = { readonly level: "debug" | "info" | "warn" | "error"; readonly message: string };

/** A logger that keeps every message, children included. */
export function recordingLogger(): Logger & { readonly entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  const create = (): Logger => ({
    debug: (message) => entries.push({ level: "debug", message }),
    info: (message) => entries.push({ level: "info", message }),
    warn: (message) => entries.push({ level: "warn", message }),
    error: (message) => entries.push({ level: "error", message }),
    child: () => create(),
  });
  return { ...create(), entries };
}
