import type { z } from "zod";

import type { LlmUsageTokens } from "./pricing.js";

export type { LlmUsageTokens } from "./pricing.js";

export type JsonSchema = Record<string, unknown>;

export type LlmReasoningEffort = "low" | "medium" | "high";

export type LlmTextRequest = {
  readonly model: string;
  readonly instructions?: string;
  readonly input: string;
  readonly temperature?: number;
  readonly reasoningEffort?: LlmReasoningEffort;
  readonly signal?: AbortSignal;
};

export type LlmTextResult = {
  readonly text: string;
  readonly modelVersion: string;
  readonly usage?: LlmUsageTokens;
  readonly costUsd: number;
};

export type LlmFunctionTool<Schema extends z.ZodType, Output> = {
  readonly description: string;
  readonly inputSchema: Schema;
  execute(input: z.output<Schema>): Promise<Output> | Output;
};

export type LlmToolSet = Record<string, LlmFunctionTool<z.ZodType, unknown>>;

export type LlmToolCallResult = {
  readonly toolName: string;
  readonly input: unknown;
  readonly output: unknown;
  readonly error?: string;
  readonly callId: string;
};

export type LlmToolLoopStep = {
  readonly step: number;
  readonly modelVersion: string;
  readonly text?: string;
  readonly toolCalls: readonly LlmToolCallResult[];
  readonly usage?: LlmUsageTokens;
  readonly costUsd: number;
};

export type LlmToolLoopStopReason = "completed" | "stopped" | "max_steps";

export type LlmToolLoopResult = {
  readonly text: string;
  readonly steps: readonly LlmToolLoopStep[];
  readonly totalCostUsd: number;
  readonly stopReason: LlmToolLoopStopReason;
};

export type LlmToolLoopRequest = LlmTextRequest & {
  readonly tools: LlmToolSet;
  readonly maxSteps?: number;
  /** Checked after every step that executed tools; `true` ends the loop. */
  readonly shouldStop?: () => boolean;
  readonly onStep?: (step: LlmToolLoopStep) => void;
};

export type TextGenerator = (request: LlmTextRequest) => Promise<LlmTextResult>;
export type ToolLoopRunner = (request: LlmToolLoopRequest) => Promise<LlmToolLoopResult>;

export type ToolDeclaration = {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchema;
};

export type ProviderToolCall = {
  readonly callId: string;
  readonly name: string;
  readonly rawInput: unknown;
  readonly parseError?: string;
};

export type ProviderTurn = {
  readonly text: string;
  readonly modelVersion: string;
  readonly usage?: LlmUsageTokens;
  readonly toolCalls: readonly ProviderToolCall[];
};

export type ProviderToolOutput = {
  readonly callId: string;
  readonly name: string;
  readonly output: unknown;
};

/** One multi-turn conversation with a provider; the first `send` carries no tool outputs. */
export type ToolLoopSession = {
  readonly send: (outputs: readonly ProviderToolOutput[]) => Promise<ProviderTurn>;
};
