import { z } from "zod";

import { formatZodIssues } from "../parser.js";

import { createGeminiToolSession, generateGeminiText } from "./gemini.js";
import { createOpenAiToolSession, generateOpenAiText } from "./openai.js";
import { estimateCallCostUsd } from "./pricing.js";
import { resolveModel } from "./provider.js";
import type {
  JsonSchema,
  LlmFunctionTool,
  LlmTextRequest,
  LlmTextResult,
  LlmToolCallResult,
  LlmToolLoopRequest,
  LlmToolLoopResult,
  LlmToolLoopStep,
  LlmToolSet,
  ProviderToolCall,
  ProviderToolOutput,
  ToolDeclaration,
  ToolLoopSession,
} from "./types.js";

const DEFAULT_TOOL_LOOP_MAX_STEPS = 40;

export function tool<Schema extends z.ZodType, Output>(options: {
  readonly description: string;
  readonly inputSchema: Schema;
  readonly execute: (input: z.output<Schema>) => Promise<Output> | Output;
}): LlmFunctionTool<Schema, Output> {
  return {
    description: options.description,
    inputSchema: options.inputSchema,
    execute: options.execute,
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toToolJsonSchema(schema: z.ZodType): JsonSchema {
  const json: unknown = z.toJSONSchema(schema, { io: "input" });
  if (!isPlainRecord(json)) {
    throw new Error("Tool input schema must convert to a JSON object schema.");
  }
  const { $schema: _dialect, ...rest } = json;
  return rest;
}

export function buildToolDeclarations(tools: LlmToolSet): ToolDeclaration[] {
  return Object.entries(tools).map(([name, entry]) => ({
    name,
    description: entry.description,
    parameters: toToolJsonSchema(entry.inputSchema),
  }));
}

function buildToolErrorOutput(
  message: string,
  issues?: readonly z.core.$ZodIssue[],
): Record<string, unknown> {
  const output: Record<string, unknown> = { error: message };
  if (issues && issues.length > 0) {
    output.issues = issues.map((issue) => ({
      path: issue.path.map(String),
      message: issue.message,
      code: issue.code,
    }));
  }
  return output;
}

/** Validates and runs one tool call. Failures become tool output for the model, never exceptions. */
export async function executeToolCall(
  call: ProviderToolCall,
  toolSet: LlmToolSet,
): Promise<LlmToolCallResult> {
  const { callId, name: toolName, rawInput, parseError } = call;
  const entry = toolSet[toolName];
  if (!entry) {
    const message = `Unknown tool: ${toolName}`;
    return { callId, toolName, input: rawInput, output: buildToolErrorOutput(message), error: message };
  }
  if (parseError) {
    const message = `Invalid JSON for tool ${toolName}: ${parseError}`;
    return { callId, toolName, input: rawInput, output: buildToolErrorOutput(message), error: message };
  }
  const parsed = entry.inputSchema.safeParse(rawInput);
  if (!parsed.success) {
    const message = `Invalid tool arguments for ${toolName}: ${formatZodIssues(parsed.error.issues)}`;
    return {
      callId,
      toolName,
      input: rawInput,
      output: buildToolErrorOutput(message, parsed.error.issues),
      error: message,
    };
  }
  try {
    const output = await entry.execute(parsed.data);
    return { callId, toolName, input: parsed.data, output };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      callId,
      toolName,
      input: parsed.data,
      output: buildToolErrorOutput(`Tool ${toolName} failed: ${message}`),
      error: message,
    };
  }
}

export async function generateText(request: LlmTextRequest): Promise<LlmTextResult> {
  const { provider, model } = resolveModel(request.model);
  const turn =
    provider === "gemini"
      ? await generateGeminiText(model, request)
      : await generateOpenAiText(model, request);
  return {
    text: turn.text,
    modelVersion: turn.modelVersion,
    usage: turn.usage,
    costUsd: estimateCallCostUsd(turn.modelVersion, turn.usage),
  };
}

function createToolSession(request: LlmToolLoopRequest, declarations: readonly ToolDeclaration[]): ToolLoopSession {
  const { provider, model } = resolveModel(request.model);
  return provider === "gemini"
    ? createGeminiToolSession(model, request, declarations)
    : createOpenAiToolSession(model, request, declarations);
}

/**
 * Calls the model repeatedly, executing requested tools between turns, until it answers without
 * tool calls, `shouldStop` reports true, or `maxSteps` is reached.
 */
export async function runToolLoop(request: LlmToolLoopRequest): Promise<LlmToolLoopResult> {
  const declarations = buildToolDeclarations(request.tools);
  if (declarations.length === 0) {
    throw new Error("Tool loop requires at least one tool definition.");
  }
  const maxSteps = Math.max(1, Math.floor(request.maxSteps ?? DEFAULT_TOOL_LOOP_MAX_STEPS));
  const session = createToolSession(request, declarations);

  const steps: LlmToolLoopStep[] = [];
  let totalCostUsd = 0;
  let outputs: ProviderToolOutput[] = [];
  let lastText = "";

  for (let stepIndex = 0; stepIndex < maxSteps; stepIndex += 1) {
    request.signal?.throwIfAborted();
    const turn = await session.send(outputs);
    const costUsd = estimateCallCostUsd(turn.modelVersion, turn.usage);
    totalCostUsd += costUsd;
    lastText = turn.text;

    // Sandbox tools mutate shared state, so calls within a turn run in order.
    const toolCalls: LlmToolCallResult[] = [];
    for (const call of turn.toolCalls) {
      toolCalls.push(await executeToolCall(call, request.tools));
    }
    const step: LlmToolLoopStep = {
      step: steps.length + 1,
      modelVersion: turn.modelVersion,
      text: turn.text || undefined,
      toolCalls,
      usage: turn.usage,
      costUsd,
    };
    steps.push(step);
    request.onStep?.(step);

    if (toolCalls.length === 0) {
      return { text: turn.text, steps, totalCostUsd, stopReason: "completed" };
    }
    if (request.shouldStop?.()) {
      return { text: turn.text, steps, totalCostUsd, stopReason: "stopped" };
    }
    outputs = toolCalls.map((result) => ({
      callId: result.callId,
      name: result.toolName,
      output: result.output,
    }));
  }
  return { text: lastText, steps, totalCostUsd, stopReason: "max_steps" };
}
