import OpenAI from "openai";
import type {
  FunctionTool,
  Response as OpenAiResponse,
  ResponseCreateParamsNonStreaming,
  ResponseInputItem,
  ResponseUsage,
} from "openai/resources/responses/responses";
import { Agent } from "undici";

import { ConfigurationError } from "../errors.js";
import { loadLocalEnv } from "../utils/env.js";

import type { LlmUsageTokens } from "./pricing.js";
import { callProvider, resolveRequestTimeoutMs } from "./provider.js";
import type {
  LlmTextRequest,
  ProviderToolCall,
  ProviderTurn,
  ToolDeclaration,
  ToolLoopSession,
} from "./types.js";

let cachedClient: OpenAI | null = null;

export function getOpenAiClient(): OpenAI {
  if (cachedClient) {
    return cachedClient;
  }
  loadLocalEnv();
  const apiKey = process.env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY must be provided to call OpenAI models.");
  }
  const timeoutMs = resolveRequestTimeoutMs();
  const dispatcher = new Agent({ bodyTimeout: timeoutMs, headersTimeout: timeoutMs });
  cachedClient = new OpenAI({
    apiKey,
    baseURL: process.env.OPENAI_BASE_URL?.trim() || undefined,
    timeout: timeoutMs,
    fetchOptions: { dispatcher },
  });
  return cachedClient;
}

function extractUsage(usage: ResponseUsage | undefined): LlmUsageTokens | undefined {
  if (!usage) {
    return undefined;
  }
  const reasoningTokens = usage.output_tokens_details?.reasoning_tokens ?? 0;
  return {
    promptTokens: usage.input_tokens,
    cachedTokens: usage.input_tokens_details?.cached_tokens ?? 0,
    responseTokens: Math.max(0, usage.output_tokens - reasoningTokens),
    thinkingTokens: reasoningTokens,
    totalTokens: usage.total_tokens,
  };
}

function parseToolArguments(raw: string): { value: unknown; error?: string } {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return { value: {} };
  }
  try {
    return { value: JSON.parse(trimmed) };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { value: raw, error: message };
  }
}

function toProviderTurn(response: OpenAiResponse): ProviderTurn {
  if (response.error) {
    throw new Error(`OpenAI response failed: ${response.error.message}`);
  }
  const toolCalls: ProviderToolCall[] = [];
  for (const item of response.output) {
    if (item.type === "function_call") {
      const { value, error } = parseToolArguments(item.arguments);
      toolCalls.push({ callId: item.call_id, name: item.name, rawInput: value, parseError: error });
    }
  }
  return {
    text: response.output_text.trim(),
    modelVersion: response.model,
    usage: extractUsage(response.usage),
    toolCalls,
  };
}

function buildRequestBase(
  model: string,
  request: LlmTextRequest,
): Omit<ResponseCreateParamsNonStreaming, "input"> {
  return {
    model,
    ...(request.instructions ? { instructions: request.instructions } : {}),
    ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    ...(request.reasoningEffort ? { reasoning: { effort: request.reasoningEffort } } : {}),
  };
}

async function createResponse(
  body: ResponseCreateParamsNonStreaming,
  signal: AbortSignal | undefined,
): Promise<OpenAiResponse> {
  const client = getOpenAiClient();
  return callProvider("OpenAI", signal, () => client.responses.create(body, { signal }));
}

export async function generateOpenAiText(model: string, request: LlmTextRequest): Promise<ProviderTurn> {
  const response = await createResponse(
    { ...buildRequestBase(model, request), input: request.input },
    request.signal,
  );
  return toProviderTurn(response);
}

function serializeToolOutput(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  try {
    return JSON.stringify(value);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({ error: "Failed to serialize tool output", detail: message });
  }
}

export function createOpenAiToolSession(
  model: string,
  request: LlmTextRequest,
  declarations: readonly ToolDeclaration[],
): ToolLoopSession {
  const tools: FunctionTool[] = declarations.map((declaration) => ({
    type: "function",
    name: declaration.name,
    description: declaration.description,
    parameters: declaration.parameters,
    strict: false,
  }));
  let previousResponseId: string | undefined;

  return {
    send: async (outputs) => {
      const input: string | ResponseInputItem[] =
        previousResponseId === undefined
          ? request.input
          : outputs.map(
              (output): ResponseInputItem => ({
                type: "function_call_output",
                call_id: output.callId,
                output: serializeToolOutput(output.output),
              }),
            );
      const response = await createResponse(
        {
          ...buildRequestBase(model, request),
          input,
          tools,
          ...(previousResponseId ? { previous_response_id: previousResponseId } : {}),
        },
        request.signal,
      );
      previousResponseId = response.id;
      return toProviderTurn(response);
    },
  };
}
