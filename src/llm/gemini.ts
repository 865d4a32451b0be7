import {
  GoogleGenAI,
  type Content,
  type FunctionDeclaration,
  type GenerateContentConfig,
  type GenerateContentResponse,
  type Part,
} from "@google/genai";

import { ConfigurationError } from "../errors.js";
import { loadLocalEnv } from "../utils/env.js";

import type { LlmUsageTokens } from "./pricing.js";
import { callProvider, resolveRequestTimeoutMs } from "./provider.js";
import type {
  LlmReasoningEffort,
  LlmTextRequest,
  ProviderToolCall,
  ProviderTurn,
  ToolDeclaration,
  ToolLoopSession,
} from "./types.js";

const DEFAULT_VERTEX_LOCATION = "global";

const THINKING_BUDGETS: Record<LlmReasoningEffort, number> = {
  low: 1_024,
  medium: 8_192,
  high: 24_576,
};

let cachedClient: GoogleGenAI | null = null;

/** API-key access via `GEMINI_API_KEY`/`GOOGLE_API_KEY`, or Vertex AI when `GOOGLE_CLOUD_PROJECT` is set. */
export function getGeminiClient(): GoogleGenAI {
  if (cachedClient) {
    return cachedClient;
  }
  loadLocalEnv();
  const httpOptions = { timeout: resolveRequestTimeoutMs() };
  const apiKey = process.env.GEMINI_API_KEY?.trim() || process.env.GOOGLE_API_KEY?.trim();
  const project = process.env.GOOGLE_CLOUD_PROJECT?.trim();
  if (apiKey) {
    cachedClient = new GoogleGenAI({ apiKey, httpOptions });
  } else if (project) {
    cachedClient = new GoogleGenAI({
      vertexai: true,
      project,
      location: process.env.GOOGLE_CLOUD_LOCATION?.trim() || DEFAULT_VERTEX_LOCATION,
      httpOptions,
    });
  } else {
    throw new ConfigurationError(
      "GEMINI_API_KEY (or GOOGLE_CLOUD_PROJECT for Vertex AI) must be provided to call Gemini models.",
    );
  }
  return cachedClient;
}

function extractUsage(response: GenerateContentResponse): LlmUsageTokens | undefined {
  const usage = response.usageMetadata;
  if (!usage) {
    return undefined;
  }
  return {
    promptTokens: usage.promptTokenCount,
    cachedTokens: usage.cachedContentTokenCount,
    responseTokens: usage.candidatesTokenCount,
    thinkingTokens: usage.thoughtsTokenCount,
    totalTokens: usage.totalTokenCount,
  };
}

function extractText(content: Content | undefined): string {
  return (content?.parts ?? [])
    .filter((part) => part.thought !== true && typeof part.text === "string")
    .map((part) => part.text ?? "")
    .join("")
    .trim();
}

function buildConfig(request: LlmTextRequest): GenerateContentConfig {
  return {
    ...(request.instructions ? { systemInstruction: request.instructions } : {}),
    ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    ...(request.reasoningEffort
      ? { thinkingConfig: { thinkingBudget: THINKING_BUDGETS[request.reasoningEffort] } }
      : {}),
    ...(request.signal ? { abortSignal: request.signal } : {}),
  };
}

async function generateContent(
  model: string,
  contents: Content[],
  config: GenerateContentConfig,
  signal: AbortSignal | undefined,
): Promise<GenerateContentResponse> {
  const client = getGeminiClient();
  return callProvider("Gemini", signal, () => client.models.generateContent({ model, contents, config }));
}

export async function generateGeminiText(model: string, request: LlmTextRequest): Promise<ProviderTurn> {
  const response = await generateContent(
    model,
    [{ role: "user", parts: [{ text: request.input }] }],
    buildConfig(request),
    request.signal,
  );
  const content = response.candidates?.[0]?.content;
  return {
    text: extractText(content),
    modelVersion: response.modelVersion ?? model,
    usage: extractUsage(response),
    toolCalls: [],
  };
}

export function createGeminiToolSession(
  model: string,
  request: LlmTextRequest,
  declarations: readonly ToolDeclaration[],
): ToolLoopSession {
  const functionDeclarations: FunctionDeclaration[] = declarations.map((declaration) => ({
    name: declaration.name,
    description: declaration.description,
    parametersJsonSchema: declaration.parameters,
  }));
  const config: GenerateContentConfig = {
    ...buildConfig(request),
    tools: [{ functionDeclarations }],
  };
  const contents: Content[] = [{ role: "user", parts: [{ text: request.input }] }];
  // Calls without a provider id get a local one that must not be echoed back.
  const localCallIds = new Set<string>();

  return {
    send: async (outputs) => {
      if (outputs.length > 0) {
        const parts: Part[] = outputs.map((output) => ({
          functionResponse: {
            ...(localCallIds.has(output.callId) ? {} : { id: output.callId }),
            name: output.name,
            response: { output: output.output },
          },
        }));
        contents.push({ role: "user", parts });
      }
      const response = await generateContent(model, contents, config, request.signal);
      const content = response.candidates?.[0]?.content;
      if (content) {
        contents.push({ role: "model", parts: content.parts ?? [] });
      }
      const toolCalls: ProviderToolCall[] = (response.functionCalls ?? []).map((call, index) => {
        const name = call.name ?? "";
        let callId = call.id;
        if (!callId) {
          callId = `${name}-${contents.length}-${index}`;
          localCallIds.add(callId);
        }
        return { callId, name, rawInput: call.args ?? {} };
      });
      return {
        text: extractText(content),
        modelVersion: response.modelVersion ?? model,
        usage: extractUsage(response),
        toolCalls,
      };
    },
  };
}
