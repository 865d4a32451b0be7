export type LlmUsageTokens = {
  readonly promptTokens?: number;
  readonly cachedTokens?: number;
  readonly responseTokens?: number;
  readonly thinkingTokens?: number;
  readonly totalTokens?: number;
};

type ModelPricing = {
  /** Prompt size above which the high-tier rates apply. */
  readonly threshold?: number;
  readonly inputRate: number;
  readonly cachedRate: number;
  readonly outputRate: number;
  readonly high?: { readonly inputRate: number; readonly cachedRate: number; readonly outputRate: number };
};

const perMillion = (usd: number): number => usd / 1_000_000;

// Pricing snapshot (best-effort, USD). Unknown models -> cost 0.
// Ordered so that more specific ids match first.
const PRICING: readonly (readonly [string, ModelPricing])[] = [
  ["gpt-5-mini", { inputRate: perMillion(0.25), cachedRate: perMillion(0.025), outputRate: perMillion(2) }],
  ["gpt-5-nano", { inputRate: perMillion(0.05), cachedRate: perMillion(0.005), outputRate: perMillion(0.4) }],
  ["gpt-5.2", { inputRate: perMillion(1.75), cachedRate: perMillion(0.175), outputRate: perMillion(14) }],
  ["gpt-5", { inputRate: perMillion(1.25), cachedRate: perMillion(0.125), outputRate: perMillion(10) }],
  ["gpt-4.1-mini", { inputRate: perMillion(0.4), cachedRate: perMillion(0.1), outputRate: perMillion(1.6) }],
  ["gpt-4.1", { inputRate: perMillion(2), cachedRate: perMillion(0.5), outputRate: perMillion(8) }],
  ["gpt-4o-mini", { inputRate: perMillion(0.15), cachedRate: perMillion(0.075), outputRate: perMillion(0.6) }],
  ["gpt-4o", { inputRate: perMillion(2.5), cachedRate: perMillion(1.25), outputRate: perMillion(10) }],
  ["o4-mini", { inputRate: perMillion(1.1), cachedRate: perMillion(0.275), outputRate: perMillion(4.4) }],
  ["o3", { inputRate: perMillion(2), cachedRate: perMillion(0.5), outputRate: perMillion(8) }],
  [
    "gemini-2.5-pro",
    {
      threshold: 200_000,
      inputRate: perMillion(1.25),
      cachedRate: perMillion(0.125),
      outputRate: perMillion(10),
      high: { inputRate: perMillion(2.5), cachedRate: perMillion(0.25), outputRate: perMillion(15) },
    },
  ],
  [
    "gemini-3-pro",
    {
      threshold: 200_000,
      inputRate: perMillion(2),
      cachedRate: perMillion(0.2),
      outputRate: perMillion(12),
      high: { inputRate: perMillion(4), cachedRate: perMillion(0.4), outputRate: perMillion(18) },
    },
  ],
  ["gemini-2.5-flash-lite", { inputRate: perMillion(0.1), cachedRate: perMillion(0.025), outputRate: perMillion(0.4) }],
  ["gemini-2.5-flash", { inputRate: perMillion(0.3), cachedRate: perMillion(0.075), outputRate: perMillion(2.5) }],
];

export function getModelPricing(modelId: string): ModelPricing | undefined {
  return PRICING.find(([prefix]) => modelId.includes(prefix))?.[1];
}

function resolveUsageNumber(value: number | undefined): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(0, value) : 0;
}

export function estimateCallCostUsd(modelId: string, tokens: LlmUsageTokens | undefined): number {
  const pricing = getModelPricing(modelId);
  if (!tokens || !pricing) {
    return 0;
  }
  const promptTokens = resolveUsageNumber(tokens.promptTokens);
  const cachedTokens = resolveUsageNumber(tokens.cachedTokens);
  const outputTokens = resolveUsageNumber(tokens.responseTokens) + resolveUsageNumber(tokens.thinkingTokens);
  const nonCachedPrompt = Math.max(0, promptTokens - cachedTokens);
  const useHighTier = pricing.high !== undefined && promptTokens > (pricing.threshold ?? Number.POSITIVE_INFINITY);
  const rates = useHighTier && pricing.high ? pricing.high : pricing;
  return nonCachedPrompt * rates.inputRate + cachedTokens * rates.cachedRate + outputTokens * rates.outputRate;
}
