import { counterpartNames, type MatchSet, type PaperMatch } from "./types.js";

export type ScoreCounts = {
  /** Considered plan entries credited with at least one match. */
  readonly matchedPlan: number;
  /** Ground-truth items credited with a match. */
  readonly matchedTruth: number;
  readonly planSize: number;
  readonly groundTruthSize: number;
};

export type Scores = {
  readonly precision: number;
  readonly recall: number;
  readonly f1: number;
};

/** Precision, recall and F1 with every zero denominator defined as 0. */
export function score(counts: ScoreCounts): Scores {
  const precision = counts.planSize > 0 ? Math.min(1, counts.matchedPlan / counts.planSize) : 0;
  const recall =
    counts.groundTruthSize > 0 ? Math.min(1, counts.matchedTruth / counts.groundTruthSize) : 0;
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
  return { precision, recall, f1 };
}

/**
 * Counts matches against the considered (top-k) plan names. Counterparts outside that set never
 * count, so truncating the plan can only remove credit.
 */
export function countMatches(
  matchSet: MatchSet,
  consideredPlanNames: readonly string[],
  groundTruthSize: number,
): ScoreCounts {
  const considered = new Set(consideredPlanNames);
  if (matchSet.mode === "researcher") {
    const matchedPapers = new Set<string>();
    const referencedPlans = new Set<string>();
    for (const match of matchSet.matches) {
      const hits = counterpartNames(match).filter((name) => considered.has(name));
      if (hits.length === 0) {
        continue;
      }
      matchedPapers.add(match.name_in_paper);
      for (const hit of hits) {
        referencedPlans.add(hit);
      }
    }
    return {
      matchedPlan: referencedPlans.size,
      matchedTruth: matchedPapers.size,
      planSize: considered.size,
      groundTruthSize,
    };
  }
  const appearing = new Set<string>();
  for (const match of matchSet.matches) {
    if (match.appears_in_review && considered.has(match.name_in_plan)) {
      appearing.add(match.name_in_plan);
    }
  }
  // Appearing items beyond the review count are neither credited nor false positives.
  const matched = Math.min(appearing.size, groundTruthSize);
  const notAppearing = considered.size - appearing.size;
  return { matchedPlan: matched, matchedTruth: matched, planSize: matched + notAppearing, groundTruthSize };
}

export function scoreMatches(
  matchSet: MatchSet,
  consideredPlanNames: readonly string[],
  groundTruthSize: number,
): Scores & { readonly counts: ScoreCounts } {
  const counts = countMatches(matchSet, consideredPlanNames, groundTruthSize);
  return { ...score(counts), counts };
}

/** Relevance of each ranked plan name: whether a matched paper ablation refers to it. */
export function rankedRelevance(matches: readonly PaperMatch[], rankedPlanNames: readonly string[]): boolean[] {
  const referenced = new Set(matches.flatMap((match) => counterpartNames(match)));
  return rankedPlanNames.map((name) => referenced.has(name));
}

function discountedGain(relevance: readonly boolean[], k: number): number {
  let total = 0;
  for (const [rank, relevant] of relevance.slice(0, k).entries()) {
    if (relevant) {
      total += 1 / Math.log2(rank + 2);
    }
  }
  return total;
}

/**
 * Binary nDCG@k of a ranked relevance list, normalized by the same labels in ideal order.
 * 0 when `k` is 0 or nothing is relevant.
 */
export function ndcgAtK(relevance: readonly boolean[], k: number): number {
  const ideal = discountedGain(
    [...relevance].sort((left, right) => Number(right) - Number(left)),
    k,
  );
  return ideal > 0 ? discountedGain(relevance, k) / ideal : 0;
}

/** nDCG of the ranked plan at min(plan size, ground-truth size); reviewer verdicts carry no ranking score. */
export function rankingScore(
  matchSet: MatchSet,
  rankedPlanNames: readonly string[],
  groundTruthSize: number,
): number | null {
  if (matchSet.mode !== "researcher") {
    return null;
  }
  const k = Math.min(rankedPlanNames.length, groundTruthSize);
  return ndcgAtK(rankedRelevance(matchSet.matches, rankedPlanNames), k);
}

export type MetricSummary = {
  readonly mean: number;
  readonly stdDev: number;
};

export type AggregateScores = {
  readonly precision: MetricSummary;
  readonly recall: MetricSummary;
  readonly f1: MetricSummary;
  /** Over the results that carry an nDCG; null when none does. */
  readonly ndcg: MetricSummary | null;
  readonly succeeded: number;
  readonly failed: number;
  readonly totalCostUsd: number;
  readonly meanCostUsd: number;
};

function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Sample standard deviation; 0 for fewer than two values. */
function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const average = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

function summarize(values: readonly number[]): MetricSummary {
  return { mean: mean(values), stdDev: sampleStdDev(values) };
}

/**
 * Macro average over succeeded records: each record weighs the same regardless of plan or
 * ground-truth size. Failed records are only counted.
 */
export function aggregateScores(
  results: readonly (Scores & { readonly costUsd: number; readonly ndcg?: number | null })[],
  failed: number,
): AggregateScores {
  const costs = results.map((result) => result.costUsd);
  const ndcgValues: number[] = [];
  for (const result of results) {
    if (typeof result.ndcg === "number") {
      ndcgValues.push(result.ndcg);
    }
  }
  return {
    precision: summarize(results.map((result) => result.precision)),
    recall: summarize(results.map((result) => result.recall)),
    f1: summarize(results.map((result) => result.f1)),
    ndcg: ndcgValues.length > 0 ? summarize(ndcgValues) : null,
    succeeded: results.length,
    failed,
    totalCostUsd: costs.reduce((sum, cost) => sum + cost, 0),
    meanCostUsd: mean(costs),
  };
}
