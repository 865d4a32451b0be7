import type { TiePolicy } from "../config.js";
import { EvaluationFailedError, isRetryableError, toError } from "../errors.js";
import {
  counterpartNames,
  type BenchmarkMode,
  type MatchSet,
  type PaperMatch,
  type PaperRecord,
  type Plan,
  type ReviewMatch,
} from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

import {
  consideredSuggestions,
  reconcilePaperMatches,
  type EvaluateOptions,
  type Judge,
  type JudgeOutput,
} from "./judge.js";

/** Strict majority of `votes` over `voters`; an exact half follows the tie policy. */
export function majorityVerdict(votes: number, voters: number, tiePolicy: TiePolicy): boolean {
  if (votes * 2 > voters) {
    return true;
  }
  if (votes * 2 === voters && voters > 0) {
    return tiePolicy === "matched";
  }
  return false;
}

function counterpartKey(match: PaperMatch): string {
  return JSON.stringify([...new Set(counterpartNames(match))].sort());
}

/** The counterpart chosen by most matching members; list counterparts compare as sets. */
function mostFrequentCounterpart(matches: readonly PaperMatch[]): PaperMatch["name_in_plan"] {
  const tally = new Map<string, { readonly value: PaperMatch["name_in_plan"]; count: number }>();
  for (const match of matches) {
    const key = counterpartKey(match);
    const entry = tally.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      tally.set(key, { value: match.name_in_plan, count: 1 });
    }
  }
  let best: { readonly value: PaperMatch["name_in_plan"]; count: number } | undefined;
  for (const entry of tally.values()) {
    if (!best || entry.count > best.count) {
      best = entry;
    }
  }
  return best?.value ?? null;
}

export function combinePaperVerdicts(
  memberMatches: readonly (readonly PaperMatch[])[],
  record: PaperRecord,
  tiePolicy: TiePolicy,
): PaperMatch[] {
  const reconciled = memberMatches.map((matches) => reconcilePaperMatches(matches, record.ablations));
  return record.ablations.map((ablation, index) => {
    const votes: PaperMatch[] = [];
    for (const matches of reconciled) {
      const vote = matches[index];
      if (vote && vote.name_in_plan !== null) {
        votes.push(vote);
      }
    }
    const matched = majorityVerdict(votes.length, reconciled.length, tiePolicy);
    return {
      name_in_paper: ablation.name,
      name_in_plan: matched ? mostFrequentCounterpart(votes) : null,
    };
  });
}

export function combineReviewVerdicts(
  memberMatches: readonly (readonly ReviewMatch[])[],
  planNames: readonly string[],
  tiePolicy: TiePolicy,
): ReviewMatch[] {
  return planNames.map((name) => {
    let votes = 0;
    for (const matches of memberMatches) {
      if (matches.some((match) => match.name_in_plan === name && match.appears_in_review)) {
        votes += 1;
      }
    }
    return { name_in_plan: name, appears_in_review: majorityVerdict(votes, memberMatches.length, tiePolicy) };
  });
}

/** Runs every member on the same plan and keeps the per-item majority verdict. */
export class MajorityJudge implements Judge {
  readonly kind = "majority";
  readonly name = "majority";
  readonly mode: BenchmarkMode;
  readonly #members: readonly Judge[];
  readonly #tiePolicy: TiePolicy;
  readonly #logger: Logger;

  constructor(
    options: { readonly mode: BenchmarkMode; readonly tiePolicy: TiePolicy; readonly members: readonly Judge[] },
    logger: Logger = silentLogger,
  ) {
    if (options.members.length === 0) {
      throw new Error("Majority judge requires at least one member.");
    }
    this.mode = options.mode;
    this.#members = options.members;
    this.#tiePolicy = options.tiePolicy;
    this.#logger = logger;
  }

  async evaluate(record: PaperRecord, plan: Plan, options: EvaluateOptions = {}): Promise<JudgeOutput> {
    const settled = await Promise.allSettled(
      this.#members.map((member) => member.evaluate(record, plan, options)),
    );
    const outputs: JudgeOutput[] = [];
    const failures: Error[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        outputs.push(result.value);
        return;
      }
      const error = toError(result.reason);
      failures.push(error);
      this.#logger.warn(
        `${record.id}: member ${index + 1} (${this.#members[index]?.name ?? "unknown"}) failed: ${error.message}`,
      );
    });
    if (outputs.length === 0) {
      const first = failures[0];
      throw new EvaluationFailedError(
        `All ${this.#members.length} member judge(s) failed for ${record.id}` + (first ? `: ${first.message}` : "."),
        { cause: first, retryable: failures.some((failure) => isRetryableError(failure)) },
      );
    }
    const costUsd = outputs.reduce((sum, output) => sum + output.costUsd, 0);
    return { matches: this.#combine(outputs, record, plan, options.topK), costUsd };
  }

  #combine(outputs: readonly JudgeOutput[], record: PaperRecord, plan: Plan, topK?: number): MatchSet {
    if (this.mode === "researcher") {
      const memberMatches: (readonly PaperMatch[])[] = [];
      for (const { matches } of outputs) {
        if (matches.mode === "researcher") {
          memberMatches.push(matches.matches);
        }
      }
      return { mode: "researcher", matches: combinePaperVerdicts(memberMatches, record, this.#tiePolicy) };
    }
    const memberMatches: (readonly ReviewMatch[])[] = [];
    for (const { matches } of outputs) {
      if (matches.mode === "reviewer") {
        memberMatches.push(matches.matches);
      }
    }
    const planNames = consideredSuggestions(plan, topK).map((suggestion) => suggestion.name);
    return { mode: "reviewer", matches: combineReviewVerdicts(memberMatches, planNames, this.#tiePolicy) };
  }
}
