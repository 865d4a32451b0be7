import type { JudgeConfig, JudgeMemberConfig } from "../config.js";

import type { Judge, JudgeDeps } from "./judge.js";
import { MajorityJudge } from "./majority.js";
import { SimpleLmJudge } from "./simpleLm.js";
import { StoredJudge } from "./stored.js";
import { SweAgentJudge } from "./sweAgent.js";

export * from "./judge.js";
export { combinePaperVerdicts, combineReviewVerdicts, MajorityJudge, majorityVerdict } from "./majority.js";
export { judgeCacheKey, SimpleLmJudge } from "./simpleLm.js";
export { StoredJudge } from "./stored.js";
export {
  buildScaffold,
  diffKeyMultisets,
  FINAL_SCORE_PATH,
  shuffled,
  SweAgentJudge,
  validateScoreSubmission,
} from "./sweAgent.js";

function createMember(config: JudgeMemberConfig, deps: JudgeDeps, index: number): Judge {
  const logger = deps.logger?.child(`member${index + 1}`);
  switch (config.kind) {
    case "simple_lm":
      return new SimpleLmJudge(config, { ...deps, logger });
    case "sweagent":
      return new SweAgentJudge(config, { ...deps, logger });
    case "stored":
      return new StoredJudge(config, logger);
  }
}

export function createJudge(config: JudgeConfig, deps: JudgeDeps = {}): Judge {
  switch (config.kind) {
    case "simple_lm":
      return new SimpleLmJudge(config, deps);
    case "sweagent":
      return new SweAgentJudge(config, deps);
    case "majority":
      return new MajorityJudge(
        {
          mode: config.mode,
          tiePolicy: config.tiePolicy,
          members: config.members.map((member, index) => createMember(member, deps, index)),
        },
        deps.logger,
      );
  }
}
