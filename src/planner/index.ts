import type { PlannerConfig } from "../config.js";

import type { Planner, PlannerDeps } from "./planner.js";
import { SimpleLmPlanner } from "./simpleLm.js";
import { SweAgentPlanner } from "./sweAgent.js";

export * from "./planner.js";
export { SimpleLmPlanner } from "./simpleLm.js";
export { PAPER_SOURCE_PATH, PLAN_SUBMISSION_PATH, SweAgentPlanner, validatePlanSubmission } from "./sweAgent.js";

export function createPlanner(config: PlannerConfig, deps: PlannerDeps = {}): Planner {
  switch (config.kind) {
    case "simple_lm":
      return new SimpleLmPlanner(config, deps);
    case "sweagent":
      return new SweAgentPlanner(config, deps);
  }
}
