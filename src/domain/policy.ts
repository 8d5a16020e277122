import type { RuleSet } from "./rules/types.js";

export const DEFAULT_RULESET_VERSION = "2022" as const;

// Used when the mode has no ratio in the active ruleset.
export const DEFAULT_REQUIRED_RATIO = 0.05 as const;

// A single session longer than this is an audit red flag.
export const AUDIT_THRESHOLD_HOURS = 12.0 as const;

export const BUILT_IN_RULESET: RuleSet = Object.freeze({
  monthlyMinHours: 20,
  monthlyMaxHours: 130,
  supervisionRatios: Object.freeze({ Standard: 0.05, Concentrated: 0.1 }),
  groupSupervisionMaxPercent: 0.5,
});

export const SUPERVISION_MODES = ["Standard", "Concentrated"] as const;
export type SupervisionMode = (typeof SUPERVISION_MODES)[number];
