import { z } from "zod";
import { BUILT_IN_RULESET, DEFAULT_RULESET_VERSION } from "../policy.js";
import type { RuleSet, RuleSetResolution, RuleSetSource } from "./types.js";

const Fraction = z.number().min(0).max(1);

const RuleSetEntry = z.object({
  monthly_min_hours: z.number().nonnegative(),
  monthly_max_hours: z.number().nonnegative(),
  supervision_ratios: z.record(Fraction),
  group_supervision_max_percent: Fraction,
});

const Catalog = z.record(z.unknown());

function toRuleSet(entry: z.infer<typeof RuleSetEntry>): RuleSet {
  return Object.freeze({
    monthlyMinHours: entry.monthly_min_hours,
    monthlyMaxHours: entry.monthly_max_hours,
    supervisionRatios: Object.freeze({ ...entry.supervision_ratios }),
    groupSupervisionMaxPercent: entry.group_supervision_max_percent,
  });
}

function builtIn(requestedVersion: string, reason: string): RuleSetResolution {
  return {
    requestedVersion,
    version: "built-in",
    origin: "built-in",
    reason,
    ruleSet: BUILT_IN_RULESET,
  };
}

/**
 * Resolve a ruleset version. Never throws: an unknown or malformed version
 * falls back to "2022", and an unreadable catalog to the built-in bundle.
 * `origin` tells the caller which one it got.
 */
export function resolveRuleSet(
  source: RuleSetSource,
  requestedVersion: string
): RuleSetResolution {
  let raw: unknown;
  try {
    raw = source.readCatalog();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return builtIn(requestedVersion, `ruleset source unavailable: ${msg}`);
  }

  const catalog = Catalog.safeParse(raw);
  if (!catalog.success) {
    return builtIn(requestedVersion, "ruleset catalog is not an object");
  }

  const requested = RuleSetEntry.safeParse(catalog.data[requestedVersion]);
  if (requested.success) {
    return {
      requestedVersion,
      version: requestedVersion,
      origin: "requested",
      ruleSet: toRuleSet(requested.data),
    };
  }

  const fallback = RuleSetEntry.safeParse(
    catalog.data[DEFAULT_RULESET_VERSION]
  );
  if (fallback.success) {
    return {
      requestedVersion,
      version: DEFAULT_RULESET_VERSION,
      origin: "fallback-version",
      reason: `version "${requestedVersion}" not found or invalid`,
      ruleSet: toRuleSet(fallback.data),
    };
  }

  return builtIn(
    requestedVersion,
    `neither "${requestedVersion}" nor "${DEFAULT_RULESET_VERSION}" is usable`
  );
}
