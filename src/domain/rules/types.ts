export interface RuleSet {
  readonly monthlyMinHours: number;
  readonly monthlyMaxHours: number;
  readonly supervisionRatios: Readonly<Record<string, number>>; // mode -> fraction 0..1
  readonly groupSupervisionMaxPercent: number; // advisory, not enforced
}

export type RuleSetOrigin = "requested" | "fallback-version" | "built-in";

export interface RuleSetResolution {
  requestedVersion: string;
  version: string; // version actually used; "built-in" for the hard-coded bundle
  origin: RuleSetOrigin;
  reason?: string; // why a fallback was taken
  ruleSet: RuleSet;
}

/**
 * Read side of the external parameter store. May throw when the store is
 * unreachable; the loader turns that into the built-in fallback.
 */
export interface RuleSetSource {
  readCatalog(): unknown;
}
