import { DEFAULT_REQUIRED_RATIO, type SupervisionMode } from "../policy.js";
import type { RuleSet, RuleSetResolution } from "../rules/types.js";
import { isSupervised } from "../types.js";
import type { ComplianceRow, MonthlyStats } from "./types.js";

const EMPTY_STATS: Readonly<MonthlyStats> = Object.freeze({
  totalHours: 0,
  supervisedHours: 0,
  independentHours: 0,
  supervisionPercent: 0,
  isCompliantSupervision: false,
  isCompliantMinHours: false,
  isCompliantMaxHours: true, // 0 never exceeds the maximum
  hoursNeededForRatio: 0,
});

export class ComplianceEngine {
  public readonly rules: RuleSet;
  public readonly mode: SupervisionMode;

  public constructor(rules: RuleSet, mode: SupervisionMode) {
    this.rules = rules;
    this.mode = mode;
  }

  public get requiredRatio(): number {
    const ratio = this.rules.supervisionRatios[this.mode];
    return typeof ratio === "number" ? ratio : DEFAULT_REQUIRED_RATIO;
  }

  /**
   * Aggregate already-filtered rows into compliance statistics.
   *
   * `hoursNeededForRatio` answers "how much more supervised time would meet
   * the ratio at today's total". It ignores that adding supervised time also
   * raises the total, so it under-estimates the fixed point
   * `(supervised + x) / (total + x) = ratio`.
   */
  public calculateMonthlyStats(records: readonly ComplianceRow[]): MonthlyStats {
    if (records.length === 0) return { ...EMPTY_STATS };

    let totalHours = 0;
    let supervisedHours = 0;
    for (const r of records) {
      totalHours += r.durationHours;
      if (isSupervised(r.supervisionType)) supervisedHours += r.durationHours;
    }
    const independentHours = totalHours - supervisedHours;
    const supervisionPercent = totalHours > 0 ? supervisedHours / totalHours : 0;

    const ratio = this.requiredRatio;
    const targetSupervised = totalHours * ratio;

    return {
      totalHours,
      supervisedHours,
      independentHours,
      supervisionPercent,
      isCompliantSupervision: supervisionPercent >= ratio,
      isCompliantMinHours: totalHours >= this.rules.monthlyMinHours,
      isCompliantMaxHours: totalHours <= this.rules.monthlyMaxHours,
      hoursNeededForRatio: Math.max(0, targetSupervised - supervisedHours),
    };
  }
}

export function createComplianceEngine(
  resolution: RuleSetResolution,
  mode: SupervisionMode
): ComplianceEngine {
  return new ComplianceEngine(resolution.ruleSet, mode);
}
