import type { SessionRecord } from "../types.js";

export type ComplianceRow = Pick<SessionRecord, "durationHours" | "supervisionType">;

export interface MonthlyStats {
  totalHours: number;
  supervisedHours: number;
  independentHours: number;
  supervisionPercent: number; // 0..1

  isCompliantSupervision: boolean;
  isCompliantMinHours: boolean;
  isCompliantMaxHours: boolean;

  // Supervised hours missing at the current total, see ComplianceEngine.
  hoursNeededForRatio: number;
}

export interface ReportingPeriod {
  year: number;
  month: number; // 1..12
  supervisor?: string;
}
