import type { SessionRecord, TimeOfDay } from "../types.js";

export type AuditCandidate = Pick<
  SessionRecord,
  "date" | "startTime" | "endTime" | "durationHours"
>;

// History rows may come straight from storage with string-encoded times.
export interface AuditHistoryRow {
  date: string;
  startTime: TimeOfDay | string | null | undefined;
  endTime: TimeOfDay | string | null | undefined;
}

export interface AuditResult {
  isSafe: boolean;
  errors: string[];
}
