import type { SessionRecord } from "../types.js";
import type { ReportingPeriod } from "./types.js";

export function monthPrefix(year: number, month: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

/**
 * Caller-side reporting filter: one calendar month, optionally one supervisor
 * (case-insensitive). The compliance engine itself never filters.
 */
export function filterForPeriod<T extends Pick<SessionRecord, "date" | "supervisor">>(
  records: readonly T[],
  period: ReportingPeriod
): T[] {
  const prefix = `${monthPrefix(period.year, period.month)}-`;
  const who = period.supervisor?.trim().toLowerCase();
  return records.filter(
    (r) =>
      r.date.startsWith(prefix) &&
      (!who || r.supervisor.trim().toLowerCase() === who)
  );
}

/** The calendar month before the given local date. */
export function previousMonth(now: Date = new Date()): {
  year: number;
  month: number;
} {
  const month = now.getMonth(); // 0-based current == 1-based previous
  return month === 0
    ? { year: now.getFullYear() - 1, month: 12 }
    : { year: now.getFullYear(), month };
}
