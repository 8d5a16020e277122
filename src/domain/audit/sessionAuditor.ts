import { AUDIT_THRESHOLD_HOURS } from "../policy.js";
import { coerceTimeOfDay, formatTimeOfDay, secondsOfDay } from "../time.js";
import type { AuditCandidate, AuditHistoryRow, AuditResult } from "./types.js";

function checkDuration(candidate: AuditCandidate): string[] {
  if (candidate.durationHours > AUDIT_THRESHOLD_HOURS) {
    return [
      `AUDIT RISK: Session duration (${candidate.durationHours.toFixed(
        2
      )}h) exceeds daily safety limit (${AUDIT_THRESHOLD_HOURS.toFixed(1)}h).`,
    ];
  }
  return [];
}

/**
 * Half-open interval test against same-day rows. Rows whose times cannot be
 * parsed are skipped. Reports only the first clash.
 */
function checkOverlap(
  candidate: AuditCandidate,
  history: readonly AuditHistoryRow[]
): string[] {
  const start = secondsOfDay(candidate.startTime);
  const end = secondsOfDay(candidate.endTime);

  for (const row of history) {
    if (row.date !== candidate.date) continue;

    const rowStart = coerceTimeOfDay(row.startTime);
    const rowEnd = coerceTimeOfDay(row.endTime);
    if (!rowStart || !rowEnd) continue;

    if (start < secondsOfDay(rowEnd) && end > secondsOfDay(rowStart)) {
      return [
        `OVERLAP DETECTED: Clashes with entry on ${
          candidate.date
        } (${formatTimeOfDay(rowStart)} - ${formatTimeOfDay(rowEnd)}).`,
      ];
    }
  }
  return [];
}

/**
 * Save-time gate. Both checks always run and their messages are merged;
 * never throws and never mutates its inputs.
 */
export function checkSaveSafety(
  candidate: AuditCandidate,
  history: readonly AuditHistoryRow[]
): AuditResult {
  const errors: string[] = [
    ...checkDuration(candidate),
    ...checkOverlap(candidate, history),
  ];
  return { isSafe: errors.length === 0, errors };
}
