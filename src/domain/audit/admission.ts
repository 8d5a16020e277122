import type { SessionRecord } from "../types.js";
import { checkSaveSafety } from "./sessionAuditor.js";
import type { AuditHistoryRow } from "./types.js";

// Drafted -> Audited-Safe | Audited-Unsafe -> Persisted (safe only)
export interface AuditedSafe {
  readonly state: "audited-safe";
  readonly record: SessionRecord;
}

export interface AuditedUnsafe {
  readonly state: "audited-unsafe";
  readonly record: SessionRecord;
  readonly errors: readonly string[];
}

export type AuditedCandidate = AuditedSafe | AuditedUnsafe;

export function auditCandidate(
  record: SessionRecord,
  history: readonly AuditHistoryRow[]
): AuditedCandidate {
  const { isSafe, errors } = checkSaveSafety(record, history);
  return isSafe
    ? { state: "audited-safe", record }
    : { state: "audited-unsafe", record, errors };
}
