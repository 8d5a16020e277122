import type { AuditedSafe } from "../domain/audit/admission.js";
import type { SessionRow, TraineeRef } from "./types.js";

export interface SessionRepository {
  listByDate(userId: number, date: string): Promise<SessionRow[]>;
  listForMonth(userId: number, year: number, month: number): Promise<SessionRow[]>;
  // Only records that passed the audit can be persisted.
  append(userId: number, admitted: AuditedSafe): Promise<void>;
  remove(userId: number, sessionId: string): Promise<boolean>;
  listTraineesWithSessions(year: number, month: number): Promise<TraineeRef[]>;
  countAll(): Promise<number>;
}
