import type { SessionDraftInput } from "../domain/session/sessionDraft.js";
import type { ComplianceEngine } from "../domain/compliance/complianceEngine.js";
import type { ReportingPeriod } from "../domain/compliance/types.js";
import type { RuleSetResolution } from "../domain/rules/types.js";
import type { LogOutcome, MonthReport, SessionRow } from "./types.js";

export interface SessionLogService {
  readonly resolution: RuleSetResolution;
  readonly engine: ComplianceEngine;

  logSession(userId: number, input: SessionDraftInput): Promise<LogOutcome>;
  monthReport(userId: number, period: ReportingPeriod): Promise<MonthReport>;
  sessionsOn(userId: number, date: string): Promise<SessionRow[]>;
  deleteSession(userId: number, sessionId: string): Promise<boolean>;
}
