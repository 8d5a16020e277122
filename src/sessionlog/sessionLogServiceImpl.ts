import { nanoid } from "nanoid";
import { logger } from "../logger.js";
import { KeyedLock } from "../infra/keyedLock.js";
import { auditCandidate } from "../domain/audit/admission.js";
import type { AuditHistoryRow } from "../domain/audit/types.js";
import {
  createComplianceEngine,
  type ComplianceEngine,
} from "../domain/compliance/complianceEngine.js";
import { filterForPeriod } from "../domain/compliance/period.js";
import type { ReportingPeriod } from "../domain/compliance/types.js";
import { JsonFileRuleSetSource } from "../domain/rules/jsonFileRuleSetSource.js";
import { resolveRuleSet } from "../domain/rules/ruleSetLoader.js";
import type { RuleSetResolution } from "../domain/rules/types.js";
import type { SupervisionMode } from "../domain/policy.js";
import {
  buildSessionRecord,
  parseSupervisionType,
  SessionValidationError,
  type SessionDraftInput,
} from "../domain/session/sessionDraft.js";
import type { SessionRecord, SupervisionType } from "../domain/types.js";
import type { SessionLogService } from "./sessionLogService.js";
import type { SessionRepository } from "./sessionRepository.js";
import { SessionRepositorySqlite } from "./sessionRepositorySqlite.js";
import type { LogOutcome, MonthReport, SessionRow } from "./types.js";

interface StatsRow {
  date: string;
  supervisor: string;
  durationHours: number;
  supervisionType: SupervisionType;
}

// Storage -> core shapes. Stored supervision values are normalised here.
function toStatsRow(row: SessionRow): StatsRow {
  const supervisionType = parseSupervisionType(row.supervision_type);
  if (!supervisionType) {
    throw new Error(
      `Session ${row.id} has unknown supervision type "${String(
        row.supervision_type
      )}"`
    );
  }
  return {
    date: row.date,
    supervisor: row.supervisor,
    durationHours: Number(row.duration_hours),
    supervisionType,
  };
}

function toHistoryRow(row: SessionRow): AuditHistoryRow {
  return { date: row.date, startTime: row.start_time, endTime: row.end_time };
}

function periodOf(record: SessionRecord): ReportingPeriod {
  const [year, month] = record.date.split("-").map(Number);
  return { year, month };
}

export class SessionLogServiceImpl implements SessionLogService {
  public readonly resolution: RuleSetResolution;
  public readonly engine: ComplianceEngine;
  private readonly repo: SessionRepository;
  private readonly newId: () => string;
  private readonly lock = new KeyedLock();

  public constructor(
    repo: SessionRepository,
    resolution: RuleSetResolution,
    engine: ComplianceEngine,
    newId: () => string = nanoid
  ) {
    this.repo = repo;
    this.resolution = resolution;
    this.engine = engine;
    this.newId = newId;
  }

  public async logSession(
    userId: number,
    input: SessionDraftInput
  ): Promise<LogOutcome> {
    let record: SessionRecord;
    try {
      record = buildSessionRecord(input, this.newId);
    } catch (err) {
      if (err instanceof SessionValidationError) {
        return { status: "rejected", errors: err.issues };
      }
      throw err;
    }

    // read history -> audit -> append must not interleave for one trainee
    return this.lock.run(String(userId), async (): Promise<LogOutcome> => {
      const sameDay = await this.repo.listByDate(userId, record.date);
      const audited = auditCandidate(record, sameDay.map(toHistoryRow));

      if (audited.state === "audited-unsafe") {
        logger.info("Session rejected by audit", {
          userId,
          date: record.date,
          errors: audited.errors,
        });
        return { status: "rejected", errors: [...audited.errors] };
      }

      await this.repo.append(userId, audited);
      const report = await this.buildReport(userId, periodOf(record));
      logger.debug(`Session ${record.id} saved for user ${userId}`);
      return { status: "persisted", record, report };
    });
  }

  public monthReport(
    userId: number,
    period: ReportingPeriod
  ): Promise<MonthReport> {
    return this.buildReport(userId, period);
  }

  public sessionsOn(userId: number, date: string): Promise<SessionRow[]> {
    return this.repo.listByDate(userId, date);
  }

  public deleteSession(userId: number, sessionId: string): Promise<boolean> {
    return this.lock.run(String(userId), () =>
      this.repo.remove(userId, sessionId)
    );
  }

  private async buildReport(
    userId: number,
    period: ReportingPeriod
  ): Promise<MonthReport> {
    const rows = await this.repo.listForMonth(userId, period.year, period.month);
    const inPeriod = filterForPeriod(rows.map(toStatsRow), period);
    return {
      ...period,
      sessions: inPeriod.length,
      stats: this.engine.calculateMonthlyStats(inPeriod),
    };
  }
}

export interface SessionLogSettings {
  rulesetsFile: string;
  rulesetVersion: string;
  mode: SupervisionMode;
}

export function createSessionLogService(
  settings: SessionLogSettings,
  repo: SessionRepository = new SessionRepositorySqlite()
): SessionLogService {
  const resolution = resolveRuleSet(
    new JsonFileRuleSetSource(settings.rulesetsFile),
    settings.rulesetVersion
  );
  if (resolution.origin !== "requested") {
    logger.warn(
      `Ruleset "${resolution.requestedVersion}" unavailable, using ${resolution.version}: ${resolution.reason ?? "unknown reason"}`,
      { origin: resolution.origin }
    );
  } else {
    logger.info(`Ruleset ${resolution.version} loaded (${settings.mode} mode)`);
  }
  return new SessionLogServiceImpl(
    repo,
    resolution,
    createComplianceEngine(resolution, settings.mode)
  );
}
