import type sqlite3 from "sqlite3";
import { getDb } from "../db/sqlite.js";
import type { AuditedSafe } from "../domain/audit/admission.js";
import { monthPrefix } from "../domain/compliance/period.js";
import { formatTimeOfDay } from "../domain/time.js";
import type { SessionRepository } from "./sessionRepository.js";
import type { SessionRow, TraineeRef } from "./types.js";

const COLUMNS = `id, user_id, date, start_time, end_time, duration_hours,
  activity_type, supervision_type, supervisor, energy_rating, notes, created_at`;

export class SessionRepositorySqlite implements SessionRepository {
  private readonly db: sqlite3.Database;

  public constructor(db: sqlite3.Database = getDb()) {
    this.db = db;
  }

  public listByDate(userId: number, date: string): Promise<SessionRow[]> {
    return this.all<SessionRow>(
      `SELECT ${COLUMNS}
         FROM fieldwork_sessions
        WHERE user_id = ? AND date = ?
        ORDER BY start_time`,
      [userId, date]
    );
  }

  public listForMonth(
    userId: number,
    year: number,
    month: number
  ): Promise<SessionRow[]> {
    return this.all<SessionRow>(
      `SELECT ${COLUMNS}
         FROM fieldwork_sessions
        WHERE user_id = ? AND date LIKE ?
        ORDER BY date, start_time`,
      [userId, `${monthPrefix(year, month)}-%`]
    );
  }

  public async append(userId: number, admitted: AuditedSafe): Promise<void> {
    const r = admitted.record;
    await this.run(
      `INSERT INTO fieldwork_sessions
         (id, user_id, date, start_time, end_time, duration_hours,
          activity_type, supervision_type, supervisor, energy_rating, notes)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        r.id,
        userId,
        r.date,
        formatTimeOfDay(r.startTime),
        formatTimeOfDay(r.endTime),
        r.durationHours,
        r.activityType,
        r.supervisionType,
        r.supervisor,
        r.energyRating,
        r.notes,
      ]
    );
  }

  public async remove(userId: number, sessionId: string): Promise<boolean> {
    const changes = await this.run(
      `DELETE FROM fieldwork_sessions WHERE id = ? AND user_id = ?`,
      [sessionId, userId]
    );
    return changes > 0;
  }

  public async listTraineesWithSessions(
    year: number,
    month: number
  ): Promise<TraineeRef[]> {
    const rows = await this.all<{ user_id: number; tg_user_id: number }>(
      `SELECT DISTINCT u.id AS user_id, u.tg_user_id
         FROM fieldwork_sessions s
         JOIN users u ON u.id = s.user_id
        WHERE s.date LIKE ?
        ORDER BY u.id`,
      [`${monthPrefix(year, month)}-%`]
    );
    return rows.map((r) => ({ userId: r.user_id, tgUserId: r.tg_user_id }));
  }

  public async countAll(): Promise<number> {
    const rows = await this.all<{ c: number }>(
      `SELECT COUNT(*) AS c FROM fieldwork_sessions`
    );
    return rows[0]?.c ?? 0;
  }

  /* ------------ small typed helpers ------------ */
  private all<T>(sql: string, params: readonly unknown[] = []): Promise<T[]> {
    return new Promise<T[]>((resolve, reject) => {
      this.db.all(sql, params as never, (err, rows: T[]) =>
        err ? reject(err) : resolve(rows)
      );
    });
  }

  private run(sql: string, params: readonly unknown[] = []): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      this.db.run(
        sql,
        params as never,
        function (this: sqlite3.RunResult, err: Error | null): void {
          if (err) {
            reject(err);
            return;
          }
          resolve(this.changes);
        }
      );
    });
  }
}
