import type { AuditedSafe } from "../domain/audit/admission.js";
import { monthPrefix } from "../domain/compliance/period.js";
import { formatTimeOfDay } from "../domain/time.js";
import type { SessionRepository } from "../sessionlog/sessionRepository.js";
import type { SessionRow, TraineeRef } from "../sessionlog/types.js";

/** In-process stand-in for SessionRepositorySqlite. */
export class InMemorySessionRepository implements SessionRepository {
  public readonly rows: SessionRow[] = [];
  // user id -> telegram id, for the monthly summary
  public readonly tgIds = new Map<number, number>();

  public seed(row: Partial<SessionRow> & Pick<SessionRow, "id" | "user_id" | "date">): void {
    this.rows.push({
      start_time: "09:00:00",
      end_time: "10:00:00",
      duration_hours: 1,
      activity_type: "Restricted",
      supervision_type: "None",
      supervisor: "",
      energy_rating: null,
      notes: "",
      created_at: "2024-01-01 00:00:00",
      ...row,
    });
  }

  public async listByDate(userId: number, date: string): Promise<SessionRow[]> {
    return this.rows.filter((r) => r.user_id === userId && r.date === date);
  }

  public async listForMonth(
    userId: number,
    year: number,
    month: number
  ): Promise<SessionRow[]> {
    const prefix = `${monthPrefix(year, month)}-`;
    return this.rows.filter(
      (r) => r.user_id === userId && r.date.startsWith(prefix)
    );
  }

  public async append(userId: number, admitted: AuditedSafe): Promise<void> {
    const r = admitted.record;
    this.rows.push({
      id: r.id,
      user_id: userId,
      date: r.date,
      start_time: formatTimeOfDay(r.startTime),
      end_time: formatTimeOfDay(r.endTime),
      duration_hours: r.durationHours,
      activity_type: r.activityType,
      supervision_type: r.supervisionType,
      supervisor: r.supervisor,
      energy_rating: r.energyRating,
      notes: r.notes,
      created_at: "2024-01-01 00:00:00",
    });
  }

  public async remove(userId: number, sessionId: string): Promise<boolean> {
    const idx = this.rows.findIndex(
      (r) => r.id === sessionId && r.user_id === userId
    );
    if (idx < 0) return false;
    this.rows.splice(idx, 1);
    return true;
  }

  public async listTraineesWithSessions(
    year: number,
    month: number
  ): Promise<TraineeRef[]> {
    const prefix = `${monthPrefix(year, month)}-`;
    const ids = [
      ...new Set(
        this.rows.filter((r) => r.date.startsWith(prefix)).map((r) => r.user_id)
      ),
    ].sort((a, b) => a - b);
    return ids.map((userId) => ({
      userId,
      tgUserId: this.tgIds.get(userId) ?? userId,
    }));
  }

  public async countAll(): Promise<number> {
    return this.rows.length;
  }
}
