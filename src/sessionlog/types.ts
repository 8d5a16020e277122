import type { MonthlyStats } from "../domain/compliance/types.js";
import type { SessionRecord } from "../domain/types.js";

// Row as stored in fieldwork_sessions.
export interface SessionRow {
  id: string;
  user_id: number;
  date: string;
  start_time: string;
  end_time: string;
  duration_hours: number;
  activity_type: string;
  supervision_type: string | null;
  supervisor: string;
  energy_rating: number | null;
  notes: string;
  created_at: string;
}

export interface TraineeRef {
  userId: number;
  tgUserId: number;
}

export type LogOutcome =
  | { status: "persisted"; record: SessionRecord; report: MonthReport }
  | { status: "rejected"; errors: string[] };

export interface MonthReport {
  year: number;
  month: number;
  supervisor?: string;
  sessions: number;
  stats: MonthlyStats;
}
