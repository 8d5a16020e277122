import type sqlite3 from "sqlite3";
import { getDb } from "../db/sqlite.js";
import type { TelegramProfile, UserRepository } from "./userRepository.js";

export class UserRepositorySqlite implements UserRepository {
  private readonly db: sqlite3.Database;

  public constructor(db: sqlite3.Database = getDb()) {
    this.db = db;
  }

  public async upsert(profile: TelegramProfile): Promise<number> {
    await this.run(
      `INSERT INTO users (tg_user_id, first_name, last_name, username)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(tg_user_id) DO UPDATE SET
         first_name = excluded.first_name,
         last_name = excluded.last_name,
         username = excluded.username,
         last_seen_at = datetime('now')`,
      [
        profile.tgUserId,
        profile.firstName ?? null,
        profile.lastName ?? null,
        profile.username ?? null,
      ]
    );
    const row = await this.get<{ id: number }>(
      `SELECT id FROM users WHERE tg_user_id = ? LIMIT 1`,
      [profile.tgUserId]
    );
    if (!row) {
      throw new Error(`User ${profile.tgUserId} upserted but id not found`);
    }
    return row.id;
  }

  private get<T>(sql: string, params: readonly unknown[]): Promise<T | undefined> {
    return new Promise<T | undefined>((resolve, reject) => {
      this.db.get(sql, params as never, (err, row: T | undefined) =>
        err ? reject(err) : resolve(row)
      );
    });
  }

  private run(sql: string, params: readonly unknown[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.db.run(sql, params as never, (err: Error | null) =>
        err ? reject(err) : resolve()
      );
    });
  }
}
