/** Telegram profile fields kept for a trainee. */
export interface TelegramProfile {
  tgUserId: number;
  firstName?: string;
  lastName?: string;
  username?: string;
}

export interface UserRepository {
  /** Inserts or refreshes the trainee and returns their internal id. */
  upsert(profile: TelegramProfile): Promise<number>;
}
