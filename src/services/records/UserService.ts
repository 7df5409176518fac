import { DatabaseConnection } from '../../types/database.js';
import { logger } from '../../middleware/logging.js';

export interface KnownUser {
  userId: number;
  firstSeenAt: Date;
  lastSeenAt: Date;
}

interface UserRow {
  user_id: number;
  first_seen_at: string;
  last_seen_at: string;
}

/**
 * Requesters that have sent the bot a file
 */
export class UserService {
  constructor(private readonly db: DatabaseConnection) {}

  async remember(userId: number): Promise<void> {
    const now = new Date().toISOString();
    await this.db.execute(
      `INSERT INTO users (user_id, first_seen_at, last_seen_at) VALUES (?, ?, ?)
       ON CONFLICT(user_id) DO UPDATE SET last_seen_at = excluded.last_seen_at`,
      [userId, now, now]
    );

    logger.debug('[UserService] Remembered user', {
      service: 'UserService',
      operation: 'remember',
      userId,
    });
  }

  async count(): Promise<number> {
    const row = await this.db.get<{ total: number }>('SELECT COUNT(*) AS total FROM users');
    return row?.total ?? 0;
  }

  async list(): Promise<KnownUser[]> {
    const rows = await this.db.query<UserRow>('SELECT * FROM users ORDER BY first_seen_at');
    return rows.map(row => ({
      userId: row.user_id,
      firstSeenAt: new Date(row.first_seen_at),
      lastSeenAt: new Date(row.last_seen_at),
    }));
  }
}
