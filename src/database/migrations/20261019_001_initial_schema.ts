import { DatabaseConnection } from '../../types/database.js';

/**
 * Initial schema
 *
 * - users: requesters seen by the bot
 * - organized: placement records, insert/delete only
 * - error_log: processing failures with their context
 * - stats: JSON counters keyed by 'global' or 'user_<id>'
 */
export class InitialSchemaMigration {
  static version = '20261019_001';
  static migrationName = 'initial_schema';

  static async up(db: DatabaseConnection): Promise<void> {
    await db.execute(`
      CREATE TABLE users (
        user_id INTEGER PRIMARY KEY,
        first_seen_at TEXT NOT NULL,
        last_seen_at TEXT NOT NULL
      )
    `);

    await db.execute(`
      CREATE TABLE organized (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        path TEXT NOT NULL,
        file_name TEXT NOT NULL,
        original_name TEXT NOT NULL,
        title TEXT NOT NULL,
        category TEXT NOT NULL CHECK(category IN ('movie', 'tv', 'anime')),
        year INTEGER,
        season INTEGER,
        episode INTEGER,
        resolution TEXT,
        user_id INTEGER NOT NULL,
        method TEXT NOT NULL CHECK(method IN ('auto', 'manual')),
        created_at TEXT NOT NULL
      )
    `);
    await db.execute('CREATE INDEX idx_organized_file_name ON organized(file_name)');
    await db.execute('CREATE INDEX idx_organized_original_name ON organized(original_name)');
    await db.execute('CREATE INDEX idx_organized_method ON organized(method, id)');

    await db.execute(`
      CREATE TABLE error_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        stage TEXT NOT NULL,
        file TEXT,
        error TEXT NOT NULL,
        context TEXT,
        created_at TEXT NOT NULL
      )
    `);

    await db.execute(`
      CREATE TABLE stats (
        key TEXT PRIMARY KEY,
        data TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
  }
}
