import { DatabaseConnection, MigrationDefinition } from '../types/database.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';
import { logger } from '../middleware/logging.js';
import { getErrorMessage, toError } from '../utils/errorHandling.js';
import { InitialSchemaMigration } from './migrations/20261019_001_initial_schema.js';

export const MIGRATIONS: MigrationDefinition[] = [
  {
    version: InitialSchemaMigration.version,
    name: InitialSchemaMigration.migrationName,
    up: InitialSchemaMigration.up,
  },
];

/**
 * Applies, in version order, every migration not yet listed in the
 * `migrations` table. Each one runs in its own transaction.
 */
export class MigrationRunner {
  constructor(
    private readonly db: DatabaseConnection,
    private readonly migrations: MigrationDefinition[] = MIGRATIONS
  ) {}

  async pending(): Promise<MigrationDefinition[]> {
    await this.db.execute(`
      CREATE TABLE IF NOT EXISTS migrations (
        version TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
    const applied = new Set(
      (await this.db.query<{ version: string }>('SELECT version FROM migrations')).map((row) => row.version)
    );
    return [...this.migrations]
      .sort((a, b) => a.version.localeCompare(b.version))
      .filter((migration) => !applied.has(migration.version));
  }

  async migrate(): Promise<number> {
    const pending = await this.pending();

    for (const migration of pending) {
      logger.info(`[MigrationRunner] Applying ${migration.version} ${migration.name}`, {
        service: 'MigrationRunner',
        operation: 'migrate',
      });
      try {
        await this.db.transaction(async () => {
          await migration.up(this.db);
          await this.db.execute('INSERT INTO migrations (version, name) VALUES (?, ?)', [migration.version, migration.name]);
        });
      } catch (error) {
        throw new DatabaseError(
          `Migration ${migration.version} failed: ${getErrorMessage(error)}`,
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          { service: 'MigrationRunner', operation: 'migrate' },
          toError(error)
        );
      }
    }
    return pending.length;
  }
}
