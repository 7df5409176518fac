import { MigrationRunner } from '../../src/database/MigrationRunner.js';
import { DuplicateKeyError } from '../../src/errors/index.js';
import { DatabaseConnection } from '../../src/types/database.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

describe('SqliteConnection and MigrationRunner', () => {
  let testDb: TestDatabase;
  let db: DatabaseConnection;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    db = testDb.getConnection();
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  it('should not reapply migrations that already ran', async () => {
    const applied = await new MigrationRunner(db).migrate();

    expect(applied).toBe(0);
    expect(await db.query<{ version: string }>('SELECT version FROM migrations')).toEqual([
      { version: '20261019_001' },
    ]);
  });

  it('should commit the work of a successful transaction', async () => {
    const result = await db.transaction(async () => {
      await db.execute('INSERT INTO users (user_id, first_seen_at, last_seen_at) VALUES (?, ?, ?)', [7, 'a', 'a']);
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(await db.get<{ n: number }>('SELECT COUNT(*) AS n FROM users')).toEqual({ n: 1 });
  });

  it('should roll back and rethrow when the work fails', async () => {
    const failure = new Error('boom');

    await expect(
      db.transaction(async () => {
        await db.execute('INSERT INTO users (user_id, first_seen_at, last_seen_at) VALUES (?, ?, ?)', [7, 'a', 'a']);
        throw failure;
      })
    ).rejects.toBe(failure);
    expect(await db.get<{ n: number }>('SELECT COUNT(*) AS n FROM users')).toEqual({ n: 0 });
  });

  it('should report unique violations as DuplicateKeyError', async () => {
    const error: unknown = await db
      .execute('INSERT INTO migrations (version, name) VALUES (?, ?)', ['20261019_001', 'again'])
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error).toMatchObject({ table: 'migrations', key: 'version' });
  });
});
