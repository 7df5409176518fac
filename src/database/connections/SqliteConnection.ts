import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs-extra';
import { DatabaseConnection, ExecuteResult, SqlParam } from '../../types/database.js';
import { DatabaseError, DuplicateKeyError, ErrorCode, FileSystemError } from '../../errors/index.js';
import { toError } from '../../utils/errorHandling.js';

export const IN_MEMORY_DATABASE = ':memory:';

const SERVICE = 'SqliteConnection';

/**
 * Promise wrapper over a single sqlite3 handle. Callback errors become
 * DatabaseError (or DuplicateKeyError for UNIQUE violations).
 */
export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;

  constructor(private readonly filename: string) {}

  async connect(): Promise<void> {
    if (this.filename !== IN_MEMORY_DATABASE) {
      const dir = path.dirname(this.filename);
      await fs.ensureDir(dir).catch((error: unknown) => {
        throw new FileSystemError(
          `Cannot create database directory ${dir}`,
          ErrorCode.FS_PERMISSION_DENIED,
          dir,
          false,
          { service: SERVICE, operation: 'connect' },
          toError(error)
        );
      });
    }

    this.db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(this.filename, (err) =>
        err
          ? reject(
              new DatabaseError(`Cannot open ${this.filename}: ${err.message}`, ErrorCode.DATABASE_CONNECTION_FAILED, true, {
                service: SERVICE,
                operation: 'connect',
              }, err)
            )
          : resolve(handle)
      );
    });
  }

  query<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.handle('query');
    return new Promise((resolve, reject) => {
      db.all(sql, params, (err: Error | null, rows: T[]) => (err ? reject(translate(err, sql, 'query')) : resolve(rows)));
    });
  }

  get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.handle('get');
    return new Promise((resolve, reject) => {
      db.get(sql, params, (err: Error | null, row: T | undefined) => (err ? reject(translate(err, sql, 'get')) : resolve(row)));
    });
  }

  execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.handle('execute');
    return new Promise((resolve, reject) => {
      // sqlite3 hands the statement result to the callback as `this`
      db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) {
          reject(translate(err, sql, 'execute'));
          return;
        }
        resolve({ affectedRows: this.changes, insertId: this.lastID });
      });
    });
  }

  async transaction<T>(work: () => Promise<T>): Promise<T> {
    await this.execute('BEGIN TRANSACTION');
    try {
      const result = await work();
      await this.execute('COMMIT');
      return result;
    } catch (error) {
      await this.execute('ROLLBACK');
      throw error;
    }
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      db.close((err) =>
        err
          ? reject(
              new DatabaseError(`Cannot close ${this.filename}: ${err.message}`, ErrorCode.DATABASE_CONNECTION_FAILED, false, {
                service: SERVICE,
                operation: 'close',
              }, err)
            )
          : resolve()
      );
    });
    this.db = null;
  }

  private handle(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError('Database not connected', ErrorCode.DATABASE_CONNECTION_FAILED, false, {
        service: SERVICE,
        operation,
      });
    }
    return this.db;
  }
}

function translate(error: Error, sql: string, operation: string): DatabaseError {
  const context = { service: SERVICE, operation, metadata: { sql } };
  const unique = /unique constraint failed: (\w+)\.(\w+)/i.exec(error.message);
  if (unique) {
    return new DuplicateKeyError(unique[1] ?? 'unknown', unique[2] ?? 'unknown', error.message, context);
  }
  return new DatabaseError(`Database ${operation} failed: ${error.message}`, ErrorCode.DATABASE_QUERY_FAILED, true, context, error);
}
