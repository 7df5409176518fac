export type SqlParam = string | number | boolean | null | undefined | Buffer;

export interface ExecuteResult {
  affectedRows: number;
  /** rowid of the last INSERT on this connection */
  insertId?: number;
}

/**
 * Storage seam for the record services. SqliteConnection is the only
 * production implementation; `connect` is optional so an already-open
 * connection can be injected.
 */
export interface DatabaseConnection {
  connect?(): Promise<void>;
  query<T>(sql: string, params?: SqlParam[]): Promise<T[]>;
  get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  /** Runs `work` inside BEGIN/COMMIT, rolling back when it throws */
  transaction<T>(work: () => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface MigrationDefinition {
  version: string;
  name: string;
  up(db: DatabaseConnection): Promise<void>;
}
