import { DatabaseConnection } from '../../types/database.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export type ErrorStage = 'download' | 'processing' | 'organize' | 'bulk' | 'reorganize';

export interface ErrorLogEntry {
  stage: ErrorStage;
  file?: string;
  error: string;
  context?: Record<string, unknown>;
}

export interface StoredErrorLogEntry extends ErrorLogEntry {
  id: number;
  createdAt: Date;
}

interface ErrorLogRow {
  id: number;
  stage: ErrorStage;
  file: string | null;
  error: string;
  context: string | null;
  created_at: string;
}

export class ErrorLogService {
  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Persist a failure. Never throws: a failure to write the log is itself
   * only logged.
   */
  async record(entry: ErrorLogEntry): Promise<void> {
    try {
      await this.db.execute(
        'INSERT INTO error_log (stage, file, error, context, created_at) VALUES (?, ?, ?, ?, ?)',
        [
          entry.stage,
          entry.file ?? null,
          entry.error,
          entry.context ? JSON.stringify(entry.context) : null,
          new Date().toISOString(),
        ]
      );
    } catch (error) {
      logger.error('[ErrorLogService] Failed to persist error entry', {
        service: 'ErrorLogService',
        operation: 'record',
        stage: entry.stage,
        originalError: entry.error,
        error: getErrorMessage(error),
      });
    }
  }

  async recent(limit: number = 20): Promise<StoredErrorLogEntry[]> {
    const rows = await this.db.query<ErrorLogRow>('SELECT * FROM error_log ORDER BY id DESC LIMIT ?', [limit]);
    return rows.map(row => ({
      id: row.id,
      stage: row.stage,
      ...(row.file !== null && { file: row.file }),
      error: row.error,
      ...(row.context !== null && { context: parseContext(row.context) }),
      createdAt: new Date(row.created_at),
    }));
  }
}

function parseContext(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return { value };
  } catch (error) {
    return { raw, parseError: getErrorMessage(error) };
  }
}
