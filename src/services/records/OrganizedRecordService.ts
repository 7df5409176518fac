import { DatabaseConnection, SqlParam } from '../../types/database.js';
import {
  NewOrganizedRecord,
  OrganizedRecord,
  PlaceableCategory,
  PlacementMethod,
} from '../../types/media.js';
import { DatabaseError, ErrorCode } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';

interface OrganizedRow {
  id: number;
  path: string;
  file_name: string;
  original_name: string;
  title: string;
  category: PlaceableCategory;
  year: number | null;
  season: number | null;
  episode: number | null;
  resolution: string | null;
  user_id: number;
  method: PlacementMethod;
  created_at: string;
}

export interface OrganizedListOptions {
  method?: PlacementMethod;
  limit: number;
  offset: number;
}

export interface OrganizedPage {
  records: OrganizedRecord[];
  total: number;
}

/**
 * Placement records. Rows are inserted or deleted, never updated.
 */
export class OrganizedRecordService {
  constructor(private readonly db: DatabaseConnection) {}

  async insert(record: NewOrganizedRecord): Promise<OrganizedRecord> {
    const createdAt = new Date();
    const result = await this.db.execute(
      `INSERT INTO organized (
        path, file_name, original_name, title, category, year, season, episode,
        resolution, user_id, method, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        record.path,
        record.fileName,
        record.originalName,
        record.title,
        record.category,
        record.year ?? null,
        record.season ?? null,
        record.episode ?? null,
        record.resolution ?? null,
        record.userId,
        record.method,
        createdAt.toISOString(),
      ]
    );

    if (result.insertId === undefined) {
      throw new DatabaseError('Insert into organized returned no id', ErrorCode.DATABASE_QUERY_FAILED, false, {
        service: 'OrganizedRecordService',
        operation: 'insert',
      });
    }

    logger.info('[OrganizedRecordService] Recorded placement', {
      service: 'OrganizedRecordService',
      operation: 'insert',
      recordId: result.insertId,
      method: record.method,
      path: record.path,
    });

    return { ...record, id: result.insertId, createdAt };
  }

  /**
   * Newest first, with the total matching count for pagination
   */
  async list(options: OrganizedListOptions): Promise<OrganizedPage> {
    const where = options.method ? 'WHERE method = ?' : '';
    const params: SqlParam[] = options.method ? [options.method] : [];

    const totalRow = await this.db.get<{ total: number }>(
      `SELECT COUNT(*) AS total FROM organized ${where}`,
      params
    );
    const rows = await this.db.query<OrganizedRow>(
      `SELECT * FROM organized ${where} ORDER BY id DESC LIMIT ? OFFSET ?`,
      [...params, options.limit, options.offset]
    );

    return {
      records: rows.map(toRecord),
      total: totalRow?.total ?? 0,
    };
  }

  async get(id: number): Promise<OrganizedRecord | null> {
    const row = await this.db.get<OrganizedRow>('SELECT * FROM organized WHERE id = ?', [id]);
    return row ? toRecord(row) : null;
  }

  /**
   * Deletes the row only; the placed file stays where it is
   */
  async remove(id: number): Promise<boolean> {
    const result = await this.db.execute('DELETE FROM organized WHERE id = ?', [id]);
    return result.affectedRows > 0;
  }

  async latestManual(): Promise<OrganizedRecord | null> {
    const row = await this.db.get<OrganizedRow>(
      "SELECT * FROM organized WHERE method = 'manual' ORDER BY id DESC LIMIT 1"
    );
    return row ? toRecord(row) : null;
  }

  /**
   * True when a record already covers a file with this name, either
   * as placed or as it was named before placement
   */
  async isOrganized(fileName: string): Promise<boolean> {
    const row = await this.db.get<{ id: number }>(
      'SELECT id FROM organized WHERE file_name = ? OR original_name = ? LIMIT 1',
      [fileName, fileName]
    );
    return row !== undefined;
  }

  /**
   * Every name already covered by a record, for scanning many files at once
   */
  async organizedNames(): Promise<Set<string>> {
    const rows = await this.db.query<{ file_name: string; original_name: string }>(
      'SELECT file_name, original_name FROM organized'
    );
    const names = new Set<string>();
    for (const row of rows) {
      names.add(row.file_name);
      names.add(row.original_name);
    }
    return names;
  }
}

function toRecord(row: OrganizedRow): OrganizedRecord {
  return {
    id: row.id,
    path: row.path,
    fileName: row.file_name,
    originalName: row.original_name,
    title: row.title,
    category: row.category,
    ...(row.year !== null && { year: row.year }),
    ...(row.season !== null && { season: row.season }),
    ...(row.episode !== null && { episode: row.episode }),
    ...(row.resolution !== null && { resolution: row.resolution }),
    userId: row.user_id,
    method: row.method,
    createdAt: new Date(row.created_at),
  };
}
