import { z } from 'zod';
import { DatabaseConnection } from '../../types/database.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

const statCountersSchema = z.object({
  filesHandled: z.number().default(0),
  successfulDownloads: z.number().default(0),
  failedDownloads: z.number().default(0),
  totalBytes: z.number().default(0),
  totalSeconds: z.number().default(0),
  speedSum: z.number().default(0),
  samples: z.number().default(0),
  peakConcurrent: z.number().default(0),
});

export type StatCounters = z.infer<typeof statCountersSchema>;

export interface StatSummary extends StatCounters {
  /** bytes per second, averaged over successful downloads */
  averageSpeed: number;
  averageSeconds: number;
}

const GLOBAL_KEY = 'global';
const USER_KEY_PATTERN = /^user_(\d+)$/;

function emptyCounters(): StatCounters {
  return statCountersSchema.parse({});
}

function summarize(counters: StatCounters): StatSummary {
  return {
    ...counters,
    averageSpeed: counters.samples > 0 ? counters.speedSum / counters.samples : 0,
    averageSeconds: counters.samples > 0 ? counters.totalSeconds / counters.samples : 0,
  };
}

/**
 * Download counters, global and per requester. Held in memory and
 * upserted into the stats table after each change.
 */
export class DownloadStatsService {
  private global: StatCounters = emptyCounters();
  private readonly perUser = new Map<number, StatCounters>();
  private readonly startedAt = new Date();

  constructor(private readonly db: DatabaseConnection) {}

  async load(): Promise<void> {
    const rows = await this.db.query<{ key: string; data: string }>('SELECT key, data FROM stats');
    for (const row of rows) {
      const counters = this.parseCounters(row.key, row.data);
      if (!counters) {
        continue;
      }
      if (row.key === GLOBAL_KEY) {
        this.global = counters;
        continue;
      }
      const match = USER_KEY_PATTERN.exec(row.key);
      if (match?.[1]) {
        this.perUser.set(parseInt(match[1], 10), counters);
      }
    }

    logger.info('[DownloadStatsService] Loaded stats', {
      service: 'DownloadStatsService',
      operation: 'load',
      users: this.perUser.size,
      filesHandled: this.global.filesHandled,
    });
  }

  async recordDownload(userId: number, sizeBytes: number, durationSeconds: number, success: boolean): Promise<void> {
    const userCounters = this.perUser.get(userId) ?? emptyCounters();
    this.perUser.set(userId, userCounters);

    for (const counters of [this.global, userCounters]) {
      counters.filesHandled++;
      if (success) {
        const speed = durationSeconds > 0 ? sizeBytes / durationSeconds : 0;
        counters.successfulDownloads++;
        counters.totalBytes += sizeBytes;
        counters.totalSeconds += durationSeconds;
        counters.speedSum += speed;
        counters.samples++;
      } else {
        counters.failedDownloads++;
      }
    }

    // Counters stay in memory and are written again on the next save
    try {
      await this.save(userId);
    } catch (error) {
      logger.error('[DownloadStatsService] Failed to persist stats', {
        service: 'DownloadStatsService',
        operation: 'recordDownload',
        userId,
        error: getErrorMessage(error),
      });
    }
  }

  updatePeakConcurrent(current: number): void {
    if (current > this.global.peakConcurrent) {
      this.global.peakConcurrent = current;
    }
  }

  getGlobal(): StatSummary {
    return summarize(this.global);
  }

  getUser(userId: number): StatSummary {
    return summarize(this.perUser.get(userId) ?? emptyCounters());
  }

  getUptimeSeconds(now: Date = new Date()): number {
    return Math.floor((now.getTime() - this.startedAt.getTime()) / 1000);
  }

  /**
   * Persist the global counters, and one user's or every user's
   */
  async save(userId?: number): Promise<void> {
    await this.upsert(GLOBAL_KEY, this.global);
    const users = userId !== undefined ? [userId] : Array.from(this.perUser.keys());
    for (const id of users) {
      const counters = this.perUser.get(id);
      if (counters) {
        await this.upsert(`user_${id}`, counters);
      }
    }
  }

  private async upsert(key: string, counters: StatCounters): Promise<void> {
    await this.db.execute(
      `INSERT INTO stats (key, data, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET data = excluded.data, updated_at = excluded.updated_at`,
      [key, JSON.stringify(counters), new Date().toISOString()]
    );
  }

  private parseCounters(key: string, raw: string): StatCounters | null {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      logger.warn('[DownloadStatsService] Ignoring unreadable stats row', {
        service: 'DownloadStatsService',
        operation: 'load',
        key,
        error: getErrorMessage(error),
      });
      return null;
    }
    const parsed = statCountersSchema.safeParse(value);
    if (!parsed.success) {
      logger.warn('[DownloadStatsService] Ignoring malformed stats row', {
        service: 'DownloadStatsService',
        operation: 'load',
        key,
      });
      return null;
    }
    return parsed.data;
  }
}
