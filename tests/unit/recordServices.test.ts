import { OrganizedRecordService } from '../../src/services/records/OrganizedRecordService.js';
import { UserService } from '../../src/services/records/UserService.js';
import { ErrorLogService } from '../../src/services/records/ErrorLogService.js';
import { DownloadStatsService } from '../../src/services/stats/DownloadStatsService.js';
import { NewOrganizedRecord } from '../../src/types/media.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

function newRecord(overrides: Partial<NewOrganizedRecord> = {}): NewOrganizedRecord {
  return {
    path: '/library/TV/Show/Season 01/Show - S01E01.mkv',
    fileName: 'Show - S01E01.mkv',
    originalName: 'show.s01e01.720p.mkv',
    title: 'Show',
    category: 'tv',
    season: 1,
    episode: 1,
    userId: 7,
    method: 'manual',
    ...overrides,
  };
}

describe('record services', () => {
  let testDb: TestDatabase;

  beforeEach(async () => {
    testDb = await createTestDatabase();
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('OrganizedRecordService', () => {
    let records: OrganizedRecordService;

    beforeEach(() => {
      records = new OrganizedRecordService(testDb.getConnection());
    });

    it('should insert a record and read it back without unset fields', async () => {
      const inserted = await records.insert(newRecord());

      const stored = await records.get(inserted.id);

      expect(stored).toEqual({
        ...newRecord(),
        id: inserted.id,
        createdAt: inserted.createdAt,
      });
      expect(stored).not.toHaveProperty('year');
    });

    it('should page newest first and filter by method', async () => {
      await records.insert(newRecord({ episode: 1 }));
      await records.insert(newRecord({ episode: 2, method: 'auto' }));
      await records.insert(newRecord({ episode: 3 }));

      const page = await records.list({ method: 'manual', limit: 1, offset: 0 });

      expect(page.total).toBe(2);
      expect(page.records.map(record => record.episode)).toEqual([3]);
    });

    it('should find the latest manual placement', async () => {
      await records.insert(newRecord({ episode: 4 }));
      await records.insert(newRecord({ episode: 5, method: 'auto' }));

      expect((await records.latestManual())?.episode).toBe(4);
    });

    it('should match both the placed and the original name', async () => {
      await records.insert(newRecord());

      expect(await records.isOrganized('Show - S01E01.mkv')).toBe(true);
      expect(await records.isOrganized('show.s01e01.720p.mkv')).toBe(true);
      expect(await records.isOrganized('show.s01e02.720p.mkv')).toBe(false);
      expect(await records.organizedNames()).toEqual(new Set(['Show - S01E01.mkv', 'show.s01e01.720p.mkv']));
    });

    it('should delete a record and report whether it existed', async () => {
      const inserted = await records.insert(newRecord());

      expect(await records.remove(inserted.id)).toBe(true);
      expect(await records.remove(inserted.id)).toBe(false);
      expect(await records.get(inserted.id)).toBeNull();
    });
  });

  describe('UserService', () => {
    it('should count each user once', async () => {
      const users = new UserService(testDb.getConnection());

      await users.remember(7);
      await users.remember(8);
      await users.remember(7);

      expect(await users.count()).toBe(2);
    });
  });

  describe('ErrorLogService', () => {
    it('should store entries with their context', async () => {
      const errorLog = new ErrorLogService(testDb.getConnection());

      await errorLog.record({ stage: 'processing', file: '/downloads/a.mkv', error: 'boom', context: { userId: 7 } });
      await errorLog.record({ stage: 'bulk', error: 'second' });

      const entries = await errorLog.recent();
      expect(entries.map(entry => entry.error)).toEqual(['second', 'boom']);
      expect(entries[1]?.context).toEqual({ userId: 7 });
      expect(entries[0]).not.toHaveProperty('file');
    });
  });

  describe('DownloadStatsService', () => {
    it('should aggregate per user and globally', async () => {
      const stats = new DownloadStatsService(testDb.getConnection());

      await stats.recordDownload(7, 1000, 10, true);
      await stats.recordDownload(7, 3000, 10, true);
      await stats.recordDownload(8, 500, 0, false);

      expect(stats.getUser(7)).toMatchObject({
        filesHandled: 2,
        successfulDownloads: 2,
        totalBytes: 4000,
        averageSpeed: 200,
        averageSeconds: 10,
      });
      expect(stats.getGlobal()).toMatchObject({ filesHandled: 3, failedDownloads: 1 });
    });

    it('should keep the highest concurrency seen', () => {
      const stats = new DownloadStatsService(testDb.getConnection());

      stats.updatePeakConcurrent(2);
      stats.updatePeakConcurrent(3);
      stats.updatePeakConcurrent(1);

      expect(stats.getGlobal().peakConcurrent).toBe(3);
    });

    it('should restore counters saved by an earlier instance', async () => {
      const first = new DownloadStatsService(testDb.getConnection());
      await first.recordDownload(7, 1000, 4, true);

      const second = new DownloadStatsService(testDb.getConnection());
      await second.load();

      expect(second.getUser(7).totalBytes).toBe(1000);
      expect(second.getGlobal().successfulDownloads).toBe(1);
    });
  });
});
