import path from 'path';
import { AdminController } from '../../src/controllers/adminController.js';
import { OrganizeService } from '../../src/services/organize/OrganizeService.js';
import { OrganizedRecordService } from '../../src/services/records/OrganizedRecordService.js';
import { ErrorLogService } from '../../src/services/records/ErrorLogService.js';
import { UserService } from '../../src/services/records/UserService.js';
import { FileOperations } from '../../src/services/files/fileOperations.js';
import { PathsConfig } from '../../src/config/types.js';
import { makeTempDir, makeTestConfig, removeTempDir } from '../utils/fakes.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

describe('AdminController', () => {
  let baseDir: string;
  let paths: PathsConfig;
  let testDb: TestDatabase;
  let records: OrganizedRecordService;
  let errorLog: ErrorLogService;
  let users: UserService;
  let shutdowns: number;
  let clock: number;
  let controller: AdminController;

  beforeEach(async () => {
    baseDir = await makeTempDir();
    paths = makeTestConfig(baseDir).paths;
    testDb = await createTestDatabase();
    records = new OrganizedRecordService(testDb.getConnection());
    errorLog = new ErrorLogService(testDb.getConnection());
    users = new UserService(testDb.getConnection());
    shutdowns = 0;
    clock = 0;
    controller = new AdminController(
      records,
      new OrganizeService(paths, new FileOperations({ maxAttempts: 1 }), records),
      users,
      errorLog,
      () => {
        shutdowns++;
      },
      () => clock
    );
  });

  afterEach(async () => {
    await testDb.destroy();
    await removeTempDir(baseDir);
  });

  async function insertEpisodes(count: number): Promise<void> {
    for (let episode = 1; episode <= count; episode++) {
      await records.insert({
        path: path.join(paths.tv, 'Show', 'Season 01', `Show - S01E${String(episode).padStart(2, '0')}.mkv`),
        fileName: `Show - S01E${String(episode).padStart(2, '0')}.mkv`,
        originalName: `show.s01e${episode}.mkv`,
        title: 'Show',
        category: 'tv',
        season: 1,
        episode,
        userId: 1,
        method: 'manual',
      });
    }
  }

  it('should page manual placements newest first with navigation', async () => {
    await insertEpisodes(12);

    const first = await controller.organized(0);

    expect(first.text).toBe('Organized files (1-10 of 12):');
    expect(first.buttons?.[0]).toEqual([
      { label: 'Re-organize Show S01E12', data: 'reorg:12' },
      { label: 'Delete', data: 'delorg:12' },
    ]);
    expect(first.buttons?.at(-1)).toEqual([{ label: 'Next', data: 'org_page:10' }]);

    const second = await controller.organized(10);

    expect(second.text).toBe('Organized files (11-12 of 12):');
    expect(second.buttons?.at(-1)).toEqual([{ label: 'Prev', data: 'org_page:0' }]);
  });

  it('should say so when there is no history', async () => {
    expect(await controller.organized(0)).toEqual({ text: 'No organized entries found.' });
  });

  describe('history', () => {
    beforeEach(async () => {
      await insertEpisodes(7);
      const heat = await records.insert({
        path: path.join(paths.movies, 'Heat (1995)', 'Heat (1995).mkv'),
        fileName: 'Heat (1995).mkv',
        originalName: 'heat.1995.1080p.mkv',
        title: 'Heat',
        category: 'movie',
        year: 1995,
        resolution: '1080p',
        userId: 2,
        method: 'auto',
      });
      clock = heat.createdAt.getTime() + 125_000;
    });

    it('should list every placement five to a page, newest first', async () => {
      const first = await controller.history(0);

      expect(first.text.split('\n').slice(0, 6)).toEqual([
        'History - Page 1 of 2 (8 total entries)',
        '',
        '1. Heat',
        '   2m 05s ago [Auto]',
        '2. Show',
        '   2m 05s ago [Manual]',
      ]);
      expect(first.buttons?.map(row => row.map(button => button.data))).toEqual([
        ['hist_detail:8:0'],
        ['hist_detail:7:0'],
        ['hist_detail:6:0'],
        ['hist_detail:5:0'],
        ['hist_detail:4:0'],
        ['hist_page:5'],
      ]);
      expect(first.buttons?.[4]?.[0]?.label).toBe('Details for #5');
    });

    it('should show the last page for an offset past the end', async () => {
      const last = await controller.history(40);

      expect(last.text.split('\n')[0]).toBe('History - Page 2 of 2 (8 total entries)');
      expect(last.buttons?.[0]).toEqual([{ label: 'Details for #6', data: 'hist_detail:3:5' }]);
      expect(last.buttons?.at(-1)).toEqual([{ label: 'Prev', data: 'hist_page:0' }]);
    });

    it('should describe one placement with its actions and the way back', async () => {
      const detail = await controller.historyDetail(8, 5);

      expect(detail).toEqual({
        text: [
          'History item',
          '',
          'Title: Heat (1995)',
          'Original file: heat.1995.1080p.mkv',
          'Method: Auto',
          'Category: Movie',
          'Resolution: 1080p',
          'Time: 2m 05s ago',
        ].join('\n'),
        buttons: [
          [
            { label: 'Re-organize', data: 'reorg:8' },
            { label: 'Delete entry', data: 'delorg:8' },
          ],
          [{ label: 'Back to History (Page 2)', data: 'hist_page:5' }],
        ],
      });
    });

    it('should title an episode by season and episode', async () => {
      const detail = await controller.historyDetail(2, 0);

      expect(detail.text.split('\n').slice(2, 6)).toEqual([
        'Title: Show - S01E02',
        'Original file: show.s01e2.mkv',
        'Method: Manual',
        'Category: TV',
      ]);
    });

    it('should fall back to the list for a missing entry', async () => {
      const reply = await controller.historyDetail(99, 0);

      expect(reply.text.split('\n').slice(0, 3)).toEqual([
        'Entry not found.',
        '',
        'History - Page 1 of 2 (8 total entries)',
      ]);
    });
  });

  it('should report an empty history', async () => {
    expect(await controller.history(0)).toEqual({ text: 'No history available.' });
  });

  it('should delete only the record', async () => {
    await insertEpisodes(1);

    expect(await controller.deleteRecord(1)).toEqual({ text: 'Record deleted. The file was not touched.' });
    expect(await controller.deleteRecord(1)).toEqual({ text: 'Record not found.' });
  });

  it('should log a failed re-organize', async () => {
    const reply = await controller.reorganize(1, 5);

    expect(reply).toEqual({ text: 'Could not re-organize: organized record not found: 5' });
    const [entry] = await errorLog.recent();
    expect(entry).toMatchObject({ stage: 'reorganize', context: { recordId: 5, userId: 1 } });
  });

  it('should count known users and request shutdown', async () => {
    await users.remember(4);

    expect(await controller.users()).toEqual({ text: 'Known users: 1' });
    controller.shutdown();
    expect(shutdowns).toBe(1);
  });
});
