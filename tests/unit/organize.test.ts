import fs from 'fs-extra';
import path from 'path';
import { OrganizeService } from '../../src/services/organize/OrganizeService.js';
import { OrganizeFlow } from '../../src/services/organize/OrganizeFlow.js';
import { BulkPropagationService } from '../../src/services/organize/BulkPropagationService.js';
import { OrganizedRecordService } from '../../src/services/records/OrganizedRecordService.js';
import { ErrorLogService } from '../../src/services/records/ErrorLogService.js';
import { FileOperations } from '../../src/services/files/fileOperations.js';
import { SessionStore } from '../../src/services/session/SessionStore.js';
import { DialogState } from '../../src/types/session.js';
import { PathsConfig } from '../../src/config/types.js';
import { DEFAULT_MEDIA_EXTENSIONS } from '../../src/config/constants.js';
import { FileNotFoundError, ResourceNotFoundError } from '../../src/errors/index.js';
import { makeTempDir, makeTestConfig, removeTempDir, writeFile } from '../utils/fakes.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

class FailingMoveOperations extends FileOperations {
  renames = 0;

  constructor(private readonly failRestore = false) {
    super({ maxAttempts: 1 });
  }

  async move(): Promise<void> {
    throw new Error('disk detached');
  }

  async rename(source: string, destination: string): Promise<void> {
    this.renames++;
    if (this.failRestore && this.renames > 1) {
      throw new Error('rename refused');
    }
    await super.rename(source, destination);
  }
}

const NEXT_STEPS = 'Send /organize for another file, or /propagate to place the following episodes.';

describe('organizing', () => {
  let baseDir: string;
  let paths: PathsConfig;
  let testDb: TestDatabase;
  let files: FileOperations;
  let records: OrganizedRecordService;
  let errorLog: ErrorLogService;
  let organizer: OrganizeService;
  let sessions: SessionStore<DialogState>;
  let inFlight: string[];

  beforeEach(async () => {
    baseDir = await makeTempDir();
    paths = makeTestConfig(baseDir).paths;
    testDb = await createTestDatabase();
    files = new FileOperations({ maxAttempts: 1 });
    records = new OrganizedRecordService(testDb.getConnection());
    errorLog = new ErrorLogService(testDb.getConnection());
    organizer = new OrganizeService(paths, files, records);
    sessions = new SessionStore<DialogState>(60_000);
    inFlight = [];
  });

  afterEach(async () => {
    sessions.stop();
    await testDb.destroy();
    await removeTempDir(baseDir);
  });

  describe('OrganizeService', () => {
    it('should add a timestamp suffix instead of overwriting', async () => {
      const targetDir = path.join(paths.movies, 'Heat (1995)');
      await writeFile(targetDir, 'Heat (1995).mkv', 'earlier');
      const source = await writeFile(paths.downloads, 'heat.1995.mkv');

      const result = await organizer.place({
        sourcePath: source,
        metadata: { category: 'movie', title: 'Heat', year: 1995 },
        userId: 7,
        method: 'auto',
        rename: true,
      });

      expect(path.dirname(result.path)).toBe(targetDir);
      expect(path.basename(result.path)).toMatch(/^Heat \(1995\)_\d+\.mkv$/);
      expect(await fs.readFile(path.join(targetDir, 'Heat (1995).mkv'), 'utf8')).toBe('earlier');
      expect(result.record.originalName).toBe('heat.1995.mkv');
    });

    it('should restore the original name when the move fails', async () => {
      const source = await writeFile(paths.downloads, 'heat.1995.mkv');
      const failing = new OrganizeService(paths, new FailingMoveOperations(), records);

      await expect(
        failing.place({
          sourcePath: source,
          metadata: { category: 'movie', title: 'Heat', year: 1995 },
          userId: 7,
          method: 'auto',
          rename: true,
        })
      ).rejects.toThrow('disk detached');

      expect(await fs.pathExists(source)).toBe(true);
      expect(await fs.pathExists(path.join(paths.downloads, 'Heat (1995).mkv'))).toBe(false);
      expect(await records.organizedNames()).toEqual(new Set());
    });

    it('should name the renamed path when the original name cannot be restored', async () => {
      const source = await writeFile(paths.downloads, 'heat.1995.mkv');
      const renamedPath = path.join(paths.downloads, 'Heat (1995).mkv');
      const failing = new OrganizeService(paths, new FailingMoveOperations(true), records);

      await expect(
        failing.place({
          sourcePath: source,
          metadata: { category: 'movie', title: 'Heat', year: 1995 },
          userId: 7,
          method: 'auto',
          rename: true,
        })
      ).rejects.toMatchObject({ path: renamedPath, message: `disk detached (file left at ${renamedPath})` });

      expect(await fs.pathExists(renamedPath)).toBe(true);
    });

    it('should rename a file in place when re-organizing', async () => {
      const source = await writeFile(paths.downloads, 'Heat.1995.mkv');
      const first = await organizer.place({
        sourcePath: source,
        metadata: { category: 'movie', title: 'Heat', year: 1995 },
        userId: 7,
        method: 'auto',
        rename: false,
      });

      const again = await organizer.reorganize(first.record.id, 9);

      expect(again.path).toBe(path.join(paths.movies, 'Heat (1995)', 'Heat (1995).mkv'));
      expect(again.renamed).toBe(true);
      expect(again.record).toMatchObject({ method: 'manual', userId: 9, originalName: 'Heat.1995.mkv' });
      expect(await fs.pathExists(first.path)).toBe(false);
    });

    it('should reject re-organizing a missing record or file', async () => {
      await expect(organizer.reorganize(99, 7)).rejects.toBeInstanceOf(ResourceNotFoundError);

      const record = await records.insert({
        path: path.join(paths.movies, 'Gone', 'Gone.mkv'),
        fileName: 'Gone.mkv',
        originalName: 'Gone.mkv',
        title: 'Gone',
        category: 'movie',
        userId: 7,
        method: 'manual',
      });
      await expect(organizer.reorganize(record.id, 7)).rejects.toBeInstanceOf(FileNotFoundError);
    });
  });

  describe('OrganizeFlow', () => {
    let flow: OrganizeFlow;

    beforeEach(async () => {
      flow = new OrganizeFlow(sessions, organizer, records, files, errorLog, {
        directories: [paths.downloads, paths.other],
        extensions: DEFAULT_MEDIA_EXTENSIONS,
        inFlight: () => inFlight,
      });
      await writeFile(paths.downloads, 'show.s01e03.720p.mkv');
      await writeFile(paths.other, 'random.mp4');
      await writeFile(paths.other, 'notes.txt');
    });

    it('should offer unorganized media files from every scanned directory', async () => {
      const reply = await flow.start(7);

      expect(reply).toEqual({
        text: 'Choose a file to organize:',
        buttons: [
          [{ label: 'show.s01e03.720p.mkv', data: 'org_file:0' }],
          [{ label: 'random.mp4', data: 'org_file:1' }],
        ],
      });
    });

    it('should leave out files still downloading and files already organized', async () => {
      inFlight = [path.join(paths.downloads, 'show.s01e03.720p.mkv')];
      await records.insert({
        path: path.join(paths.movies, 'Random', 'Random.mp4'),
        fileName: 'Random.mp4',
        originalName: 'random.mp4',
        title: 'Random',
        category: 'movie',
        userId: 7,
        method: 'manual',
      });

      expect(await flow.start(7)).toEqual({ text: 'No files need organizing.' });
    });

    it('should walk a TV file through every step and place it', async () => {
      await flow.start(7);

      expect((await flow.selectFile(7, '0')).text).toBe(
        'File: show.s01e03.720p.mkv\nDetected resolution: 720p\nSelect a category:'
      );
      expect(flow.chooseCategory(7, 'tv').text).toBe('Category: TV\nReply with the title.');
      expect(await flow.handleText(7, 'Show')).toEqual({ text: 'Reply with the season number (e.g. 1).' });
      expect(await flow.handleText(7, 'first')).toEqual({
        text: 'The season must be a whole number. Reply with the season number.',
      });
      expect(await flow.handleText(7, '1')).toEqual({ text: 'Reply with the episode number (e.g. 3).' });
      expect(await flow.handleText(7, '0')).toEqual({
        text: 'The episode must be a number from 1. Reply with the episode number.',
      });

      const done = await flow.handleText(7, '3');

      const placed = path.join(paths.tv, 'Show', 'Season 01', 'Show - S01E03 [720p].mkv');
      expect(done).toEqual({ text: `Moved to ${placed}\n${NEXT_STEPS}` });
      expect(await fs.pathExists(placed)).toBe(true);
      expect(await records.latestManual()).toMatchObject({ title: 'Show', season: 1, episode: 3, resolution: '720p' });
      expect(sessions.has(7)).toBe(false);
    });

    it('should ask a movie for a four digit year', async () => {
      await flow.start(7);
      await flow.selectFile(7, '1');
      flow.chooseCategory(7, 'movie');
      await flow.handleText(7, 'Random');

      expect(await flow.handleText(7, '99')).toEqual({ text: 'The year must be four digits. Reply with the year.' });

      const placed = path.join(paths.movies, 'Random (1999)', 'Random (1999).mp4');
      expect(await flow.handleText(7, '1999')).toEqual({ text: `Moved to ${placed}\n${NEXT_STEPS}` });
    });

    it('should end the dialog when the file is skipped', async () => {
      await flow.start(7);
      await flow.selectFile(7, '0');

      expect(flow.chooseCategory(7, 'skip')).toEqual({ text: 'Skipped show.s01e03.720p.mkv.' });
      expect(await flow.handleText(7, 'Show')).toBeNull();
    });

    it('should notice a file that vanished after the scan', async () => {
      await flow.start(7);
      await fs.remove(path.join(paths.downloads, 'show.s01e03.720p.mkv'));

      expect(await flow.selectFile(7, '0')).toEqual({
        text: 'show.s01e03.720p.mkv is gone. Use /organize to scan again.',
      });
      expect(sessions.has(7)).toBe(false);
    });

    it('should ignore text from users without a dialog', async () => {
      expect(await flow.handleText(7, 'hello')).toBeNull();
    });

    it('should cancel an open dialog once', async () => {
      await flow.start(7);

      expect(flow.cancel(7)).toEqual({ text: 'Cancelled.' });
      expect(flow.cancel(7)).toEqual({ text: 'Nothing to cancel.' });
    });
  });

  describe('BulkPropagationService', () => {
    let bulk: BulkPropagationService;
    const seasonDir = (): string => path.join(paths.tv, 'Show', 'Season 01');

    beforeEach(() => {
      bulk = new BulkPropagationService(sessions, organizer, records, files, errorLog, {
        downloadDir: paths.downloads,
        extensions: DEFAULT_MEDIA_EXTENSIONS,
        similarityThreshold: 0.8,
        inFlight: () => inFlight,
      });
    });

    async function placeReference(): Promise<void> {
      await records.insert({
        path: path.join(seasonDir(), 'Show - S01E03.mkv'),
        fileName: 'Show - S01E03.mkv',
        originalName: 'show.s01e03.mkv',
        title: 'Show',
        category: 'tv',
        season: 1,
        episode: 3,
        userId: 7,
        method: 'manual',
      });
    }

    it('should offer only later episodes of the same season and show', async () => {
      await placeReference();
      for (const name of [
        'show.s01e05.1080p.mkv',
        'show.s01e04.mkv',
        'show.s01e02.mkv',
        'show.s02e06.mkv',
        'other.show.s01e07.mkv',
      ]) {
        await writeFile(paths.downloads, name);
      }
      const reference = await records.latestManual();
      if (!reference) {
        throw new Error('reference record missing');
      }

      const items = await bulk.findCandidates(reference);

      expect(items.map(item => [item.name, path.basename(item.destination)])).toEqual([
        ['show.s01e04.mkv', 'Show - S01E04.mkv'],
        ['show.s01e05.1080p.mkv', 'Show - S01E05 [1080p].mkv'],
      ]);
    });

    it('should place confirmed episodes and count skipped ones', async () => {
      await placeReference();
      await writeFile(paths.downloads, 'show.s01e04.mkv');
      await writeFile(paths.downloads, 'show.s01e05.1080p.mkv');

      expect(await bulk.start(7)).toEqual({
        text: 'Propagate 1/2:\nshow.s01e04.mkv\n-> Show - S01E04.mkv',
        buttons: [
          [
            { label: 'Yes', data: 'bulk:yes' },
            { label: 'No', data: 'bulk:no' },
          ],
        ],
      });

      const placed = path.join(seasonDir(), 'Show - S01E04.mkv');
      expect((await bulk.answer(7, 'yes')).text).toBe(
        `Moved to ${placed}\nPropagate 2/2:\nshow.s01e05.1080p.mkv\n-> Show - S01E05 [1080p].mkv`
      );
      expect(await bulk.answer(7, 'no')).toEqual({
        text: 'Skipped show.s01e05.1080p.mkv.\nPropagation complete: 1 placed, 1 skipped.',
      });

      expect(await fs.pathExists(placed)).toBe(true);
      expect(await fs.pathExists(path.join(paths.downloads, 'show.s01e05.1080p.mkv'))).toBe(true);
      expect(await bulk.answer(7, 'yes')).toEqual({ text: 'No propagation in progress.' });
    });

    it('should act once on a repeated confirmation of the same episode', async () => {
      await placeReference();
      await writeFile(paths.downloads, 'show.s01e04.mkv');
      await writeFile(paths.downloads, 'show.s01e05.1080p.mkv');
      await bulk.start(7);

      const [first, second] = await Promise.all([bulk.answer(7, 'yes'), bulk.answer(7, 'yes')]);

      const placed = path.join(seasonDir(), 'Show - S01E04.mkv');
      expect(first?.text).toBe(`Moved to ${placed}\nPropagate 2/2:\nshow.s01e05.1080p.mkv\n-> Show - S01E05 [1080p].mkv`);
      expect(second).toEqual({ text: 'Still placing the previous file, please wait.' });
      expect(await fs.pathExists(path.join(paths.downloads, 'show.s01e05.1080p.mkv'))).toBe(true);
      expect(await bulk.answer(7, 'no')).toEqual({
        text: 'Skipped show.s01e05.1080p.mkv.\nPropagation complete: 1 placed, 1 skipped.',
      });
    });

    it('should explain when there is nothing to propagate from', async () => {
      expect(await bulk.start(7)).toEqual({ text: 'No manual placements to propagate from.' });

      await records.insert({
        path: path.join(paths.movies, 'Heat (1995)', 'Heat (1995).mkv'),
        fileName: 'Heat (1995).mkv',
        originalName: 'heat.mkv',
        title: 'Heat',
        category: 'movie',
        year: 1995,
        userId: 7,
        method: 'manual',
      });
      expect(await bulk.start(7)).toEqual({ text: 'The latest manual placement (Heat) is not an episode.' });
    });

    it('should report when no later episodes are waiting', async () => {
      await placeReference();

      expect(await bulk.start(7)).toEqual({ text: 'No further episodes of Show found.' });
    });
  });
});
