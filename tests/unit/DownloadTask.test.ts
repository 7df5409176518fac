import fs from 'fs-extra';
import path from 'path';
import { DownloadFinish, DownloadObserver, DownloadTask, DownloadTaskContext } from '../../src/services/downloads/DownloadTask.js';
import { DownloadStatsService } from '../../src/services/stats/DownloadStatsService.js';
import { FileOperations } from '../../src/services/files/fileOperations.js';
import { MediaProcessor } from '../../src/services/media/MediaProcessingService.js';
import { DownloadSnapshot, DownloadState, ProcessingOutcome } from '../../src/types/download.js';
import { DownloadCancelledError } from '../../src/errors/index.js';
import { FakeTransport, makeTempDir, removeTempDir } from '../utils/fakes.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

class RecordingObserver implements DownloadObserver {
  readonly starts: DownloadSnapshot[] = [];
  readonly progressed: DownloadSnapshot[] = [];
  readonly finishes: Array<{ snapshot: DownloadSnapshot; detail: DownloadFinish }> = [];

  async started(snapshot: DownloadSnapshot): Promise<void> {
    this.starts.push(snapshot);
  }

  async progress(snapshot: DownloadSnapshot): Promise<void> {
    this.progressed.push(snapshot);
  }

  async finished(snapshot: DownloadSnapshot, detail: DownloadFinish): Promise<void> {
    this.finishes.push({ snapshot, detail });
  }
}

class StubProcessor implements MediaProcessor {
  readonly calls: Array<[string, number]> = [];

  constructor(private readonly outcome: ProcessingOutcome) {}

  async process(filePath: string, userId: number): Promise<ProcessingOutcome> {
    this.calls.push([filePath, userId]);
    return this.outcome;
  }
}

class FullDiskOperations extends FileOperations {
  async freeSpace(): Promise<number> {
    return 10;
  }
}

const PLACED: ProcessingOutcome = {
  kind: 'placed',
  path: '/library/Movies/Heat (1995)/Heat (1995).mkv',
  recordId: 1,
  title: 'Heat',
  renamed: true,
  warned: false,
};

describe('DownloadTask', () => {
  let testDb: TestDatabase;
  let downloadDir: string;
  let transport: FakeTransport;
  let stats: DownloadStatsService;
  let observer: RecordingObserver;
  let clock: number;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    downloadDir = await makeTempDir();
    transport = new FakeTransport();
    stats = new DownloadStatsService(testDb.getConnection());
    observer = new RecordingObserver();
    clock = 0;
  });

  afterEach(async () => {
    await testDb.destroy();
    await removeTempDir(downloadDir);
  });

  function createTask(
    overrides: Partial<DownloadTaskContext> = {},
    size = 100
  ): DownloadTask {
    const context: DownloadTaskContext = {
      transport,
      processor: new StubProcessor(PLACED),
      files: new FileOperations({ maxAttempts: 1 }),
      stats,
      observer,
      downloadDir,
      maxDurationMs: 60_000,
      largeFileThresholdBytes: 1000,
      progressIntervalRegularMs: 1000,
      progressIntervalLargeMs: 5000,
      now: () => clock,
      ...overrides,
    };
    return new DownloadTask({ transferId: 42, chatId: 5, requesterId: 7, filename: 'Heat.1995.mkv', size }, context);
  }

  it('should download, process and end in Placed', async () => {
    transport.autoComplete = true;
    const processor = new StubProcessor(PLACED);
    const task = createTask({ processor });

    const state = await task.run();

    expect(state).toBe(DownloadState.Placed);
    expect(processor.calls).toEqual([[path.join(downloadDir, 'Heat.1995.mkv'), 7]]);
    expect(observer.starts).toHaveLength(1);
    expect(observer.finishes).toHaveLength(1);
    expect(observer.finishes[0]?.detail).toEqual({ outcome: PLACED });
    expect(stats.getUser(7).successfulDownloads).toBe(1);
    expect(stats.getGlobal().totalBytes).toBe(100);
  });

  it('should classify size against the large-file threshold', () => {
    expect(createTask({}, 1000).sizeClass).toBe('regular');
    expect(createTask({}, 1001).sizeClass).toBe('large');
  });

  it('should throttle progress notices to the size-class interval', async () => {
    const task = createTask();
    const running = task.run();
    const transfer = await transport.waitForTransfer(42);

    await transfer.options.onProgress({ receivedBytes: 10, totalBytes: 100 });
    clock = 500;
    await transfer.options.onProgress({ receivedBytes: 20, totalBytes: 100 });
    clock = 1000;
    await transfer.options.onProgress({ receivedBytes: 30, totalBytes: 100 });
    await transfer.complete();

    await expect(running).resolves.toBe(DownloadState.Placed);
    expect(observer.progressed.map(snapshot => snapshot.progress.receivedBytes)).toEqual([10, 30]);
    expect(observer.progressed[1]?.progress.rate).toBe(20);
    expect(observer.progressed[1]?.progress.percent).toBe(30);
  });

  it('should stop and remove the partial file when cancelled mid-transfer', async () => {
    const task = createTask();
    const running = task.run();
    const transfer = await transport.waitForTransfer(42);
    await fs.outputFile(transfer.destinationPath, 'partial');

    expect(task.cancel()).toBe(true);

    await expect(running).resolves.toBe(DownloadState.Cancelled);
    expect(await fs.pathExists(transfer.destinationPath)).toBe(false);
    expect(transfer.options.signal.aborted).toBe(true);
    expect(observer.finishes[0]?.snapshot.state).toBe(DownloadState.Cancelled);
    expect(stats.getUser(7).filesHandled).toBe(0);
  });

  it('should reject progress callbacks once cancelled', async () => {
    const task = createTask();
    const running = task.run();
    const transfer = await transport.waitForTransfer(42);

    task.cancel();

    await expect(transfer.options.onProgress({ receivedBytes: 50, totalBytes: 100 })).rejects.toBeInstanceOf(
      DownloadCancelledError
    );
    await running;
  });

  it('should cancel a queued task without downloading', async () => {
    const task = createTask();

    expect(task.cancel()).toBe(true);

    await expect(task.run()).resolves.toBe(DownloadState.Cancelled);
    expect(transport.transfers.size).toBe(0);
    expect(observer.starts).toHaveLength(0);
  });

  it('should refuse to cancel a finished task', async () => {
    transport.autoComplete = true;
    const task = createTask();
    await task.run();

    expect(task.cancel()).toBe(false);
    expect(task.state).toBe(DownloadState.Placed);
  });

  it('should time out a transfer that runs past the maximum duration', async () => {
    const task = createTask({ maxDurationMs: 20 });

    const state = await task.run();

    expect(state).toBe(DownloadState.TimedOut);
    expect(task.timedOut).toBe(true);
    expect(stats.getUser(7).failedDownloads).toBe(1);
    expect(observer.finishes[0]?.snapshot.state).toBe(DownloadState.TimedOut);
  });

  it('should fail before starting when the disk is too full', async () => {
    const task = createTask({ files: new FullDiskOperations() });

    const state = await task.run();

    expect(state).toBe(DownloadState.Failed);
    expect(observer.starts).toHaveLength(0);
    expect(observer.finishes[0]?.detail.error).toBe(
      `Insufficient space at ${downloadDir}: need 100 bytes, 10 available`
    );
    expect(transport.transfers.size).toBe(0);
  });

  it('should fail when the transport reports an error', async () => {
    const task = createTask();
    const running = task.run();
    const transfer = await transport.waitForTransfer(42);

    transfer.fail(new Error('connection reset'));

    await expect(running).resolves.toBe(DownloadState.Failed);
    expect(observer.finishes[0]?.detail).toEqual({ error: 'connection reset' });
    expect(stats.getGlobal().failedDownloads).toBe(1);
  });

  it('should end in FallbackManual when processing falls back', async () => {
    transport.autoComplete = true;
    const task = createTask({
      processor: new StubProcessor({ kind: 'fallback', path: '/library/Other/Heat.1995.mkv', reason: 'low_confidence' }),
    });

    await expect(task.run()).resolves.toBe(DownloadState.FallbackManual);
  });

  it('should end in ProcessingError when processing fails', async () => {
    transport.autoComplete = true;
    const task = createTask({ processor: new StubProcessor({ kind: 'error', message: 'provider down' }) });

    await expect(task.run()).resolves.toBe(DownloadState.ProcessingError);
    expect(observer.finishes[0]?.detail).toEqual({ outcome: { kind: 'error', message: 'provider down' } });
  });

  it('should end in ProcessingError when the processor throws', async () => {
    transport.autoComplete = true;
    const processor: MediaProcessor = {
      process: async () => {
        throw new Error('processor crashed');
      },
    };
    const task = createTask({ processor });

    await expect(task.run()).resolves.toBe(DownloadState.ProcessingError);
    expect(task.snapshot().endedAt).toEqual(new Date(0));
    expect(await fs.pathExists(path.join(downloadDir, 'Heat.1995.mkv'))).toBe(true);
  });

  it('should not overwrite an existing file of the same name', async () => {
    await fs.outputFile(path.join(downloadDir, 'Heat.1995.mkv'), 'earlier');
    const task = createTask();
    const running = task.run();
    const transfer = await transport.waitForTransfer(42);

    expect(transfer.destinationPath).not.toBe(path.join(downloadDir, 'Heat.1995.mkv'));
    await transfer.complete();
    await running;
    expect(await fs.readFile(path.join(downloadDir, 'Heat.1995.mkv'), 'utf8')).toBe('earlier');
  });
});
