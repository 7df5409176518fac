import {
  CancelReason,
  DownloadSnapshot,
  DownloadState,
  ProcessingOutcome,
  SizeClass,
  TERMINAL_DOWNLOAD_STATES,
} from '../../types/download.js';
import { ChatTransport, TransferProgress } from '../../types/transport.js';
import { DownloadCancelledError, InvalidStateError } from '../../errors/index.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { FileOperations } from '../files/fileOperations.js';
import { MediaProcessor } from '../media/MediaProcessingService.js';
import { sanitizePathComponent, uniqueDestination } from '../media/placementResolver.js';
import { DownloadStatsService } from '../stats/DownloadStatsService.js';

const TRANSITIONS: Record<DownloadState, readonly DownloadState[]> = {
  [DownloadState.Queued]: [DownloadState.Downloading, DownloadState.Cancelled],
  [DownloadState.Downloading]: [
    DownloadState.TimedOut,
    DownloadState.Cancelled,
    DownloadState.Failed,
    DownloadState.Completed,
  ],
  [DownloadState.Completed]: [DownloadState.Processing],
  [DownloadState.Processing]: [
    DownloadState.Placed,
    DownloadState.FallbackManual,
    DownloadState.ProcessingError,
  ],
  [DownloadState.TimedOut]: [],
  [DownloadState.Cancelled]: [],
  [DownloadState.Failed]: [],
  [DownloadState.Placed]: [],
  [DownloadState.FallbackManual]: [],
  [DownloadState.ProcessingError]: [],
};

export interface DownloadFinish {
  outcome?: ProcessingOutcome;
  error?: string;
}

/**
 * Receives lifecycle notices for one task. Implementations must not throw.
 */
export interface DownloadObserver {
  started(snapshot: DownloadSnapshot): Promise<void>;
  progress(snapshot: DownloadSnapshot): Promise<void>;
  finished(snapshot: DownloadSnapshot, detail: DownloadFinish): Promise<void>;
}

export interface DownloadRequest {
  transferId: number;
  chatId: number;
  requesterId: number;
  filename: string;
  size: number;
}

export interface DownloadTaskContext {
  transport: ChatTransport;
  processor: MediaProcessor;
  files: FileOperations;
  stats: DownloadStatsService;
  observer: DownloadObserver;
  downloadDir: string;
  maxDurationMs: number;
  largeFileThresholdBytes: number;
  progressIntervalRegularMs: number;
  progressIntervalLargeMs: number;
  now?: () => number;
}

/**
 * Lifecycle of one inbound file from queued to placed or failed.
 *
 * `run()` never rejects; it resolves with the terminal state. Cancellation
 * is a one-way flag checked on every progress callback, and it also aborts
 * the transfer so an unresponsive transport cannot hold the task open.
 */
export class DownloadTask {
  readonly id: number;
  readonly chatId: number;
  readonly requesterId: number;
  readonly filename: string;
  readonly size: number;
  readonly sizeClass: SizeClass;

  private currentState: DownloadState = DownloadState.Queued;
  private cancelFlag = false;
  private cancelReason: CancelReason = 'user';
  private readonly abortController = new AbortController();
  private readonly now: () => number;

  private receivedBytes = 0;
  private rate = 0;
  private lastSampleAt = 0;
  private lastNotifiedAt: number | undefined;
  private startedAt: number | undefined;
  private endedAt: number | undefined;
  private destinationPath: string | undefined;

  constructor(
    request: DownloadRequest,
    private readonly context: DownloadTaskContext
  ) {
    this.id = request.transferId;
    this.chatId = request.chatId;
    this.requesterId = request.requesterId;
    this.filename = request.filename;
    this.size = request.size;
    this.sizeClass = request.size > context.largeFileThresholdBytes ? 'large' : 'regular';
    this.now = context.now ?? Date.now;
  }

  get state(): DownloadState {
    return this.currentState;
  }

  get cancelled(): boolean {
    return this.cancelFlag;
  }

  get timedOut(): boolean {
    return this.cancelFlag && this.cancelReason === 'timeout';
  }

  isTerminal(): boolean {
    return TERMINAL_DOWNLOAD_STATES.has(this.currentState);
  }

  /**
   * Request cancellation. A queued task is cancelled at once; a running
   * one unwinds at its next progress update or when the abort lands.
   * Returns false when the task had already finished.
   */
  cancel(reason: CancelReason = 'user'): boolean {
    if (this.isTerminal() || this.currentState === DownloadState.Completed || this.currentState === DownloadState.Processing) {
      return false;
    }
    if (!this.cancelFlag) {
      this.cancelFlag = true;
      this.cancelReason = reason;
    }
    if (this.currentState === DownloadState.Queued) {
      this.transition(DownloadState.Cancelled);
      this.endedAt = this.now();
    }
    this.abortController.abort();
    return true;
  }

  snapshot(): DownloadSnapshot {
    return {
      id: this.id,
      chatId: this.chatId,
      filename: this.filename,
      size: this.size,
      sizeClass: this.sizeClass,
      state: this.currentState,
      requesterId: this.requesterId,
      progress: {
        receivedBytes: this.receivedBytes,
        percent: this.size > 0 ? Math.min(100, (this.receivedBytes / this.size) * 100) : 0,
        rate: this.rate,
      },
      ...(this.destinationPath !== undefined && { destinationPath: this.destinationPath }),
      ...(this.startedAt !== undefined && { startedAt: new Date(this.startedAt) }),
      ...(this.endedAt !== undefined && { endedAt: new Date(this.endedAt) }),
    };
  }

  async run(): Promise<DownloadState> {
    if (this.currentState !== DownloadState.Queued) {
      return this.currentState;
    }

    try {
      const downloaded = await this.download();
      if (downloaded) {
        await this.processDownload();
      }
    } catch (error) {
      // Only reachable through a bug in a collaborator; keep the file and report
      logger.error('[DownloadTask] Unexpected failure', {
        service: 'DownloadTask',
        operation: 'run',
        transferId: this.id,
        state: this.state,
        error: getErrorMessage(error),
      });
      // read through the getter: the guard above narrowed currentState
      const state = this.state;
      if (state === DownloadState.Downloading) {
        this.transition(DownloadState.Failed);
      } else if (state === DownloadState.Completed || state === DownloadState.Processing) {
        if (state === DownloadState.Completed) {
          this.transition(DownloadState.Processing);
        }
        this.transition(DownloadState.ProcessingError);
      }
      this.endedAt = this.endedAt ?? this.now();
    }

    return this.currentState;
  }

  private transition(next: DownloadState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new InvalidStateError(
        TRANSITIONS[this.currentState].join(' | ') || 'none',
        next,
        `Download ${this.id} cannot move from ${this.currentState} to ${next}`,
        { service: 'DownloadTask', operation: 'transition', entityType: 'download', entityId: this.id }
      );
    }
    logger.debug('[DownloadTask] State change', {
      service: 'DownloadTask',
      transferId: this.id,
      from: this.currentState,
      to: next,
    });
    this.currentState = next;
  }

  /**
   * Resolves true when the file is complete on disk
   */
  private async download(): Promise<boolean> {
    const { files, transport, observer, downloadDir } = this.context;

    this.transition(DownloadState.Downloading);
    this.startedAt = this.now();
    this.lastSampleAt = this.startedAt;

    try {
      await files.assertFreeSpace(downloadDir, this.size);
      this.destinationPath = await uniqueDestination(downloadDir, sanitizePathComponent(this.filename));
    } catch (error) {
      await this.fail(error);
      return false;
    }
    const destination = this.destinationPath;

    await observer.started(this.snapshot());

    const deadline = setTimeout(() => {
      logger.warn('[DownloadTask] Download exceeded maximum duration', {
        service: 'DownloadTask',
        operation: 'download',
        transferId: this.id,
        maxDurationMs: this.context.maxDurationMs,
      });
      this.cancel('timeout');
    }, this.context.maxDurationMs);

    try {
      await this.untilAborted(
        transport.download(this.id, destination, {
          onProgress: progress => this.onProgress(progress),
          signal: this.abortController.signal,
        })
      );
      if (this.cancelFlag) {
        throw new DownloadCancelledError(String(this.id), this.cancelReason);
      }
    } catch (error) {
      await files.removePartial(destination);
      if (this.cancelFlag) {
        await this.finishCancelled();
      } else {
        await this.fail(error);
      }
      return false;
    } finally {
      clearTimeout(deadline);
    }

    this.transition(DownloadState.Completed);
    this.endedAt = this.now();
    this.receivedBytes = this.size;
    const seconds = (this.endedAt - (this.startedAt ?? this.endedAt)) / 1000;
    await this.context.stats.recordDownload(this.requesterId, this.size, seconds, true);

    logger.info('[DownloadTask] Download completed', {
      service: 'DownloadTask',
      operation: 'download',
      transferId: this.id,
      destination,
      seconds,
    });
    return true;
  }

  /**
   * Settles with `work`, or rejects as soon as the task is aborted
   */
  private untilAborted(work: Promise<void>): Promise<void> {
    const signal = this.abortController.signal;
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new DownloadCancelledError(String(this.id), this.cancelReason));
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
      work.then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async onProgress(progress: TransferProgress): Promise<void> {
    if (this.cancelFlag) {
      throw new DownloadCancelledError(String(this.id), this.cancelReason);
    }

    const now = this.now();
    const elapsedSeconds = (now - this.lastSampleAt) / 1000;
    if (elapsedSeconds > 0) {
      this.rate = Math.max(0, (progress.receivedBytes - this.receivedBytes) / elapsedSeconds);
    }
    this.receivedBytes = progress.receivedBytes;
    this.lastSampleAt = now;

    const interval =
      this.sizeClass === 'large' ? this.context.progressIntervalLargeMs : this.context.progressIntervalRegularMs;
    if (this.lastNotifiedAt === undefined || now - this.lastNotifiedAt >= interval) {
      this.lastNotifiedAt = now;
      await this.context.observer.progress(this.snapshot());
    }
  }

  private async finishCancelled(): Promise<void> {
    const timedOut = this.cancelReason === 'timeout';
    this.transition(timedOut ? DownloadState.TimedOut : DownloadState.Cancelled);
    this.endedAt = this.now();

    if (timedOut) {
      await this.context.stats.recordDownload(this.requesterId, this.size, 0, false);
    }

    logger.info('[DownloadTask] Download stopped', {
      service: 'DownloadTask',
      operation: 'download',
      transferId: this.id,
      reason: this.cancelReason,
    });
    await this.context.observer.finished(this.snapshot(), {});
  }

  private async fail(error: unknown): Promise<void> {
    const message = getErrorMessage(error);
    this.transition(DownloadState.Failed);
    this.endedAt = this.now();

    logger.error('[DownloadTask] Download failed', {
      service: 'DownloadTask',
      operation: 'download',
      transferId: this.id,
      error: message,
    });

    await this.context.stats.recordDownload(this.requesterId, this.size, 0, false);
    await this.context.observer.finished(this.snapshot(), { error: message });
  }

  private async processDownload(): Promise<void> {
    const destination = this.destinationPath;
    this.transition(DownloadState.Processing);
    if (destination === undefined) {
      throw new InvalidStateError('destination path', 'none');
    }

    const outcome = await this.context.processor.process(destination, this.requesterId);
    switch (outcome.kind) {
      case 'placed':
        this.transition(DownloadState.Placed);
        break;
      case 'fallback':
        this.transition(DownloadState.FallbackManual);
        break;
      case 'error':
        this.transition(DownloadState.ProcessingError);
        break;
    }
    this.endedAt = this.now();
    await this.context.observer.finished(this.snapshot(), { outcome });
  }
}
