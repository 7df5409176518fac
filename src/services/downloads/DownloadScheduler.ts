import { AdmissionResult, CancelReason, DownloadSnapshot, SchedulerStatus } from '../../types/download.js';
import { logger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

/**
 * What the scheduler needs from a unit of work
 */
export interface SchedulableTask {
  readonly id: number;
  /** Must settle once the task is terminal */
  run(): Promise<unknown>;
  cancel(reason?: CancelReason): boolean;
  snapshot(): DownloadSnapshot;
}

export interface SchedulerHooks<T extends SchedulableTask> {
  /** Called synchronously each time a task enters the active set */
  onStarted?(task: T, activeCount: number, promoted: boolean): void;
}

export interface DrainResult {
  /** active tasks that finished inside the timeout */
  completed: number;
  forced: number;
  discarded: number;
}

/** Grace period for force-cancelled tasks to unwind */
const FORCED_CANCEL_GRACE_MS = 5000;

/**
 * Download Scheduler
 *
 * Bounded-concurrency admission with a FIFO queue. Every mutation of the
 * active set and the queue happens synchronously between awaits, so admit,
 * cancel and promote never interleave with one another.
 */
export class DownloadScheduler<T extends SchedulableTask> {
  private readonly active = new Map<number, T>();
  private readonly queue: T[] = [];
  /** run() promises of every task that has started and not yet settled */
  private readonly settled = new Map<T, Promise<void>>();
  private draining = false;

  constructor(
    private readonly maxConcurrent: number,
    private readonly hooks: SchedulerHooks<T> = {}
  ) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get isDraining(): boolean {
    return this.draining;
  }

  get activeCount(): number {
    return this.active.size;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  submit(task: T): AdmissionResult {
    if (this.draining) {
      logger.info('[DownloadScheduler] Rejected task while draining', {
        service: 'DownloadScheduler',
        operation: 'submit',
        transferId: task.id,
      });
      return { status: 'rejected' };
    }

    if (this.find(task.id)) {
      logger.warn('[DownloadScheduler] Duplicate transfer id rejected', {
        service: 'DownloadScheduler',
        operation: 'submit',
        transferId: task.id,
      });
      return { status: 'rejected' };
    }

    if (this.active.size < this.maxConcurrent) {
      this.start(task, false);
      return { status: 'admitted', position: 0 };
    }

    this.queue.push(task);
    logger.info('[DownloadScheduler] Task queued', {
      service: 'DownloadScheduler',
      operation: 'submit',
      transferId: task.id,
      position: this.queue.length,
    });
    return { status: 'queued', position: this.queue.length };
  }

  /**
   * Stop a task wherever it is. An active task frees its slot at once,
   * unless it refuses the cancel (processing cannot be interrupted), in
   * which case it keeps its slot and false is returned.
   */
  cancel(id: number, reason: CancelReason = 'user'): boolean {
    const running = this.active.get(id);
    if (running) {
      if (!running.cancel(reason)) {
        logger.info('[DownloadScheduler] Active task refused cancel', {
          service: 'DownloadScheduler',
          operation: 'cancel',
          transferId: id,
          reason,
        });
        return false;
      }
      this.active.delete(id);
      logger.info('[DownloadScheduler] Active task cancelled', {
        service: 'DownloadScheduler',
        operation: 'cancel',
        transferId: id,
        reason,
      });
      this.fill();
      return true;
    }

    const index = this.queue.findIndex(task => task.id === id);
    if (index === -1) {
      return false;
    }
    const [queued] = this.queue.splice(index, 1);
    queued?.cancel(reason);
    logger.info('[DownloadScheduler] Queued task removed', {
      service: 'DownloadScheduler',
      operation: 'cancel',
      transferId: id,
      reason,
    });
    return true;
  }

  find(id: number): T | undefined {
    return this.active.get(id) ?? this.queue.find(task => task.id === id);
  }

  /**
   * Point-in-time view for display
   */
  status(): SchedulerStatus {
    return {
      active: [...this.active.values()].map(task => task.snapshot()),
      queued: this.queue.map(task => task.snapshot()),
    };
  }

  /**
   * Every started task whose run() has not settled yet. Unlike
   * status().active this still lists a cancelled task while it unwinds.
   */
  inProgress(): DownloadSnapshot[] {
    return [...this.settled.keys()].map(task => task.snapshot());
  }

  /**
   * Refuse new work, drop the queue, wait up to `timeoutMs` for active
   * tasks, then force-cancel whatever is still running.
   */
  async drain(timeoutMs: number): Promise<DrainResult> {
    this.draining = true;

    const discarded = this.queue.splice(0, this.queue.length);
    for (const task of discarded) {
      task.cancel('shutdown');
    }

    const waiting = [...this.settled.keys()];
    logger.info('[DownloadScheduler] Draining', {
      service: 'DownloadScheduler',
      operation: 'drain',
      active: waiting.length,
      discarded: discarded.length,
      timeoutMs,
    });

    await this.waitForSettled(waiting, timeoutMs);

    const stragglers = [...this.settled.keys()];
    for (const task of stragglers) {
      task.cancel('shutdown');
    }
    if (stragglers.length > 0) {
      logger.warn('[DownloadScheduler] Force-cancelled tasks after drain timeout', {
        service: 'DownloadScheduler',
        operation: 'drain',
        transferIds: stragglers.map(task => task.id),
      });
      await this.waitForSettled(stragglers, FORCED_CANCEL_GRACE_MS);
    }

    return {
      completed: waiting.length - stragglers.length,
      forced: stragglers.length,
      discarded: discarded.length,
    };
  }

  private start(task: T, promoted: boolean): void {
    this.active.set(task.id, task);

    const done = task.run().then(
      () => this.settle(task),
      (error: unknown) => {
        logger.error('[DownloadScheduler] Task rejected', {
          service: 'DownloadScheduler',
          operation: 'run',
          transferId: task.id,
          error: getErrorMessage(error),
        });
        this.settle(task);
      }
    );
    this.settled.set(task, done);

    logger.info('[DownloadScheduler] Task started', {
      service: 'DownloadScheduler',
      operation: 'start',
      transferId: task.id,
      active: this.active.size,
      promoted,
    });

    if (this.hooks.onStarted) {
      try {
        this.hooks.onStarted(task, this.active.size, promoted);
      } catch (error) {
        logger.error('[DownloadScheduler] onStarted hook failed', {
          service: 'DownloadScheduler',
          transferId: task.id,
          error: getErrorMessage(error),
        });
      }
    }
  }

  private settle(task: T): void {
    // A cancelled task may already have been evicted and its id reused
    if (this.active.get(task.id) === task) {
      this.active.delete(task.id);
    }
    this.settled.delete(task);
    this.fill();
  }

  private fill(): void {
    while (!this.draining && this.active.size < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      this.start(next, true);
    }
  }

  private async waitForSettled(tasks: T[], timeoutMs: number): Promise<void> {
    const pending = tasks.flatMap(task => {
      const done = this.settled.get(task);
      return done ? [done] : [];
    });
    if (pending.length === 0) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>(resolve => {
      timer = setTimeout(resolve, timeoutMs);
    });
    try {
      await Promise.race([Promise.all(pending).then(() => undefined), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
