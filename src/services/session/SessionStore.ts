import { Session } from '../../types/session.js';
import { logger } from '../../middleware/logging.js';

export type Clock = () => number;

/**
 * Keyed dialog state with a sliding TTL.
 *
 * Expiry is checked on every read, so the optional periodic sweep only
 * reclaims memory for sessions nobody reads again.
 */
export class SessionStore<D extends { kind: string }> {
  private readonly sessions = new Map<number, Session<D>>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now
  ) {}

  get(ownerId: number): Session<D> | undefined {
    const session = this.sessions.get(ownerId);
    if (!session) {
      return undefined;
    }
    if (session.expiresAt <= this.now()) {
      this.sessions.delete(ownerId);
      logger.debug('[SessionStore] Evicted expired session', {
        service: 'SessionStore',
        operation: 'get',
        userId: ownerId,
        kind: session.kind,
      });
      return undefined;
    }
    return session;
  }

  has(ownerId: number): boolean {
    return this.get(ownerId) !== undefined;
  }

  /**
   * Start a dialog, replacing any session the user already had
   */
  create(ownerId: number, data: D): Session<D> {
    const createdAt = this.now();
    const session: Session<D> = {
      ownerId,
      kind: data.kind,
      data,
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    };
    this.sessions.set(ownerId, session);
    return session;
  }

  /**
   * Replace the step data and push the expiry out by a full TTL.
   * Returns undefined when there is no live session to update.
   */
  update(ownerId: number, data: D): Session<D> | undefined {
    const existing = this.get(ownerId);
    if (!existing) {
      return undefined;
    }
    const session: Session<D> = {
      ...existing,
      kind: data.kind,
      data,
      expiresAt: this.now() + this.ttlMs,
    };
    this.sessions.set(ownerId, session);
    return session;
  }

  clear(ownerId: number): boolean {
    return this.sessions.delete(ownerId);
  }

  /**
   * Drop every expired session; returns how many were removed
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [ownerId, session] of this.sessions) {
      if (session.expiresAt <= now) {
        this.sessions.delete(ownerId);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }

  startSweep(intervalMs: number): void {
    if (this.sweepTimer || intervalMs <= 0) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        logger.debug('[SessionStore] Swept expired sessions', {
          service: 'SessionStore',
          operation: 'sweep',
          removed,
        });
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
