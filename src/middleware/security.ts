import { AuthorizationError } from '../errors/index.js';
import { logger } from './logging.js';

/**
 * Admin guard for privileged commands.
 *
 * An empty admin list means nobody is an admin.
 */
export class AdminGuard {
  private readonly admins: ReadonlySet<number>;

  constructor(adminIds: readonly number[]) {
    this.admins = new Set(adminIds);
  }

  isAdmin(userId: number): boolean {
    return this.admins.has(userId);
  }

  /**
   * Throws AuthorizationError when the user may not run the action
   */
  assertAdmin(userId: number, action: string): void {
    if (!this.isAdmin(userId)) {
      logger.warn('[AdminGuard] Rejected privileged command', {
        service: 'AdminGuard',
        operation: action,
        userId,
      });
      throw new AuthorizationError(action, userId);
    }
  }
}

export type RateCheck = { allowed: true } | { allowed: false; resetSeconds: number };

/**
 * Per-user sliding window over commands and button presses.
 * Refused calls do not count against the window.
 */
export class CommandRateGuard {
  private readonly calls = new Map<number, number[]>();
  private readonly windowMs: number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly maxCalls: number,
    windowSeconds: number,
    private readonly now: () => number = Date.now
  ) {
    this.windowMs = windowSeconds * 1000;
  }

  check(userId: number): RateCheck {
    const now = this.now();
    const windowStart = now - this.windowMs;
    const recent = (this.calls.get(userId) ?? []).filter(timestamp => timestamp > windowStart);

    if (recent.length >= this.maxCalls) {
      this.calls.set(userId, recent);
      const oldest = recent[0] ?? now;
      const resetSeconds = Math.max(0, Math.ceil((oldest + this.windowMs - now) / 1000));
      logger.warn('[CommandRateGuard] Rate limit exceeded', {
        service: 'CommandRateGuard',
        operation: 'check',
        userId,
        limit: this.maxCalls,
        resetSeconds,
      });
      return { allowed: false, resetSeconds };
    }

    recent.push(now);
    this.calls.set(userId, recent);
    return { allowed: true };
  }

  /**
   * Forget users with no calls inside the window; returns how many were dropped
   */
  sweep(): number {
    const windowStart = this.now() - this.windowMs;
    let dropped = 0;
    for (const [userId, timestamps] of this.calls) {
      const last = timestamps[timestamps.length - 1];
      if (last === undefined || last <= windowStart) {
        this.calls.delete(userId);
        dropped++;
      }
    }
    return dropped;
  }

  /**
   * Sweep every two windows until stop()
   */
  startSweep(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => this.sweep(), this.windowMs * 2);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
