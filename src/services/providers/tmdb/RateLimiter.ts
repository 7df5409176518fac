/**
 * Sliding-window limiter: at most `maxRequests` calls start within any
 * `windowSeconds` span. A caller that finds the window full sleeps until
 * its oldest entry expires, then checks again; the slot is claimed in the
 * same tick as the check that found room.
 */
export class RateLimiter {
  private startedAt: number[] = [];
  private readonly windowMs: number;

  constructor(private readonly maxRequests = 40, windowSeconds = 10) {
    this.windowMs = windowSeconds * 1000;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    while (this.getRequestCount() >= this.maxRequests) {
      const oldest = this.startedAt[0] ?? Date.now();
      const wait = Math.max(0, oldest + this.windowMs - Date.now());
      await new Promise<void>((resolve) => setTimeout(resolve, wait + 100));
    }
    this.startedAt.push(Date.now());
    return fn();
  }

  getRequestCount(): number {
    const cutoff = Date.now() - this.windowMs;
    this.startedAt = this.startedAt.filter((timestamp) => timestamp > cutoff);
    return this.startedAt.length;
  }

  getRemainingRequests(): number {
    return this.maxRequests - this.getRequestCount();
  }
}
