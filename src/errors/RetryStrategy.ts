import { ApplicationError, ErrorCode } from './ApplicationError.js';
import { logger } from '../middleware/logging.js';

export interface RetryPolicy {
  /** Total tries, the first one included */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** 0-1; each delay moves by up to half this fraction either way */
  jitterFactor: number;
  /** When set, only ApplicationErrors carrying one of these codes are retried */
  retryableErrorCodes?: ErrorCode[];
  /** Replaces the retryable flag check entirely */
  shouldRetry?: (error: Error, attemptNumber: number) => boolean;
  onRetry?: (error: Error, attemptNumber: number, delayMs: number) => void;
}

interface AttemptSummary {
  attemptCount: number;
  totalDelayMs: number;
}

export type RetryResult<T> =
  | ({ success: true; value: T } & AttemptSummary)
  | ({ success: false; error: Error } & AttemptSummary);

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/** Metadata provider GETs */
export const NETWORK_RETRY_POLICY: RetryPolicy = {
  ...DEFAULT_RETRY_POLICY,
  maxAttempts: 4,
  initialDelayMs: 2000,
  maxDelayMs: 60000,
  jitterFactor: 0.3,
  retryableErrorCodes: [
    ErrorCode.NETWORK_CONNECTION_FAILED,
    ErrorCode.NETWORK_TIMEOUT,
    ErrorCode.PROVIDER_RATE_LIMIT,
    ErrorCode.PROVIDER_SERVER_ERROR,
  ],
};

/** OS error codes for locks and handle exhaustion */
export const TRANSIENT_FS_CODES: ReadonlySet<string> = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT']);

/** Renames and moves into the library */
export const FILESYSTEM_RETRY_POLICY: RetryPolicy = {
  ...DEFAULT_RETRY_POLICY,
  maxDelayMs: 10000,
  shouldRetry: (error) => {
    if (error instanceof ApplicationError) {
      return error.retryable;
    }
    const code = 'code' in error ? error.code : undefined;
    return typeof code === 'string' && TRANSIENT_FS_CODES.has(code);
  },
};

export class RetryStrategy {
  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  async execute<T>(operation: () => Promise<T>, operationName = 'operation'): Promise<T> {
    const result = await this.executeWithResult(operation, operationName);
    if (!result.success) {
      throw result.error;
    }
    return result.value;
  }

  async executeWithResult<T>(operation: () => Promise<T>, operationName = 'operation'): Promise<RetryResult<T>> {
    const summary: AttemptSummary = { attemptCount: 0, totalDelayMs: 0 };

    for (;;) {
      summary.attemptCount++;
      let failure: Error;
      try {
        return { success: true, value: await operation(), ...summary };
      } catch (error) {
        failure = error instanceof Error ? error : new Error(String(error));
      }

      if (summary.attemptCount >= this.policy.maxAttempts || !this.isRetryable(failure, summary.attemptCount)) {
        logger.warn(`${operationName} gave up after ${summary.attemptCount} attempt(s)`, {
          error: failure.message,
          ...summary,
        });
        return { success: false, error: failure, ...summary };
      }

      const delayMs = this.calculateDelay(summary.attemptCount);
      summary.totalDelayMs += delayMs;
      this.policy.onRetry?.(failure, summary.attemptCount, delayMs);
      logger.info(`Retrying ${operationName}`, {
        error: failure.message,
        attemptNumber: summary.attemptCount,
        nextAttemptIn: delayMs,
      });
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }

  private isRetryable(error: Error, attemptNumber: number): boolean {
    if (this.policy.shouldRetry) {
      return this.policy.shouldRetry(error, attemptNumber);
    }
    if (!(error instanceof ApplicationError) || !error.retryable) {
      return false;
    }
    return this.policy.retryableErrorCodes?.includes(error.code) ?? true;
  }

  /** Delay before the retry that follows attempt `attemptNumber` (1-based) */
  calculateDelay(attemptNumber: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs, jitterFactor } = this.policy;
    const base = Math.min(initialDelayMs * backoffMultiplier ** (attemptNumber - 1), maxDelayMs);
    const jitter = base * jitterFactor * (Math.random() - 0.5);
    return Math.max(0, Math.floor(base + jitter));
  }
}

export function createRetryStrategy(overrides: Partial<RetryPolicy>, base: RetryPolicy = DEFAULT_RETRY_POLICY): RetryStrategy {
  return new RetryStrategy({ ...base, ...overrides });
}
