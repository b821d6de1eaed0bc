import { HttpError } from './http.js';
import { errorMessage, isTransientError } from './errors.js';
import { createLogger, type Logger } from './log.js';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  readonly maxAttempts: number;
  /** Delay before the first retry. */
  readonly baseDelayMs: number;
  /** Growth factor applied per further retry. */
  readonly multiplier: number;
  /** Upper bound for any single backoff delay. */
  readonly maxDelayMs: number;
  /** Minimum gap between the starts of two consecutive outbound calls. */
  readonly minIntervalMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30_000,
  minIntervalMs: 50,
});

export function retryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const p = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(p.maxAttempts) || p.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer (got ${p.maxAttempts})`);
  }
  if (p.baseDelayMs < 0 || p.maxDelayMs < 0 || p.minIntervalMs < 0) {
    throw new RangeError('delays must be >= 0');
  }
  if (p.multiplier < 1) throw new RangeError(`multiplier must be >= 1 (got ${p.multiplier})`);
  return Object.freeze(p);
}

/**
 * Delay before retry number `retry` (1-based):
 * min(baseDelayMs * multiplier^(retry-1), maxDelayMs), raised to a server
 * supplied Retry-After when that is longer (still capped).
 */
export function backoffDelay(policy: RetryPolicy, retry: number, retryAfterMs?: number): number {
  const exponential = policy.baseDelayMs * policy.multiplier ** Math.max(0, retry - 1);
  const wanted = retryAfterMs !== undefined ? Math.max(exponential, retryAfterMs) : exponential;
  return Math.min(wanted, policy.maxDelayMs);
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, ms)),
};

export type ExecutorEvent =
  | { type: 'pace'; label: string; waitMs: number }
  | { type: 'attempt'; label: string; attempt: number }
  | { type: 'retry'; label: string; attempt: number; delayMs: number; error: string }
  | { type: 'success'; label: string; attempts: number }
  | { type: 'failure'; label: string; attempts: number; transient: boolean; error: string };

export interface ExecutorOptions {
  clock?: Clock;
  logger?: Logger;
  onEvent?: (e: ExecutorEvent) => void;
}

export interface ExecutorStats {
  calls: number;
  attempts: number;
  retries: number;
  failures: number;
}

/**
 * Every outbound read/write goes through one executor per run. Calls are
 * strictly sequential; suspension only happens while awaiting the remote or
 * sleeping for pacing/backoff.
 */
export class RateLimitedExecutor {
  readonly policy: RetryPolicy;
  private clock: Clock;
  private logger: Logger;
  private onEvent?: (e: ExecutorEvent) => void;
  private lastStartAt: number | undefined;
  private counters: ExecutorStats = { calls: 0, attempts: 0, retries: 0, failures: 0 };

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY, opts: ExecutorOptions = {}) {
    this.policy = policy;
    this.clock = opts.clock ?? systemClock;
    this.logger = opts.logger ?? createLogger('silent');
    this.onEvent = opts.onEvent;
  }

  stats(): ExecutorStats {
    return { ...this.counters };
  }

  private emit(e: ExecutorEvent) {
    this.onEvent?.(e);
  }

  private async pace(label: string) {
    const gap = this.policy.minIntervalMs;
    if (gap > 0 && this.lastStartAt !== undefined) {
      const wait = this.lastStartAt + gap - this.clock.now();
      if (wait > 0) {
        this.emit({ type: 'pace', label, waitMs: wait });
        await this.clock.sleep(wait);
      }
    }
    this.lastStartAt = this.clock.now();
  }

  async execute<T>(label: string, call: () => Promise<T>): Promise<T> {
    this.counters.calls++;
    let attempt = 0;
    while (true) {
      attempt++;
      await this.pace(label);
      this.counters.attempts++;
      this.emit({ type: 'attempt', label, attempt });
      try {
        const result = await call();
        this.emit({ type: 'success', label, attempts: attempt });
        return result;
      } catch (e) {
        const transient = isTransientError(e);
        const msg = errorMessage(e);
        if (!transient || attempt >= this.policy.maxAttempts) {
          this.counters.failures++;
          this.emit({ type: 'failure', label, attempts: attempt, transient, error: msg });
          if (transient) {
            this.logger.error(`${label}: giving up after ${attempt} attempts`, msg);
          } else {
            this.logger.debug(`${label}: non-retryable failure`, msg);
          }
          throw e;
        }

        const retryAfterMs = e instanceof HttpError ? e.retryAfterMs : undefined;
        const delayMs = backoffDelay(this.policy, attempt, retryAfterMs);
        this.counters.retries++;
        this.emit({ type: 'retry', label, attempt, delayMs, error: msg });
        this.logger.warn(`${label}: transient failure, retrying in ${delayMs}ms (attempt ${attempt}/${this.policy.maxAttempts})`, msg);
        await this.clock.sleep(delayMs);
      }
    }
  }
}
