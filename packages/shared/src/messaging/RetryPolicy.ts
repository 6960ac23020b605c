import { ConfigurationError } from '../errors';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter as a fraction of the exponential delay, in [0, 1). */
  jitterRatio?: number;
  random?: () => number;
}

/**
 * Capped exponential backoff. With a jitter ratio below 1 the delay for
 * attempt n+1 is always greater than for attempt n, until the cap.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterRatio: number;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new ConfigurationError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    if (!Number.isInteger(options.baseDelayMs) || options.baseDelayMs < 1) {
      throw new ConfigurationError(`baseDelayMs must be a positive integer, got ${options.baseDelayMs}`);
    }
    if (options.maxDelayMs < options.baseDelayMs) {
      throw new ConfigurationError('maxDelayMs must not be below baseDelayMs');
    }
    const jitterRatio = options.jitterRatio ?? 0;
    if (jitterRatio < 0 || jitterRatio >= 1) {
      throw new ConfigurationError(`jitterRatio must be in [0, 1), got ${jitterRatio}`);
    }

    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.jitterRatio = jitterRatio;
    this.random = options.random ?? Math.random;
  }

  /** Delay before redelivering after the `attempt`-th delivery failed. */
  nextDelay(attempt: number): number {
    const exponential = this.baseDelayMs * 2 ** (Math.max(attempt, 1) - 1);
    const jitter = exponential * this.jitterRatio * this.random();
    return Math.min(this.maxDelayMs, Math.floor(exponential + jitter));
  }

  isExhausted(attempt: number): boolean {
    return attempt >= this.maxAttempts;
  }

  /**
   * Longest time between the first delivery and the last possible
   * redelivery: every backoff at its jittered maximum plus a lease per
   * delivery.
   */
  maxRedeliveryWindowMs(visibilityTimeoutMs: number): number {
    let total = 0;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      total += visibilityTimeoutMs;
      if (attempt < this.maxAttempts) {
        const exponential = this.baseDelayMs * 2 ** (attempt - 1);
        total += Math.min(this.maxDelayMs, Math.ceil(exponential * (1 + this.jitterRatio)));
      }
    }
    return total;
  }
}
