import { ConfigurationError } from '../errors';
import { RetryPolicy } from './RetryPolicy';

describe('RetryPolicy', () => {
  it('doubles the delay per failed attempt', () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60_000, random: () => 0 });

    expect([1, 2, 3, 4].map((attempt) => policy.nextDelay(attempt))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps at maxDelay', () => {
    const policy = new RetryPolicy({ maxAttempts: 10, baseDelayMs: 1000, maxDelayMs: 5000, random: () => 0 });

    expect(policy.nextDelay(3)).toBe(4000);
    expect(policy.nextDelay(4)).toBe(5000);
    expect(policy.nextDelay(9)).toBe(5000);
  });

  it('adds jitter proportional to the exponential delay', () => {
    const policy = new RetryPolicy({
      maxAttempts: 5,
      baseDelayMs: 1000,
      maxDelayMs: 60_000,
      jitterRatio: 0.2,
      random: () => 0.5,
    });

    expect(policy.nextDelay(1)).toBe(1100);
    expect(policy.nextDelay(3)).toBe(4400);
  });

  it('stays strictly increasing below the cap with maximal jitter', () => {
    const policy = new RetryPolicy({
      maxAttempts: 8,
      baseDelayMs: 1000,
      maxDelayMs: 1_000_000,
      jitterRatio: 0.9,
      random: () => 0.999999,
    });
    const low = new RetryPolicy({ maxAttempts: 8, baseDelayMs: 1000, maxDelayMs: 1_000_000, jitterRatio: 0.9, random: () => 0 });

    for (let attempt = 1; attempt < 7; attempt++) {
      expect(low.nextDelay(attempt + 1)).toBeGreaterThan(policy.nextDelay(attempt));
    }
  });

  it('is exhausted once attempts reach maxAttempts', () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000 });

    expect(policy.isExhausted(4)).toBe(false);
    expect(policy.isExhausted(5)).toBe(true);
  });

  it('computes the maximum redelivery window', () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60_000, jitterRatio: 0.5 });

    // three leases plus backoffs of 1500 and 3000
    expect(policy.maxRedeliveryWindowMs(10_000)).toBe(34_500);
  });

  it('rejects invalid settings', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0, baseDelayMs: 100, maxDelayMs: 1000 })).toThrow(ConfigurationError);
    expect(() => new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 50 })).toThrow(ConfigurationError);
    expect(() => new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterRatio: 1 })).toThrow(
      ConfigurationError
    );
  });
});
