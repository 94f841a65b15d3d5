import { describe, it, expect } from 'vitest';
import { BackoffSchedule, RetryPolicy, classifyError, createRetryPolicy } from './retryPolicy.js';
import { ProviderContractError, type ErrorKind } from '../providers/errors.js';

const error = (kind: ErrorKind, retryAfterMs?: number) =>
  new ProviderContractError({ kind, message: kind, retryAfterMs });

describe('classifyError', () => {
  it('separates transient, fallback, aborted and fatal kinds', () => {
    expect(classifyError('network')).toBe('transient');
    expect(classifyError('rate_limited')).toBe('transient');
    expect(classifyError('shape_mismatch')).toBe('fallback');
    expect(classifyError('aborted')).toBe('aborted');
    for (const kind of ['auth', 'config', 'malformed_stream', 'invalid_request', 'tool_execution'] as const) {
      expect(classifyError(kind)).toBe('fatal');
    }
  });
});

describe('BackoffSchedule', () => {
  it('grows exponentially up to the ceiling without jitter', () => {
    const schedule = new BackoffSchedule({ baseMs: 100, maxMs: 1000, jitter: 0 });

    expect([1, 2, 3, 4, 5, 6].map((retry) => schedule.delayFor(retry))).toEqual([100, 200, 400, 800, 1000, 1000]);
  });

  it('keeps jittered delays inside [step, step * (1 + jitter)]', () => {
    const low = new BackoffSchedule({ baseMs: 100, maxMs: 10_000, jitter: 0.5, random: () => 0 });
    const high = new BackoffSchedule({ baseMs: 100, maxMs: 10_000, jitter: 0.5, random: () => 0.999 });

    expect(low.delayFor(3)).toBe(400);
    expect(high.delayFor(3)).toBe(600);

    const random = new BackoffSchedule({ baseMs: 100, maxMs: 10_000, jitter: 0.5 });
    for (let i = 0; i < 100; i++) {
      const delay = random.delayFor(2);
      expect(delay).toBeGreaterThanOrEqual(200);
      expect(delay).toBeLessThanOrEqual(300);
    }
  });

  it('honors a provider hint up to maxHintMs', () => {
    const schedule = new BackoffSchedule({ baseMs: 100, maxMs: 1000, jitter: 0, maxHintMs: 5000 });

    expect(schedule.delayFor(1, 2500)).toBe(2500);
    expect(schedule.delayFor(1, 50)).toBe(100);
    expect(schedule.delayFor(1, 60_000)).toBe(5000);
  });
});

describe('RetryPolicy', () => {
  const policy = new RetryPolicy({
    maxAttempts: 3,
    backoff: new BackoffSchedule({ baseMs: 10, maxMs: 1000, jitter: 0 }),
  });
  const chain = { fallbackUsed: false, fallbackAvailable: true };

  it('retries transient errors until the attempt ceiling', () => {
    expect(policy.decide(error('network'), { ...chain, attemptsUsed: 1 })).toEqual({ action: 'retry', delayMs: 10 });
    expect(policy.decide(error('rate_limited'), { ...chain, attemptsUsed: 2 })).toEqual({
      action: 'retry',
      delayMs: 20,
    });
    expect(policy.decide(error('network'), { ...chain, attemptsUsed: 3 })).toEqual({ action: 'fail' });
  });

  it('passes the rate limit hint to the schedule', () => {
    expect(policy.decide(error('rate_limited', 750), { ...chain, attemptsUsed: 1 })).toEqual({
      action: 'retry',
      delayMs: 750,
    });
  });

  it('takes the fallback hop once, and only when one exists', () => {
    expect(policy.decide(error('shape_mismatch'), { ...chain, attemptsUsed: 1 })).toEqual({ action: 'fallback' });
    expect(policy.decide(error('shape_mismatch'), { ...chain, attemptsUsed: 1, fallbackUsed: true })).toEqual({
      action: 'fail',
    });
    expect(
      policy.decide(error('shape_mismatch'), { attemptsUsed: 1, fallbackUsed: false, fallbackAvailable: false })
    ).toEqual({ action: 'fail' });
  });

  it('does not count attempts for a shape mismatch', () => {
    // Even with the budget spent, the hop is still offered
    expect(policy.decide(error('shape_mismatch'), { ...chain, attemptsUsed: 3 })).toEqual({ action: 'fallback' });
  });

  it('fails fast on fatal kinds and stops on abort', () => {
    expect(policy.decide(error('auth'), { ...chain, attemptsUsed: 1 })).toEqual({ action: 'fail' });
    expect(policy.decide(error('malformed_stream'), { ...chain, attemptsUsed: 1 })).toEqual({ action: 'fail' });
    expect(policy.decide(error('aborted'), { ...chain, attemptsUsed: 1 })).toEqual({ action: 'abort' });
  });

  it('is built from runtime settings', () => {
    const built = createRetryPolicy({ retryAttempts: 5, retryDelayMs: 100, retryMaxDelayMs: 400, retryJitter: 0 });

    expect(built.maxAttempts).toBe(5);
    expect(built.backoff.delayFor(4)).toBe(400);
  });
});
