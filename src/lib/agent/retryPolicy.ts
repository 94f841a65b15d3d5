/**
 * Retry, backoff and fallback decisions for one attempt chain.
 *
 * Kept apart from the loop so each piece can be tested on its own: the
 * classifier maps an error kind to a disposition, the schedule turns a retry
 * number into a delay, and the policy combines them with the chain state.
 */

import type { ProviderContractError, ErrorKind } from '../providers/errors.js';

export type Disposition = 'transient' | 'fallback' | 'fatal' | 'aborted';

export function classifyError(kind: ErrorKind): Disposition {
  switch (kind) {
    case 'network':
    case 'rate_limited':
      return 'transient';
    case 'shape_mismatch':
      return 'fallback';
    case 'aborted':
      return 'aborted';
    default:
      return 'fatal';
  }
}

export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  multiplier?: number;
  /** Extra random delay as a fraction of the exponential step, 0..1 */
  jitter?: number;
  /** Longest provider backoff hint that is honored */
  maxHintMs?: number;
  random?: () => number;
}

export class BackoffSchedule {
  readonly baseMs: number;
  readonly maxMs: number;
  readonly multiplier: number;
  readonly jitter: number;
  readonly maxHintMs: number;
  private readonly random: () => number;

  constructor(options: BackoffOptions) {
    this.baseMs = options.baseMs;
    this.maxMs = Math.max(options.maxMs, options.baseMs);
    this.multiplier = options.multiplier ?? 2;
    this.jitter = Math.min(Math.max(options.jitter ?? 0, 0), 1);
    this.maxHintMs = options.maxHintMs ?? 60_000;
    this.random = options.random ?? Math.random;
  }

  /**
   * Delay before retry number `retry` (1-based). The result lies in
   * [step, min(maxMs, step * (1 + jitter))] where step is the capped
   * exponential value; a provider hint raises it up to `maxHintMs`.
   */
  delayFor(retry: number, hintMs?: number): number {
    const exponent = Math.max(retry - 1, 0);
    const step = Math.min(this.maxMs, this.baseMs * this.multiplier ** exponent);
    const delay = Math.min(this.maxMs, step + step * this.jitter * this.random());
    const rounded = Math.round(delay);
    if (hintMs === undefined) return rounded;
    return Math.max(rounded, Math.min(hintMs, this.maxHintMs));
  }
}

export type RetryAction =
  | { action: 'retry'; delayMs: number }
  | { action: 'fallback' }
  | { action: 'fail' }
  | { action: 'abort' };

export interface ChainState {
  /** Attempts issued in this chain that count against the ceiling */
  attemptsUsed: number;
  /** Whether the one fallback hop has been taken */
  fallbackUsed: boolean;
  /** Whether the current profile has a fallback shape at all */
  fallbackAvailable: boolean;
}

export interface RetryPolicyOptions {
  /** Attempt ceiling for transient failures, counting the first attempt */
  maxAttempts: number;
  backoff: BackoffSchedule;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoff: BackoffSchedule;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.backoff = options.backoff;
  }

  decide(error: ProviderContractError, state: ChainState): RetryAction {
    switch (classifyError(error.kind)) {
      case 'aborted':
        return { action: 'abort' };
      case 'fallback':
        // A second mismatch, or one with nowhere to go, ends the chain
        return !state.fallbackUsed && state.fallbackAvailable ? { action: 'fallback' } : { action: 'fail' };
      case 'transient':
        if (state.attemptsUsed >= this.maxAttempts) return { action: 'fail' };
        return { action: 'retry', delayMs: this.backoff.delayFor(state.attemptsUsed, error.retryAfterMs) };
      case 'fatal':
        return { action: 'fail' };
    }
  }
}

export function createRetryPolicy(settings: {
  retryAttempts: number;
  retryDelayMs: number;
  retryMaxDelayMs: number;
  retryJitter: number;
}): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: settings.retryAttempts,
    backoff: new BackoffSchedule({
      baseMs: settings.retryDelayMs,
      maxMs: settings.retryMaxDelayMs,
      jitter: settings.retryJitter,
    }),
  });
}
