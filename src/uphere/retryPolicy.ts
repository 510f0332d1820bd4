import { RateLimitExhaustedError } from '../errors';
import { type Clock, systemClock } from './clock';
import type { RateLimiter } from './rateLimiter';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_MS = 1000;

export type AttemptOutcome<T> = { kind: 'ok'; value: T } | { kind: 'rate-limited' };

export type RetryState =
  | { kind: 'attempting'; attempt: number; totalWaitMs: number }
  | { kind: 'waiting'; attempt: number; waitMs: number; totalWaitMs: number }
  | { kind: 'succeeded'; attempts: number; totalWaitMs: number }
  | { kind: 'exhausted'; attempts: number; totalWaitMs: number };

export type RetryEvent = { kind: 'ok' } | { kind: 'rate-limited' } | { kind: 'waited' };

export interface RetryPolicyOptions {
  limiter: RateLimiter;
  clock?: Clock;
  maxRetries?: number;
  backoffBaseMs?: number;
  onTransition?: (state: RetryState, endpoint: string) => void;
}

export interface RetryRun {
  endpoint: string;
  signal?: AbortSignal;
}

export const INITIAL_RETRY_STATE: RetryState = { kind: 'attempting', attempt: 1, totalWaitMs: 0 };

/**
 * Runs an attempt until it stops reporting a rate limit or retries run out.
 *
 * Errors thrown by the attempt are not retried. Every attempt, the first
 * included, goes through the limiter, so backoff adds to normal pacing.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  private readonly limiter: RateLimiter;
  private readonly clock: Clock;
  private readonly onTransition?: (state: RetryState, endpoint: string) => void;

  constructor(options: RetryPolicyOptions) {
    this.limiter = options.limiter;
    this.clock = options.clock ?? systemClock;
    this.maxRetries = Math.max(0, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
    this.backoffBaseMs = Math.max(0, options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS);
    this.onTransition = options.onTransition;
  }

  /** 1 × base, 2 × base, 3 × base … for retry 1, 2, 3 … */
  backoffFor(retry: number): number {
    return retry * this.backoffBaseMs;
  }

  next(state: RetryState, event: RetryEvent): RetryState {
    if (state.kind === 'attempting' && event.kind === 'ok') {
      return { kind: 'succeeded', attempts: state.attempt, totalWaitMs: state.totalWaitMs };
    }
    if (state.kind === 'attempting' && event.kind === 'rate-limited') {
      if (state.attempt > this.maxRetries) {
        return { kind: 'exhausted', attempts: state.attempt, totalWaitMs: state.totalWaitMs };
      }
      return {
        kind: 'waiting',
        attempt: state.attempt,
        waitMs: this.backoffFor(state.attempt),
        totalWaitMs: state.totalWaitMs
      };
    }
    if (state.kind === 'waiting' && event.kind === 'waited') {
      return {
        kind: 'attempting',
        attempt: state.attempt + 1,
        totalWaitMs: state.totalWaitMs + state.waitMs
      };
    }
    throw new Error(`Illegal retry transition: ${state.kind} + ${event.kind}`);
  }

  async execute<T>(
    attempt: (attemptNumber: number) => Promise<AttemptOutcome<T>>,
    run: RetryRun
  ): Promise<T> {
    let state: RetryState = INITIAL_RETRY_STATE;
    let result: { value: T } | null = null;

    for (;;) {
      this.onTransition?.(state, run.endpoint);

      switch (state.kind) {
        case 'attempting': {
          await this.limiter.acquire(run.signal);
          const outcome = await attempt(state.attempt);
          if (outcome.kind === 'ok') {
            result = { value: outcome.value };
          }
          state = this.next(state, outcome);
          break;
        }
        case 'waiting':
          await this.clock.sleep(state.waitMs, run.signal);
          state = this.next(state, { kind: 'waited' });
          break;
        case 'succeeded':
          if (result) {
            return result.value;
          }
          throw new Error('Retry loop succeeded without a value');
        case 'exhausted':
          throw new RateLimitExhaustedError(
            run.endpoint,
            state.attempts,
            state.totalWaitMs,
            this.limiter.rate
          );
      }
    }
  }
}
