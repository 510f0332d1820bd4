import { InvalidArgumentError } from '../errors';
import { type Clock, systemClock } from './clock';

export const DEFAULT_REQUESTS_PER_SECOND = 1;

export function assertValidRate(requestsPerSecond: number): void {
  if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
    throw new InvalidArgumentError(
      'requestsPerSecond',
      `must be a finite number greater than 0 (got ${requestsPerSecond})`
    );
  }
}

function rejectOnAbort(turn: Promise<void>, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    void turn.then(
      () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Spaces granted acquisitions at least `1000 / rate` ms apart.
 *
 * Callers are served in call order: each acquisition waits for the previous
 * one to be granted before checking the interval and stamping its own grant.
 */
export class RateLimiter {
  private intervalMs: number;
  private requestsPerSecond: number;
  private lastGrantedAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    requestsPerSecond: number = DEFAULT_REQUESTS_PER_SECOND,
    private readonly clock: Clock = systemClock
  ) {
    assertValidRate(requestsPerSecond);
    this.requestsPerSecond = requestsPerSecond;
    this.intervalMs = 1000 / requestsPerSecond;
  }

  get rate(): number {
    return this.requestsPerSecond;
  }

  get minIntervalMs(): number {
    return this.intervalMs;
  }

  get lastGrant(): number | null {
    return this.lastGrantedAt;
  }

  /** Applies to acquisitions that start after this call; waits already computed are kept. */
  setRate(requestsPerSecond: number): void {
    assertValidRate(requestsPerSecond);
    this.requestsPerSecond = requestsPerSecond;
    this.intervalMs = 1000 / requestsPerSecond;
  }

  timeUntilNextAllowed(): number {
    if (this.lastGrantedAt === null) {
      return 0;
    }
    return Math.max(0, this.lastGrantedAt + this.intervalMs - this.clock.now());
  }

  /** An aborted caller is rejected at once; when its turn comes it is skipped without a grant. */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot(signal));
    // Un appel annulé ne doit pas bloquer la file.
    this.tail = turn.catch(() => undefined);
    return signal ? rejectOnAbort(turn, signal) : turn;
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const waitMs = this.timeUntilNextAllowed();
    if (waitMs > 0) {
      await this.clock.sleep(waitMs, signal);
    }
    signal?.throwIfAborted();
    this.lastGrantedAt = this.clock.now();
  }
}
