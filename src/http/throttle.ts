import { sleep } from './timing.js';

/**
 * Per-domain pacing. Each dispatch reserves the next slot at least
 * `intervalMs` after the previous one, so N acquisitions at R req/s span
 * at least (N - 1) / R seconds. Reservation is synchronous, so concurrent
 * callers are queued in call order without a lock.
 */
export class DomainThrottle {
  readonly domain: string;
  readonly requestsPerSecond: number;
  readonly intervalMs: number;
  private lastDispatchAt = Number.NEGATIVE_INFINITY;

  constructor(domain: string, requestsPerSecond: number) {
    if (!(requestsPerSecond > 0)) {
      throw new RangeError(`Rate limit for ${domain} must be positive, got ${requestsPerSecond}`);
    }
    this.domain = domain;
    this.requestsPerSecond = requestsPerSecond;
    this.intervalMs = 1000 / requestsPerSecond;
  }

  /** Timestamp (ms) of the most recently reserved dispatch slot. */
  get lastDispatch(): number | undefined {
    return Number.isFinite(this.lastDispatchAt) ? this.lastDispatchAt : undefined;
  }

  /** Resolves when the caller may dispatch. */
  async acquire(): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.lastDispatchAt + this.intervalMs);
    this.lastDispatchAt = slot;

    const waitMs = slot - now;
    if (waitMs > 0) await sleep(waitMs);
  }
}
