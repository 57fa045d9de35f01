export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Minimum-spacing rate limiter (token bucket of size 1).
 *
 * `waitIfNeeded()` resolves once at least `60000 / requestsPerMinute` ms
 * have passed since the previous call was stamped, then stamps the new one.
 *
 * Callers are queued on a promise chain, so the read-modify-write of
 * `lastRequestAt` never interleaves: concurrent callers get the same
 * spacing as sequential ones.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private lastRequestAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly requestsPerMinute: number,
    private readonly now: () => number = Date.now,
  ) {
    if (!Number.isFinite(requestsPerMinute) || requestsPerMinute <= 0) {
      throw new RangeError(
        `requestsPerMinute must be a positive number, got ${requestsPerMinute}`,
      );
    }
    this.intervalMs = 60_000 / requestsPerMinute;
  }

  waitIfNeeded(): Promise<void> {
    const turn = this.tail.then(() => this.takeTurn());
    this.tail = turn;
    return turn;
  }

  private async takeTurn(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const wait = this.intervalMs - (this.now() - this.lastRequestAt);
      if (wait > 0) {
        await delay(wait);
      }
    }
    this.lastRequestAt = this.now();
  }
}
