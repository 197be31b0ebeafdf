/**
 * @module services/rate-limiter
 * @fileoverview Token-accumulating limiter for outbound requests.
 *
 * A ticker adds one unit every `60000 / R` milliseconds. Units accumulate
 * without a cap, so an idle period buys a burst of the same size later on.
 * Every request takes exactly one unit.
 *
 * ```
 *   ticker ──+1──+1──+1──────────+1──+1──>
 *                      acquire() acquire()
 *   available: 1   2   3   2   1   2   3
 * ```
 *
 * Waiters are served in arrival order. The limiter only throttles; how many
 * requests are in flight at once is bounded by the scheduler.
 *
 * While started, the ticker keeps the process alive: a request parked in
 * {@link RateLimiter.acquire} may be the only pending work. Call
 * {@link RateLimiter.stop} once the run is over.
 */

/* ────────────────────────────────────────────────────────────────────────────
 * RateLimiter Class
 * ──────────────────────────────────────────────────────────────────────────── */

export class RateLimiter {
  /** Milliseconds between two ticks. */
  readonly intervalMs: number;

  private units = 0;
  private readonly waiters: Array<() => void> = [];
  private timer: NodeJS.Timeout | undefined;

  /**
   * @param requestsPerMinute - Sustained rate R; must be positive.
   * @throws {RangeError} If `requestsPerMinute` is not a positive number.
   */
  constructor(requestsPerMinute: number) {
    if (!(requestsPerMinute > 0) || !Number.isFinite(requestsPerMinute)) {
      throw new RangeError(`rate must be a positive number, got ${requestsPerMinute}`);
    }
    this.intervalMs = 60_000 / requestsPerMinute;
  }

  /** Units that can be taken right now without waiting. */
  get available(): number {
    return this.units;
  }

  /** Number of callers suspended in {@link acquire}. */
  get waiting(): number {
    return this.waiters.length;
  }

  /** Start ticking. Idempotent. */
  start(): void {
    if (this.timer !== undefined) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /**
   * Stop ticking. Accumulated units and pending waiters are kept; waiters
   * resume only if the limiter is started again.
   */
  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Take one unit, suspending until one is available.
   */
  acquire(): Promise<void> {
    if (this.units > 0 && this.waiters.length === 0) {
      this.units -= 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private tick(): void {
    const next = this.waiters.shift();
    if (next === undefined) {
      this.units += 1;
    } else {
      next();
    }
  }
}
