/**
 * @module crawler/scheduler
 * @fileoverview Bounded, self-growing work queue of a sync run.
 *
 * Units are submitted fire-and-forget; a running unit submits the children it
 * discovers and returns. At most `concurrency` units run at once, the rest
 * wait in FIFO order.
 *
 * ```
 *   submit(root)
 *        |
 *        v
 *   [ p-queue, concurrency N ] ──> run(unit) ──> submit(child) ...
 *        |
 *        v
 *   idle()  resolves once nothing is queued and nothing is running
 * ```
 *
 * A child is always queued before its parent's slot is released, so the queue
 * cannot look empty while work remains: `idle()` is exact quiescence.
 */

import PQueue from "p-queue";
import type { Logger } from "../utils/log.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface SchedulerOptions<U> {
  /** Maximum number of units running at the same time. */
  concurrency: number;
  logger: Logger;
  /** Process one unit. May call {@link Scheduler.submit} before it returns. */
  run: (unit: U) => Promise<void>;
  /** Short description of a unit for the failure log line, usually its path. */
  describe: (unit: U) => string;
}

export interface SchedulerStats {
  submitted: number;
  completed: number;
  failed: number;
}

// ---------------------------------------------------------------------------
// Scheduler Class
// ---------------------------------------------------------------------------

/**
 * @example
 * ```ts
 * const scheduler = new Scheduler<string>({
 *   concurrency: 4,
 *   logger,
 *   describe: (path) => path,
 *   run: async (path) => { ... },
 * });
 * scheduler.submit("/data/ilias");
 * await scheduler.idle();
 * ```
 */
export class Scheduler<U> {
  private readonly queue: PQueue;
  private readonly counters: SchedulerStats = { submitted: 0, completed: 0, failed: 0 };

  constructor(private readonly options: SchedulerOptions<U>) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.queue = new PQueue({ concurrency: options.concurrency });
  }

  /**
   * Enqueue a unit. Never blocks; the unit starts as soon as a slot is free.
   * A failing unit is logged as `Syncing {unit}: {error}` and counted, it does
   * not affect any other unit.
   */
  submit(unit: U): void {
    this.counters.submitted += 1;
    this.queue
      .add(() => this.execute(unit))
      .catch((error: unknown) => {
        this.counters.failed += 1;
        this.options.logger.error(`Syncing ${this.options.describe(unit)}`, error);
      });
  }

  /** Resolves when every submitted unit, and everything they submitted, is done. */
  async idle(): Promise<void> {
    await this.queue.onIdle();
  }

  /** Units currently running. */
  get running(): number {
    return this.queue.pending;
  }

  /** Units waiting for a slot. */
  get queued(): number {
    return this.queue.size;
  }

  get stats(): Readonly<SchedulerStats> {
    return { ...this.counters };
  }

  private async execute(unit: U): Promise<void> {
    try {
      await this.options.run(unit);
      this.counters.completed += 1;
    } catch (error) {
      this.counters.failed += 1;
      this.options.logger.error(`Syncing ${this.options.describe(unit)}`, error);
    }
  }
}
