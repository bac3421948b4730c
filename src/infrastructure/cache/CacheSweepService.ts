/**
 * @squadline/runtime - Cache Sweep Service
 */

import { IntervalService, consoleLogger, type ILogger } from '../../application/host/host';
import { describeError } from '../../domain/exceptions';

/**
 * Anything with a sweep operation (a `TTLCache`)
 */
export interface Sweepable {
  cleanupExpired(): Promise<number>;
}

/** Sweep period used when none is configured */
export const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/**
 * Background task that purges expired cache entries every interval.
 * A failed sweep is logged and the loop carries on; only stopping the host
 * ends it.
 */
export class CacheSweepService extends IntervalService {
  readonly name = 'cache-sweep';
  private sweeps = 0;
  private failures = 0;

  constructor(
    private readonly cache: Sweepable,
    intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS,
    logger: ILogger = consoleLogger,
  ) {
    super(intervalMs, logger);
  }

  /**
   * Run one sweep now
   *
   * @returns entries removed, or 0 when the sweep failed
   */
  async sweep(): Promise<number> {
    try {
      const removed = await this.cache.cleanupExpired();
      this.sweeps++;
      if (removed > 0) {
        this.logger.debug(`[${this.name}] Removed ${removed} expired entries`);
      }
      return removed;
    } catch (error) {
      this.failures++;
      this.logger.error(`[${this.name}] Sweep failed: ${describeError(error)}`);
      return 0;
    }
  }

  getCounters(): { sweeps: number; failures: number } {
    return { sweeps: this.sweeps, failures: this.failures };
  }

  protected async execute(): Promise<void> {
    await this.sweep();
  }
}
