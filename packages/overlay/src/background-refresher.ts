/**
 * Periodic cache warmer.
 *
 * Uses croner with `protect: true` so a slow cycle is never overlapped by the
 * next one. Each cycle goes through the same refresh path as a reader,
 * joining an in-flight refresh instead of starting a second. A failed cycle
 * is logged and the existing Snapshot is left for the next cycle to retry.
 *
 * @module overlay/background-refresher
 */
import { Cron } from 'croner';
import type { Logger } from '@netglass/shared/logger';
import { noopLogger } from '@netglass/shared/logger';
import type { SnapshotCache } from './snapshot-cache.js';

export interface BackgroundRefresherOptions {
  cache: Pick<SnapshotCache, 'refresh'>;
  /** Interval between cycles; croner's granularity is one second. */
  intervalMs: number;
  logger?: Logger;
}

export class BackgroundRefresher {
  private job: Cron | null = null;
  private readonly cache: Pick<SnapshotCache, 'refresh'>;
  private readonly intervalSeconds: number;
  private readonly logger: Logger;

  constructor(options: BackgroundRefresherOptions) {
    this.cache = options.cache;
    this.intervalSeconds = Math.max(1, Math.round(options.intervalMs / 1000));
    this.logger = options.logger ?? noopLogger;
  }

  /** Begin periodic refreshes. Calling start twice keeps the first timer. */
  start(): void {
    if (this.job) return;
    this.job = new Cron('* * * * * *', { interval: this.intervalSeconds, protect: true }, () =>
      this.runOnce(),
    );
    this.logger.info(`background refresh every ${this.intervalSeconds}s`);
  }

  /**
   * Cancel the timer. A refresh already in flight is left to finish or time
   * out on its own.
   */
  stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    this.logger.info('background refresh stopped');
  }

  isRunning(): boolean {
    return this.job !== null;
  }

  /** Run one cycle now. Never rejects. */
  async runOnce(): Promise<void> {
    try {
      const snapshot = await this.cache.refresh();
      if (snapshot.stale) {
        this.logger.warn(`background refresh served stale data: ${snapshot.staleReason ?? 'unknown'}`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`background refresh failed: ${message}`);
    }
  }
}
