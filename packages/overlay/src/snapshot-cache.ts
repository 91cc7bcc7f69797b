/**
 * Single-flight snapshot cache for one monitored agent.
 *
 * Holds the last good Snapshot with a TTL. Concurrent readers that miss the
 * cache share one in-flight refresh, so N callers during one refresh window
 * cause exactly one underlying load. On failure the previous Snapshot is
 * re-served as stale; with nothing to fall back on, every waiter receives a
 * {@link ColdStartFailureError}.
 *
 * Every slot transition (installing the in-flight promise, committing a
 * result, watchdog release) is a synchronous block with no `await` inside,
 * which makes it atomic on the event loop.
 *
 * @module overlay/snapshot-cache
 */
import type { Logger } from '@netglass/shared/logger';
import { noopLogger } from '@netglass/shared/logger';
import { ColdStartFailureError, OverlayStateError, isRetryable } from './errors.js';
import { createSnapshot, markStale } from './normalizer.js';
import type {
  CacheState,
  LoadResult,
  Snapshot,
  SnapshotListener,
  StateLoader,
  Unsubscribe,
} from './types.js';

export interface SnapshotCacheOptions {
  loader: StateLoader;
  /** How long a committed Snapshot is served without I/O. */
  ttlMs: number;
  /** Pause before the single retry of a timed-out or failed execution. */
  retryBackoffMs: number;
  /** Upper bound on one refresh cycle, retries included. */
  watchdogMs: number;
  logger?: Logger;
  now?: () => number;
}

/** Mutable slot state. Only this class touches it. */
interface CacheSlot {
  snapshot: Snapshot | null;
  expiresAt: number;
  inFlight: Promise<Snapshot> | null;
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const timer = setTimeout(resolve, ms);
    signal.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true },
    );
  });
}

export class SnapshotCache {
  private readonly slot: CacheSlot = { snapshot: null, expiresAt: 0, inFlight: null };
  private readonly listeners = new Set<SnapshotListener>();
  private readonly loader: StateLoader;
  private readonly ttlMs: number;
  private readonly retryBackoffMs: number;
  private readonly watchdogMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private generation = 0;
  private cycle = 0;
  private invalidatedDuringFlight = false;

  constructor(options: SnapshotCacheOptions) {
    this.loader = options.loader;
    this.ttlMs = options.ttlMs;
    this.retryBackoffMs = options.retryBackoffMs;
    this.watchdogMs = options.watchdogMs;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Return the current Snapshot, refreshing first unless it is fresh.
   *
   * Rejects with {@link ColdStartFailureError} only when no Snapshot has ever
   * been committed and the refresh failed.
   */
  getSnapshot(): Promise<Snapshot> {
    const { snapshot } = this.slot;
    if (snapshot && this.isFresh(snapshot)) return Promise.resolve(snapshot);
    return this.refresh();
  }

  /** Start a refresh, or join the one already in flight. Ignores freshness. */
  refresh(): Promise<Snapshot> {
    return this.slot.inFlight ?? this.startRefresh();
  }

  /**
   * Expire the slot so the next read refreshes. A refresh already in flight
   * may have read pre-mutation state, so its result is committed pre-expired.
   */
  invalidate(): void {
    this.slot.expiresAt = 0;
    if (this.slot.inFlight) this.invalidatedDuringFlight = true;
    this.logger.debug('overlay cache invalidated');
  }

  /** Current Snapshot without any I/O, or null before the first commit. */
  peek(): Snapshot | null {
    return this.slot.snapshot;
  }

  getState(): CacheState {
    if (this.slot.inFlight) return 'REFRESHING';
    if (!this.slot.snapshot) return 'EMPTY';
    return this.isFresh(this.slot.snapshot) ? 'FRESH' : 'STALE';
  }

  /** Last committed generation (0 before the first successful refresh). */
  getGeneration(): number {
    return this.generation;
  }

  /**
   * Receive every freshly committed Snapshot in generation order. Stale
   * re-serves are not delivered.
   */
  subscribe(listener: SnapshotListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private isFresh(snapshot: Snapshot): boolean {
    return !snapshot.stale && this.now() <= this.slot.expiresAt;
  }

  private startRefresh(): Promise<Snapshot> {
    const cycle = ++this.cycle;
    const controller = new AbortController();
    this.invalidatedDuringFlight = false;

    const inFlight = new Promise<Snapshot>((resolve, reject) => {
      let settled = false;

      const finish = (result: LoadResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(watchdog);
        controller.abort();
        this.slot.inFlight = null;
        try {
          resolve(this.commit(result));
        } catch (err) {
          reject(err);
        }
      };

      const watchdog = setTimeout(() => {
        this.logger.error(`refresh cycle ${cycle} exceeded watchdog of ${this.watchdogMs}ms`);
        finish({
          ok: false,
          error: new OverlayStateError(
            `refresh exceeded watchdog of ${this.watchdogMs}ms`,
            'EXECUTION_TIMEOUT',
          ),
        });
      }, this.watchdogMs);

      void this.loadWithRetry(cycle, controller.signal).then(finish, (err: unknown) => {
        this.logger.error(`refresh cycle ${cycle} failed unexpectedly:`, err);
        const message = err instanceof Error ? err.message : String(err);
        finish({ ok: false, error: new OverlayStateError(message, 'EXECUTION_FAILURE') });
      });
    });

    this.slot.inFlight = inFlight;
    return inFlight;
  }

  private async loadWithRetry(cycle: number, signal: AbortSignal): Promise<LoadResult> {
    const first = await this.loader.load({ cycle, attempt: 0 });
    if (first.ok) return first;

    if (!isRetryable(first.error)) {
      this.logFailure(first.error);
      return first;
    }

    this.logger.warn(
      `overlay refresh failed, retrying in ${this.retryBackoffMs}ms: ${first.error.message}`,
    );
    await delay(this.retryBackoffMs, signal);
    if (signal.aborted) return first;

    const second = await this.loader.load({ cycle, attempt: 1 });
    if (!second.ok) this.logFailure(second.error);
    return second;
  }

  private logFailure(error: OverlayStateError): void {
    if (error.code === 'PARSE_ERROR') {
      this.logger.error(`agent output rejected, possible agent version mismatch: ${error.message}`);
    } else {
      this.logger.warn(`overlay refresh failed: ${error.message}`);
    }
  }

  private commit(result: LoadResult): Snapshot {
    if (result.ok) {
      this.generation += 1;
      const snapshot = createSnapshot(result.state, { generation: this.generation });
      this.slot.snapshot = snapshot;
      this.slot.expiresAt = this.invalidatedDuringFlight ? 0 : this.now() + this.ttlMs;
      this.invalidatedDuringFlight = false;
      this.logger.debug(
        `committed generation ${snapshot.generation} (${Object.keys(snapshot.peers).length} peers, ${snapshot.sourceMode})`,
      );
      this.notify(snapshot);
      return snapshot;
    }

    const reason = result.error.message;
    const previous = this.slot.snapshot;
    if (!previous) {
      throw new ColdStartFailureError(reason);
    }
    const stale = markStale(previous, reason);
    this.slot.snapshot = stale;
    return stale;
  }

  private notify(snapshot: Snapshot): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        this.logger.error('snapshot listener threw:', err);
      }
    }
  }
}
