/**
 * Composition root for one monitored agent.
 *
 * Wires the executor, remote client, mode arbiter, loader, cache and
 * refresher together. Route handlers and other readers depend only on
 * {@link OverlayStateService}.
 *
 * @module overlay/overlay-state
 */
import type { UserConfig } from '@netglass/shared/config-schema';
import type { Logger } from '@netglass/shared/logger';
import { componentLogger, noopLogger } from '@netglass/shared/logger';
import { BackgroundRefresher } from './background-refresher.js';
import { CommandExecutor, type ProcessRunner } from './command-executor.js';
import { ModeArbiter } from './mode-arbiter.js';
import { RemoteApiClient, type FetchLike } from './remote-api-client.js';
import { SnapshotCache } from './snapshot-cache.js';
import { AgentStateLoader } from './state-loader.js';
import type { CacheState, Snapshot, SnapshotListener, StateLoader, Unsubscribe } from './types.js';

export interface OverlayStateServiceOptions {
  cache: SnapshotCache;
  refresher: BackgroundRefresher | null;
  logger?: Logger;
}

export class OverlayStateService {
  private readonly cache: SnapshotCache;
  private readonly refresher: BackgroundRefresher | null;
  private readonly logger: Logger;

  constructor(options: OverlayStateServiceOptions) {
    this.cache = options.cache;
    this.refresher = options.refresher;
    this.logger = options.logger ?? noopLogger;
  }

  getSnapshot(): Promise<Snapshot> {
    return this.cache.getSnapshot();
  }

  refresh(): Promise<Snapshot> {
    return this.cache.refresh();
  }

  /** Call after any action that changes agent state. */
  invalidate(): void {
    this.cache.invalidate();
  }

  peek(): Snapshot | null {
    return this.cache.peek();
  }

  getCacheState(): CacheState {
    return this.cache.getState();
  }

  getGeneration(): number {
    return this.cache.getGeneration();
  }

  subscribe(listener: SnapshotListener): Unsubscribe {
    return this.cache.subscribe(listener);
  }

  /**
   * Start background refreshes and warm the cache. A failed warm-up is logged;
   * readers will retry on their own.
   */
  async start(): Promise<void> {
    this.refresher?.start();
    try {
      const snapshot = await this.cache.refresh();
      this.logger.info(
        `overlay state ready: generation ${snapshot.generation}, ${snapshot.sourceMode}${snapshot.stale ? ' (stale)' : ''}`,
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`overlay warm-up failed: ${message}`);
    }
  }

  stop(): void {
    this.refresher?.stop();
  }
}

/** Default watchdog: two full attempts, the backoff between them, and slack. */
export function defaultWatchdogMs(config: UserConfig): number {
  return (
    2 * (config.agent.commandTimeoutMs + config.remote.requestTimeoutMs) +
    config.cache.retryBackoffMs +
    1000
  );
}

export interface CreateOverlayStateServiceDeps {
  logger?: Logger;
  /** Separate loggers per component; defaults to `logger` labelled `[Component]`. */
  loggerFor?: (component: string) => Logger;
  runner?: ProcessRunner;
  fetch?: FetchLike;
  /** Replaces the agent-backed loader entirely. */
  loader?: StateLoader;
}

/** Build a service for the agent described by `config`. */
export function createOverlayStateService(
  config: UserConfig,
  deps: CreateOverlayStateServiceDeps = {},
): OverlayStateService {
  const base = deps.logger ?? noopLogger;
  const loggerFor = deps.loggerFor ?? ((component: string) => componentLogger(base, component));

  let loader = deps.loader;
  if (!loader) {
    const executor = new CommandExecutor({
      binaryPath: config.agent.binaryPath,
      runner: deps.runner,
      logger: loggerFor('Executor'),
    });
    const remote = config.remote.apiKey
      ? new RemoteApiClient({
          apiKey: config.remote.apiKey,
          tailnet: config.remote.tailnet,
          baseUrl: config.remote.baseUrl,
          probeTimeoutMs: config.remote.probeTimeoutMs,
          requestTimeoutMs: config.remote.requestTimeoutMs,
          fetch: deps.fetch,
          logger: loggerFor('RemoteApi'),
        })
      : null;
    loader = new AgentStateLoader({
      executor,
      arbiter: new ModeArbiter(remote, loggerFor('ModeArbiter')),
      remote,
      commandTimeoutMs: config.agent.commandTimeoutMs,
    });
  }

  const cache = new SnapshotCache({
    loader,
    ttlMs: config.cache.ttlMs,
    retryBackoffMs: config.cache.retryBackoffMs,
    watchdogMs: config.cache.watchdogMs ?? defaultWatchdogMs(config),
    logger: loggerFor('Overlay'),
  });

  const refresher = config.refresher.enabled
    ? new BackgroundRefresher({
        cache,
        intervalMs: config.refresher.intervalMs,
        logger: loggerFor('Refresher'),
      })
    : null;

  return new OverlayStateService({ cache, refresher, logger: base });
}
