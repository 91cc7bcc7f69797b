/**
 * @netglass/overlay -- Cached, coalesced view of a mesh VPN agent's state.
 *
 * Runs the local agent CLI, validates and normalizes its output, optionally
 * augments it from the control-plane API, and serves immutable Snapshots
 * through a single-flight TTL cache.
 *
 * @module overlay
 */

// Main entry point
export { OverlayStateService, createOverlayStateService, defaultWatchdogMs } from './overlay-state.js';
export type { OverlayStateServiceOptions, CreateOverlayStateServiceDeps } from './overlay-state.js';

// Sub-modules (for advanced usage)
export { SnapshotCache } from './snapshot-cache.js';
export type { SnapshotCacheOptions } from './snapshot-cache.js';

export { BackgroundRefresher } from './background-refresher.js';
export type { BackgroundRefresherOptions } from './background-refresher.js';

export { AgentStateLoader } from './state-loader.js';
export type { AgentStateLoaderDeps } from './state-loader.js';

export { ModeArbiter } from './mode-arbiter.js';
export type { ModeDecision, ModeProbe } from './mode-arbiter.js';

export { RemoteApiClient } from './remote-api-client.js';
export type {
  ApiDevice,
  AugmentResult,
  FetchLike,
  RemoteApiClientOptions,
  RemoteError,
  RemoteResult,
} from './remote-api-client.js';

export { CommandExecutor, STATUS_ARGS, resolveAgentBinary } from './command-executor.js';
export type {
  CommandExecutorOptions,
  ExecutionResult,
  ProcessRunner,
  ResolveAgentBinaryOptions,
  RunError,
  RunOptions,
} from './command-executor.js';

export { parseStatus } from './raw-parser.js';
export type { ParseResult, RawPeer, RawStatus } from './raw-parser.js';

export { classifyExitNode, createSnapshot, markStale, normalizeStatus } from './normalizer.js';

// Routes
export {
  DEFAULT_ROUTES,
  canonicalizeRoute,
  canonicalizeRoutes,
  includesDefaultRoutes,
  isDefaultRoute,
  isValidRoute,
} from './cidr.js';

// Queries
export {
  findActiveExitNode,
  listExitNodeClients,
  listSubnetRoutes,
  summarizeSnapshot,
} from './queries.js';

// Errors
export {
  ColdStartFailureError,
  ExecutionFailureError,
  ExecutionTimeoutError,
  OverlayStateError,
  ParseError,
  RemoteUnauthorizedError,
  RemoteUnavailableError,
  isRetryable,
} from './errors.js';
export type { OverlayStateErrorCode } from './errors.js';

// Types
export type {
  CacheState,
  Device,
  ExitNodeStatus,
  LoadContext,
  LoadResult,
  OverlayState,
  RemoteDeviceInfo,
  SelfDevice,
  Snapshot,
  SnapshotListener,
  SourceMode,
  StateLoader,
  Unsubscribe,
} from './types.js';
