/**
 * Type definitions shared across overlay modules.
 *
 * The public contract (Device, SelfDevice, Snapshot) is defined by the zod
 * schemas in `@netglass/shared/overlay-schemas` and re-exported here so the
 * two never drift.
 *
 * @module overlay/types
 */
import type {
  CacheState,
  Device,
  ExitNodeStatus,
  RemoteDeviceInfo,
  SelfDevice,
  Snapshot,
  SourceMode,
} from '@netglass/shared/overlay-schemas';
import type { OverlayStateError } from './errors.js';

export type { CacheState, Device, ExitNodeStatus, RemoteDeviceInfo, SelfDevice, Snapshot, SourceMode };

/** Normalized agent state before it is committed as a generation. */
export interface OverlayState {
  self: SelfDevice;
  peers: Record<string, Device>;
  capturedAt: string;
  sourceMode: SourceMode;
}

/** Identifies one refresh cycle and the attempt within it (0 = first try). */
export interface LoadContext {
  cycle: number;
  attempt: number;
}

export type LoadResult = { ok: true; state: OverlayState } | { ok: false; error: OverlayStateError };

/** Source of normalized state for the cache. One call is one underlying fetch. */
export interface StateLoader {
  load(context: LoadContext): Promise<LoadResult>;
}

export type SnapshotListener = (snapshot: Snapshot) => void;
export type Unsubscribe = () => void;
