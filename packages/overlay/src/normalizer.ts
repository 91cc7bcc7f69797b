/**
 * Maps validated agent output into canonical Device entities and builds
 * immutable Snapshots.
 *
 * {@link createSnapshot} and {@link markStale} are the only places a Snapshot
 * is constructed; both return deep-frozen objects.
 *
 * @module overlay/normalizer
 */
import { canonicalizeRoutes, includesDefaultRoutes, isDefaultRoute } from './cidr.js';
import type { RawPeer, RawStatus } from './raw-parser.js';
import type {
  Device,
  ExitNodeStatus,
  OverlayState,
  SelfDevice,
  Snapshot,
  SourceMode,
} from './types.js';

/** The agent's zero time for "never seen". */
const ZERO_TIME = '0001-01-01T00:00:00Z';

/**
 * Tri-state exit-node classification.
 *
 * `active` only when the option is set and both default routes are allowed;
 * `pending` when the option is set without them; `disabled` otherwise,
 * whatever the allowed routes contain.
 */
export function classifyExitNode(
  exitNodeOption: boolean,
  allowedRoutes: readonly string[],
): ExitNodeStatus {
  if (!exitNodeOption) return 'disabled';
  return includesDefaultRoutes(allowedRoutes) ? 'active' : 'pending';
}

function normalizeLastSeen(value: string | undefined): string | null {
  if (!value || value === ZERO_TIME) return null;
  return value;
}

function normalizeDevice(raw: RawPeer): Device {
  const advertisedRoutes = canonicalizeRoutes([...raw.AdvertisedRoutes, ...raw.PrimaryRoutes]);
  const allowedRoutes = canonicalizeRoutes(raw.AllowedIPs);
  const exitNodeOption = raw.ExitNodeOption || advertisedRoutes.some(isDefaultRoute);

  return {
    id: raw.ID,
    hostname: raw.HostName,
    dnsName: raw.DNSName.replace(/\.$/, ''),
    addresses: [...raw.TailscaleIPs],
    os: raw.OS,
    online: raw.Online,
    lastSeen: normalizeLastSeen(raw.LastSeen),
    exitNodeCapable: exitNodeOption,
    exitNodeStatus: classifyExitNode(exitNodeOption, allowedRoutes),
    advertisedRoutes,
    allowedRoutes,
    tags: [...new Set(raw.Tags)].sort(),
  };
}

export interface NormalizeOptions {
  capturedAt: string;
}

/** Normalize a parsed status document. Peers never include the local device. */
export function normalizeStatus(raw: RawStatus, options: NormalizeOptions): OverlayState {
  const base = normalizeDevice(raw.Self);
  const peers: Record<string, Device> = {};
  let usingExitNode: string | null = null;

  for (const rawPeer of Object.values(raw.Peer)) {
    if (rawPeer.ID === raw.Self.ID) continue;
    peers[rawPeer.ID] = normalizeDevice(rawPeer);
    if (rawPeer.ExitNode) usingExitNode = rawPeer.ID;
  }

  const self: SelfDevice = {
    ...base,
    exitNodeOption: base.exitNodeCapable,
    backendState: raw.BackendState,
    agentVersion: raw.Version ?? null,
    usingExitNode,
    tailnetName: raw.CurrentTailnet?.Name ?? null,
    magicDnsSuffix: raw.CurrentTailnet?.MagicDNSSuffix ?? raw.MagicDNSSuffix ?? null,
  };

  return { self, peers, capturedAt: options.capturedAt, sourceMode: 'local_only' };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Build a fresh, immutable Snapshot for a committed generation. */
export function createSnapshot(
  state: OverlayState,
  meta: { generation: number; sourceMode?: SourceMode },
): Snapshot {
  // structuredClone detaches the snapshot from the loader's objects before freezing
  const snapshot: Snapshot = {
    self: structuredClone(state.self),
    peers: structuredClone(state.peers),
    capturedAt: state.capturedAt,
    sourceMode: meta.sourceMode ?? state.sourceMode,
    generation: meta.generation,
    stale: false,
    staleReason: null,
  };
  return deepFreeze(snapshot);
}

/**
 * Re-serve a previous Snapshot as stale. Device and peer data and the
 * generation are unchanged.
 */
export function markStale(snapshot: Snapshot, reason: string): Snapshot {
  return deepFreeze({ ...snapshot, stale: true, staleReason: reason });
}
