/**
 * Read-only views over a Snapshot for route handlers and dashboards.
 *
 * @module overlay/queries
 */
import type { ExitNodeClient, SnapshotSummary } from '@netglass/shared/overlay-schemas';
import { isDefaultRoute } from './cidr.js';
import type { Device, Snapshot } from './types.js';

/** The peer the local device currently routes through, or null. */
export function findActiveExitNode(snapshot: Snapshot): Device | null {
  const id = snapshot.self.usingExitNode;
  if (!id) return null;
  return snapshot.peers[id] ?? null;
}

/**
 * Peers that may be routing through this device. The agent does not report
 * which exit node a peer uses, so this is a heuristic: a peer flagged as an
 * exit node in the local view is `high` confidence, one that merely offers
 * the option is `medium`. Empty unless the local device offers an exit node.
 */
export function listExitNodeClients(snapshot: Snapshot): ExitNodeClient[] {
  if (!snapshot.self.exitNodeOption) return [];

  const clients: ExitNodeClient[] = [];
  for (const peer of Object.values(snapshot.peers)) {
    const flagged = peer.id === snapshot.self.usingExitNode;
    if (!flagged && !peer.exitNodeCapable) continue;
    clients.push({
      id: peer.id,
      hostname: peer.hostname,
      address: peer.addresses[0] ?? null,
      online: peer.online,
      lastSeen: peer.lastSeen,
      os: peer.os,
      confidence: flagged ? 'high' : 'medium',
    });
  }
  return clients.sort((a, b) => a.hostname.localeCompare(b.hostname));
}

/** Advertised subnet routes, without the exit-node default routes. */
export function listSubnetRoutes(device: Device): string[] {
  return device.advertisedRoutes.filter((route) => !isDefaultRoute(route));
}

export function summarizeSnapshot(snapshot: Snapshot): SnapshotSummary {
  const peers = Object.values(snapshot.peers);
  return {
    generation: snapshot.generation,
    capturedAt: snapshot.capturedAt,
    sourceMode: snapshot.sourceMode,
    stale: snapshot.stale,
    staleReason: snapshot.staleReason,
    hostname: snapshot.self.hostname,
    backendState: snapshot.self.backendState,
    exitNodeStatus: snapshot.self.exitNodeStatus,
    peerCount: peers.length,
    onlinePeerCount: peers.filter((peer) => peer.online).length,
  };
}
