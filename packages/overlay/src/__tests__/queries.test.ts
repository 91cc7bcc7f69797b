import { describe, it, expect } from 'vitest';
import { createSnapshot } from '../normalizer.js';
import {
  findActiveExitNode,
  listExitNodeClients,
  listSubnetRoutes,
  summarizeSnapshot,
} from '../queries.js';
import { makeDevice, makeState } from './fixtures.js';

const exitPeer = makeDevice({
  id: 'n-exit',
  hostname: 'exit-1',
  addresses: ['100.64.0.9'],
  exitNodeCapable: true,
  exitNodeStatus: 'active',
});
const optionPeer = makeDevice({
  id: 'n-laptop',
  hostname: 'laptop',
  addresses: [],
  online: false,
  lastSeen: null,
  exitNodeCapable: true,
  exitNodeStatus: 'pending',
});
const plainPeer = makeDevice({ id: 'n-phone', hostname: 'phone' });

describe('findActiveExitNode', () => {
  it('returns the peer in use', () => {
    const snapshot = createSnapshot(
      makeState({ self: { usingExitNode: 'n-exit' }, peers: [exitPeer, plainPeer] }),
      { generation: 1 },
    );
    expect(findActiveExitNode(snapshot)?.hostname).toBe('exit-1');
  });

  it('returns null when no exit node is used or the peer is gone', () => {
    expect(findActiveExitNode(createSnapshot(makeState({ peers: [exitPeer] }), { generation: 1 }))).toBeNull();
    expect(
      findActiveExitNode(
        createSnapshot(makeState({ self: { usingExitNode: 'n-missing' } }), { generation: 1 }),
      ),
    ).toBeNull();
  });
});

describe('listExitNodeClients', () => {
  it('is empty unless the local device offers an exit node', () => {
    const snapshot = createSnapshot(makeState({ peers: [exitPeer, optionPeer] }), { generation: 1 });
    expect(listExitNodeClients(snapshot)).toEqual([]);
  });

  it('ranks flagged peers high and option-only peers medium', () => {
    const snapshot = createSnapshot(
      makeState({
        self: { exitNodeOption: true, usingExitNode: 'n-exit' },
        peers: [plainPeer, optionPeer, exitPeer],
      }),
      { generation: 1 },
    );

    expect(listExitNodeClients(snapshot)).toEqual([
      {
        id: 'n-exit',
        hostname: 'exit-1',
        address: '100.64.0.9',
        online: true,
        lastSeen: '2026-03-01T10:00:00Z',
        os: 'linux',
        confidence: 'high',
      },
      {
        id: 'n-laptop',
        hostname: 'laptop',
        address: null,
        online: false,
        lastSeen: null,
        os: 'linux',
        confidence: 'medium',
      },
    ]);
  });
});

describe('listSubnetRoutes', () => {
  it('drops the default routes', () => {
    const device = makeDevice({ advertisedRoutes: ['0.0.0.0/0', '10.0.0.0/8', '192.168.1.0/24', '::/0'] });
    expect(listSubnetRoutes(device)).toEqual(['10.0.0.0/8', '192.168.1.0/24']);
  });
});

describe('summarizeSnapshot', () => {
  it('counts peers and carries freshness fields', () => {
    const snapshot = createSnapshot(
      makeState({ self: { exitNodeStatus: 'pending' }, peers: [exitPeer, optionPeer, plainPeer] }),
      { generation: 5 },
    );

    expect(summarizeSnapshot(snapshot)).toEqual({
      generation: 5,
      capturedAt: '2026-03-01T10:00:05.000Z',
      sourceMode: 'local_only',
      stale: false,
      staleReason: null,
      hostname: 'alpha',
      backendState: 'Running',
      exitNodeStatus: 'pending',
      peerCount: 3,
      onlinePeerCount: 2,
    });
  });
});
