import { vi } from 'vitest';
import { createSnapshot, type Device, type SelfDevice, type Snapshot } from '@netglass/overlay';
import type { OverlayReader } from '../overlay.js';

export function device(overrides: Partial<Device> = {}): Device {
  return {
    id: 'n-beta',
    hostname: 'beta',
    dnsName: 'beta.example-tailnet.ts.net',
    addresses: ['100.64.0.2'],
    os: 'linux',
    online: true,
    lastSeen: '2026-03-01T10:00:00Z',
    exitNodeCapable: false,
    exitNodeStatus: 'disabled',
    advertisedRoutes: [],
    allowedRoutes: ['100.64.0.2/32'],
    tags: [],
    ...overrides,
  };
}

export function selfDevice(overrides: Partial<SelfDevice> = {}): SelfDevice {
  return {
    ...device({ id: 'n-self', hostname: 'alpha', dnsName: 'alpha.example-tailnet.ts.net', addresses: ['100.64.0.1'] }),
    exitNodeOption: false,
    backendState: 'Running',
    agentVersion: '1.76.1',
    usingExitNode: null,
    tailnetName: 'example.org',
    magicDnsSuffix: 'example-tailnet.ts.net',
    ...overrides,
  };
}

export function snapshot(
  options: { self?: Partial<SelfDevice>; peers?: Device[]; generation?: number } = {},
): Snapshot {
  const peers: Record<string, Device> = {};
  for (const peer of options.peers ?? []) peers[peer.id] = peer;
  return createSnapshot(
    {
      self: selfDevice(options.self),
      peers,
      capturedAt: '2026-03-01T10:00:05.000Z',
      sourceMode: 'local_only',
    },
    { generation: options.generation ?? 1 },
  );
}

export function stubReader(current: Snapshot | Error) {
  return {
    getSnapshot: vi.fn<OverlayReader['getSnapshot']>(() =>
      current instanceof Error ? Promise.reject(current) : Promise.resolve(current),
    ),
    invalidate: vi.fn<OverlayReader['invalidate']>(),
  };
}
