import type { Device, OverlayState, SelfDevice } from '../types.js';

/** Agent status document as the CLI prints it, with test defaults. */
export function rawPeer(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    ID: 'n-peer',
    HostName: 'peer',
    DNSName: 'peer.example-tailnet.ts.net.',
    OS: 'linux',
    TailscaleIPs: ['100.64.0.2', 'fd7a:115c:a1e0::2'],
    AllowedIPs: ['100.64.0.2/32'],
    Online: true,
    LastSeen: '2026-03-01T10:00:00Z',
    ExitNode: false,
    ExitNodeOption: false,
    ...overrides,
  };
}

export function rawStatus(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    Version: '1.76.1',
    BackendState: 'Running',
    Self: rawPeer({ ID: 'n-self', HostName: 'alpha', TailscaleIPs: ['100.64.0.1'] }),
    Peer: {},
    MagicDNSSuffix: 'example-tailnet.ts.net',
    CurrentTailnet: { Name: 'example.org', MagicDNSSuffix: 'example-tailnet.ts.net' },
    ...overrides,
  };
}

export function statusBytes(doc: Record<string, unknown> = rawStatus()): Buffer {
  return Buffer.from(JSON.stringify(doc), 'utf8');
}

export function makeDevice(overrides: Partial<Device> = {}): Device {
  return {
    id: 'n-peer',
    hostname: 'peer',
    dnsName: 'peer.example-tailnet.ts.net',
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

export function makeSelf(overrides: Partial<SelfDevice> = {}): SelfDevice {
  return {
    ...makeDevice({ id: 'n-self', hostname: 'alpha', addresses: ['100.64.0.1'] }),
    exitNodeOption: false,
    backendState: 'Running',
    agentVersion: '1.76.1',
    usingExitNode: null,
    tailnetName: 'example.org',
    magicDnsSuffix: 'example-tailnet.ts.net',
    ...overrides,
  };
}

export function makeState(
  options: { self?: Partial<SelfDevice>; peers?: Device[] } = {},
): OverlayState {
  const peers: Record<string, Device> = {};
  for (const peer of options.peers ?? []) peers[peer.id] = peer;
  return {
    self: makeSelf(options.self),
    peers,
    capturedAt: '2026-03-01T10:00:05.000Z',
    sourceMode: 'local_only',
  };
}

/** A promise with its settle functions exposed. */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
