/**
 * Remote control-plane API client (Tailscale v2 REST API).
 *
 * Used only to augment local data. Every method returns a result union and
 * never throws; {@link RemoteApiClient.augment} hands back the input state
 * untouched on any failure so augmentation is never load-bearing.
 *
 * @module overlay/remote-api-client
 */
import { z } from 'zod';
import type { Logger } from '@netglass/shared/logger';
import { noopLogger } from '@netglass/shared/logger';
import { RemoteUnauthorizedError, RemoteUnavailableError } from './errors.js';
import type { Device, OverlayState, RemoteDeviceInfo } from './types.js';

const ApiDeviceSchema = z.object({
  id: z.string().optional(),
  nodeId: z.string().optional(),
  hostname: z.string().default(''),
  name: z.string().optional(),
  user: z.string().optional(),
  clientVersion: z.string().optional(),
  updateAvailable: z.boolean().optional(),
  authorized: z.boolean().optional(),
  keyExpiryDisabled: z.boolean().optional(),
  expires: z.string().optional(),
  created: z.string().optional(),
});

const DevicesResponseSchema = z.object({
  devices: z.array(ApiDeviceSchema),
});

export type ApiDevice = z.infer<typeof ApiDeviceSchema>;

export type RemoteError = RemoteUnavailableError | RemoteUnauthorizedError;

export type RemoteResult<T> = { ok: true; value: T } | { ok: false; error: RemoteError };

export interface AugmentResult {
  state: OverlayState;
  applied: boolean;
  error?: RemoteError;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RemoteApiClientOptions {
  apiKey: string | null;
  tailnet: string;
  baseUrl: string;
  probeTimeoutMs: number;
  requestTimeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export class RemoteApiClient {
  private readonly apiKey: string | null;
  private readonly tailnet: string;
  private readonly baseUrl: string;
  private readonly probeTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;

  constructor(options: RemoteApiClientOptions) {
    this.apiKey = options.apiKey;
    this.tailnet = options.tailnet;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? noopLogger;
  }

  /** Whether a credential is configured at all. */
  get configured(): boolean {
    return this.apiKey !== null;
  }

  /** Cheap reachability and credential check, bounded by the probe timeout. */
  async probe(): Promise<RemoteResult<void>> {
    const result = await this.request(this.devicesPath('default'), this.probeTimeoutMs);
    if (!result.ok) return result;
    return { ok: true, value: undefined };
  }

  /** List every device in the tailnet. */
  async listDevices(): Promise<RemoteResult<ApiDevice[]>> {
    const result = await this.request(this.devicesPath('all'), this.requestTimeoutMs);
    if (!result.ok) return result;

    const parsed = DevicesResponseSchema.safeParse(result.value);
    if (!parsed.success) {
      return {
        ok: false,
        error: new RemoteUnavailableError('remote API returned an unexpected device list'),
      };
    }
    return { ok: true, value: parsed.data.devices };
  }

  /**
   * Attach remote-only device fields under `device.remote`. Local fields are
   * never touched. On failure the input state comes back as-is.
   */
  async augment(state: OverlayState): Promise<AugmentResult> {
    const result = await this.listDevices();
    if (!result.ok) {
      this.logger.warn(`augmentation skipped: ${result.error.message}`);
      return { state, applied: false, error: result.error };
    }

    const lookup = indexDevices(result.value);
    const withRemote = <T extends Device>(device: T): T => {
      const match = lookup(device);
      return match ? { ...device, remote: toRemoteInfo(match) } : device;
    };

    const peers: Record<string, Device> = {};
    for (const [id, peer] of Object.entries(state.peers)) {
      peers[id] = withRemote(peer);
    }

    return {
      state: { ...state, self: withRemote(state.self), peers, sourceMode: 'augmented' },
      applied: true,
    };
  }

  private devicesPath(fields: 'default' | 'all'): string {
    return `/tailnet/${encodeURIComponent(this.tailnet)}/devices?fields=${fields}`;
  }

  private async request(path: string, timeoutMs: number): Promise<RemoteResult<unknown>> {
    if (!this.apiKey) {
      return { ok: false, error: new RemoteUnavailableError('no remote API credential configured') };
    }

    let resp: Response;
    try {
      resp = await this.fetchFn(`${this.baseUrl}${path}`, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
      const message = timedOut
        ? `remote API timed out after ${timeoutMs}ms`
        : `remote API unreachable: ${err instanceof Error ? err.message : String(err)}`;
      return { ok: false, error: new RemoteUnavailableError(message) };
    }

    if (resp.status === 401 || resp.status === 403) {
      return { ok: false, error: new RemoteUnauthorizedError(resp.status) };
    }
    if (!resp.ok) {
      return {
        ok: false,
        error: new RemoteUnavailableError(`remote API responded ${resp.status}`, resp.status),
      };
    }

    try {
      return { ok: true, value: await resp.json() };
    } catch {
      return { ok: false, error: new RemoteUnavailableError('remote API returned invalid JSON') };
    }
  }
}

function toRemoteInfo(device: ApiDevice): RemoteDeviceInfo {
  return {
    authorized: device.authorized ?? null,
    user: device.user ?? null,
    clientVersion: device.clientVersion ?? null,
    updateAvailable: device.updateAvailable ?? null,
    keyExpiryDisabled: device.keyExpiryDisabled ?? null,
    expires: device.expires ?? null,
    created: device.created ?? null,
  };
}

/** Match by stable node id first, then by hostname when it is unambiguous. */
function indexDevices(devices: ApiDevice[]): (device: Device) => ApiDevice | undefined {
  const byNodeId = new Map<string, ApiDevice>();
  const byHostname = new Map<string, ApiDevice | null>();

  for (const device of devices) {
    if (device.nodeId) byNodeId.set(device.nodeId, device);
    const key = device.hostname.toLowerCase();
    if (!key) continue;
    byHostname.set(key, byHostname.has(key) ? null : device);
  }

  return (device) =>
    byNodeId.get(device.id) ?? byHostname.get(device.hostname.toLowerCase()) ?? undefined;
}
