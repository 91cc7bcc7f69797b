/**
 * Zod schemas for the overlay state contract.
 *
 * Every consumer (route handlers, dashboards, notification diffing) reads
 * these shapes instead of raw agent or API output. All schemas include
 * `.openapi()` metadata for OpenAPI generation.
 *
 * @module shared/overlay-schemas
 */
import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';

extendZodWithOpenApi(z);

// === Enums ===

export const ExitNodeStatusSchema = z
  .enum(['disabled', 'pending', 'active'])
  .openapi('ExitNodeStatus');

export type ExitNodeStatus = z.infer<typeof ExitNodeStatusSchema>;

export const SourceModeSchema = z.enum(['local_only', 'augmented']).openapi('SourceMode');

export type SourceMode = z.infer<typeof SourceModeSchema>;

export const CacheStateSchema = z
  .enum(['EMPTY', 'FRESH', 'STALE', 'REFRESHING'])
  .openapi('CacheState');

export type CacheState = z.infer<typeof CacheStateSchema>;

// === Devices ===

/** Fields that only the remote API can provide. Never present in local-only snapshots. */
export const RemoteDeviceInfoSchema = z
  .object({
    authorized: z.boolean().nullable(),
    user: z.string().nullable(),
    clientVersion: z.string().nullable(),
    updateAvailable: z.boolean().nullable(),
    keyExpiryDisabled: z.boolean().nullable(),
    expires: z.string().nullable(),
    created: z.string().nullable(),
  })
  .openapi('RemoteDeviceInfo');

export type RemoteDeviceInfo = z.infer<typeof RemoteDeviceInfoSchema>;

export const DeviceSchema = z
  .object({
    id: z.string(),
    hostname: z.string(),
    dnsName: z.string(),
    addresses: z.array(z.string()).describe('Overlay addresses in agent order'),
    os: z.string(),
    online: z.boolean(),
    lastSeen: z.string().nullable(),
    exitNodeCapable: z.boolean(),
    exitNodeStatus: ExitNodeStatusSchema,
    advertisedRoutes: z.array(z.string()).describe('Canonical CIDRs, sorted and deduplicated'),
    allowedRoutes: z.array(z.string()).describe('Canonical CIDRs, sorted and deduplicated'),
    tags: z.array(z.string()),
    remote: RemoteDeviceInfoSchema.optional(),
  })
  .openapi('Device');

export type Device = z.infer<typeof DeviceSchema>;

export const SelfDeviceSchema = DeviceSchema.extend({
  exitNodeOption: z.boolean(),
  backendState: z.string(),
  agentVersion: z.string().nullable(),
  usingExitNode: z.string().nullable().describe('Peer id currently used as exit node'),
  tailnetName: z.string().nullable(),
  magicDnsSuffix: z.string().nullable(),
}).openapi('SelfDevice');

export type SelfDevice = z.infer<typeof SelfDeviceSchema>;

// === Snapshot ===

export const SnapshotSchema = z
  .object({
    self: SelfDeviceSchema,
    peers: z.record(z.string(), DeviceSchema),
    capturedAt: z.string().datetime(),
    sourceMode: SourceModeSchema,
    generation: z.number().int().min(1),
    stale: z.boolean(),
    staleReason: z.string().nullable(),
  })
  .openapi('Snapshot');

export type Snapshot = z.infer<typeof SnapshotSchema>;

// === Route responses ===

export const PeerListQuerySchema = z
  .object({
    online: z.enum(['true', 'false']).optional(),
  })
  .openapi('PeerListQuery');

export type PeerListQuery = z.infer<typeof PeerListQuerySchema>;

export const ExitNodeClientSchema = z
  .object({
    id: z.string(),
    hostname: z.string(),
    address: z.string().nullable(),
    online: z.boolean(),
    lastSeen: z.string().nullable(),
    os: z.string(),
    confidence: z.enum(['high', 'medium']),
  })
  .openapi('ExitNodeClient');

export type ExitNodeClient = z.infer<typeof ExitNodeClientSchema>;

export const SnapshotSummarySchema = z
  .object({
    generation: z.number().int(),
    capturedAt: z.string(),
    sourceMode: SourceModeSchema,
    stale: z.boolean(),
    staleReason: z.string().nullable(),
    hostname: z.string(),
    backendState: z.string(),
    exitNodeStatus: ExitNodeStatusSchema,
    peerCount: z.number().int(),
    onlinePeerCount: z.number().int(),
  })
  .openapi('SnapshotSummary');

export type SnapshotSummary = z.infer<typeof SnapshotSummarySchema>;

export const UnavailableResponseSchema = z
  .object({
    error: z.string(),
    code: z.literal('COLD_START_FAILURE'),
    reason: z.string(),
  })
  .openapi('UnavailableResponse');

export type UnavailableResponse = z.infer<typeof UnavailableResponseSchema>;

/** Freshness fields every overlay response carries. */
export const SnapshotMetaSchema = z
  .object({
    generation: z.number().int(),
    capturedAt: z.string(),
    sourceMode: SourceModeSchema,
    stale: z.boolean(),
    staleReason: z.string().nullable(),
  })
  .openapi('SnapshotMeta');

export type SnapshotMeta = z.infer<typeof SnapshotMetaSchema>;

export const SelfResponseSchema = SnapshotMetaSchema.extend({
  device: SelfDeviceSchema,
}).openapi('SelfResponse');

export type SelfResponse = z.infer<typeof SelfResponseSchema>;

export const PeerListResponseSchema = SnapshotMetaSchema.extend({
  peers: z.array(DeviceSchema).describe('Sorted by hostname'),
}).openapi('PeerListResponse');

export type PeerListResponse = z.infer<typeof PeerListResponseSchema>;

export const ExitNodeResponseSchema = SnapshotMetaSchema.extend({
  status: ExitNodeStatusSchema,
  capable: z.boolean(),
  usingExitNode: z.string().nullable(),
  activeExitNode: DeviceSchema.nullable(),
  clients: z.array(ExitNodeClientSchema),
}).openapi('ExitNodeResponse');

export type ExitNodeResponse = z.infer<typeof ExitNodeResponseSchema>;

export const RoutesResponseSchema = SnapshotMetaSchema.extend({
  advertised: z.array(z.string()),
  allowed: z.array(z.string()),
  subnetRoutes: z.array(z.string()).describe('Advertised routes without 0.0.0.0/0 and ::/0'),
}).openapi('RoutesResponse');

export type RoutesResponse = z.infer<typeof RoutesResponseSchema>;

export const InvalidateResponseSchema = z
  .object({ success: z.literal(true) })
  .openapi('InvalidateResponse');

export const HealthResponseSchema = z
  .object({
    status: z.enum(['ok', 'degraded']),
    version: z.string(),
    uptime: z.number(),
    overlay: z.object({
      cacheState: CacheStateSchema,
      generation: z.number().int(),
      stale: z.boolean().nullable().describe('Null before the first snapshot'),
    }),
  })
  .openapi('HealthResponse');

export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string().optional(),
    details: z.unknown().optional(),
  })
  .openapi('ErrorResponse');
