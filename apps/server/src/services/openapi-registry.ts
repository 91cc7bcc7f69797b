/**
 * OpenAPI 3 document for the HTTP API, generated from the shared zod schemas
 * so the document and the response types never drift.
 *
 * @module services/openapi-registry
 */
import { OpenAPIRegistry, OpenApiGeneratorV3, type RouteConfig } from '@asteasolutions/zod-to-openapi';
import type { ZodTypeAny } from 'zod';
import {
  ErrorResponseSchema,
  ExitNodeResponseSchema,
  HealthResponseSchema,
  InvalidateResponseSchema,
  PeerListQuerySchema,
  PeerListResponseSchema,
  RoutesResponseSchema,
  SelfResponseSchema,
  SnapshotSchema,
  SnapshotSummarySchema,
  UnavailableResponseSchema,
} from '@netglass/shared/overlay-schemas';
import { ConfigResponseSchema } from '@netglass/shared/config-schema';
import { SERVER_VERSION } from '../lib/version.js';

function json(description: string, schema: ZodTypeAny) {
  return { description, content: { 'application/json': { schema } } };
}

const unavailable = json('No snapshot has ever been loaded', UnavailableResponseSchema);

const overlayReads: Array<{ path: string; summary: string; schema: ZodTypeAny; request?: RouteConfig['request'] }> = [
  { path: '/snapshot', summary: 'Current snapshot', schema: SnapshotSchema },
  { path: '/self', summary: 'Local device', schema: SelfResponseSchema },
  {
    path: '/peers',
    summary: 'Peers sorted by hostname',
    schema: PeerListResponseSchema,
    request: { query: PeerListQuerySchema },
  },
  { path: '/exit-node', summary: 'Exit node status and likely clients', schema: ExitNodeResponseSchema },
  { path: '/routes', summary: 'Advertised and allowed routes', schema: RoutesResponseSchema },
  { path: '/summary', summary: 'Counts and freshness', schema: SnapshotSummarySchema },
];

export function generateOpenAPISpec() {
  const registry = new OpenAPIRegistry();

  for (const read of overlayReads) {
    registry.registerPath({
      method: 'get',
      path: `/api/overlay${read.path}`,
      tags: ['Overlay'],
      summary: read.summary,
      request: read.request,
      responses: {
        200: json(read.summary, read.schema),
        ...(read.request ? { 400: json('Validation failed', ErrorResponseSchema) } : {}),
        503: unavailable,
      },
    });
  }

  registry.registerPath({
    method: 'post',
    path: '/api/overlay/invalidate',
    tags: ['Overlay'],
    summary: 'Mark the cached snapshot expired so the next read refreshes',
    responses: { 200: json('Invalidated', InvalidateResponseSchema) },
  });

  registry.registerPath({
    method: 'get',
    path: '/api/health',
    tags: ['Health'],
    summary: 'Liveness and overlay freshness',
    responses: { 200: json('Server health', HealthResponseSchema) },
  });

  registry.registerPath({
    method: 'get',
    path: '/api/config',
    tags: ['Config'],
    summary: 'Effective configuration',
    responses: { 200: json('Configuration without secrets', ConfigResponseSchema) },
  });

  const generator = new OpenApiGeneratorV3(registry.definitions);
  return generator.generateDocument({
    openapi: '3.0.0',
    info: {
      title: 'netglass API',
      version: SERVER_VERSION,
      description: 'Cached, read-only view of a mesh VPN agent',
    },
    servers: [{ url: '/' }],
  });
}
