/**
 * Overlay read routes and the invalidate hook.
 *
 * Every read goes through `getSnapshot()`, so concurrent requests share one
 * agent invocation. Bodies carry the snapshot's generation and freshness
 * fields so clients can show the local-only and stale indicators.
 *
 * @module routes/overlay
 */
import { Router, type NextFunction, type Response } from 'express';
import {
  ColdStartFailureError,
  findActiveExitNode,
  listExitNodeClients,
  listSubnetRoutes,
  summarizeSnapshot,
  type OverlayStateService,
  type Snapshot,
} from '@netglass/overlay';
import {
  PeerListQuerySchema,
  type ExitNodeResponse,
  type PeerListResponse,
  type RoutesResponse,
  type SelfResponse,
  type SnapshotMeta,
  type UnavailableResponse,
} from '@netglass/shared/overlay-schemas';
import { parseInput } from '../lib/route-utils.js';

/** The slice of the overlay service the routes read through. */
export type OverlayReader = Pick<OverlayStateService, 'getSnapshot' | 'invalidate'>;

function meta(snapshot: Snapshot): SnapshotMeta {
  return {
    generation: snapshot.generation,
    capturedAt: snapshot.capturedAt,
    sourceMode: snapshot.sourceMode,
    stale: snapshot.stale,
    staleReason: snapshot.staleReason,
  };
}

/** 503 for a cache that has never held a snapshot; anything else is a 500. */
function handleReadError(err: unknown, res: Response, next: NextFunction): void {
  if (err instanceof ColdStartFailureError) {
    const body: UnavailableResponse = {
      error: err.message,
      code: 'COLD_START_FAILURE',
      reason: err.reason,
    };
    res.status(503).json(body);
    return;
  }
  next(err);
}

export function createOverlayRouter(overlay: OverlayReader): Router {
  const router = Router();

  router.get('/snapshot', async (_req, res, next) => {
    try {
      res.json(await overlay.getSnapshot());
    } catch (err) {
      handleReadError(err, res, next);
    }
  });

  router.get('/self', async (_req, res, next) => {
    try {
      const snapshot = await overlay.getSnapshot();
      const body: SelfResponse = { ...meta(snapshot), device: snapshot.self };
      res.json(body);
    } catch (err) {
      handleReadError(err, res, next);
    }
  });

  router.get('/peers', async (req, res, next) => {
    const query = parseInput(PeerListQuerySchema, req.query, res);
    if (!query) return;
    try {
      const snapshot = await overlay.getSnapshot();
      let peers = Object.values(snapshot.peers);
      if (query.online !== undefined) {
        const online = query.online === 'true';
        peers = peers.filter((peer) => peer.online === online);
      }
      peers.sort((a, b) => a.hostname.localeCompare(b.hostname));
      const body: PeerListResponse = { ...meta(snapshot), peers };
      res.json(body);
    } catch (err) {
      handleReadError(err, res, next);
    }
  });

  router.get('/exit-node', async (_req, res, next) => {
    try {
      const snapshot = await overlay.getSnapshot();
      const body: ExitNodeResponse = {
        ...meta(snapshot),
        status: snapshot.self.exitNodeStatus,
        capable: snapshot.self.exitNodeCapable,
        usingExitNode: snapshot.self.usingExitNode,
        activeExitNode: findActiveExitNode(snapshot),
        clients: listExitNodeClients(snapshot),
      };
      res.json(body);
    } catch (err) {
      handleReadError(err, res, next);
    }
  });

  router.get('/routes', async (_req, res, next) => {
    try {
      const snapshot = await overlay.getSnapshot();
      const body: RoutesResponse = {
        ...meta(snapshot),
        advertised: snapshot.self.advertisedRoutes,
        allowed: snapshot.self.allowedRoutes,
        subnetRoutes: listSubnetRoutes(snapshot.self),
      };
      res.json(body);
    } catch (err) {
      handleReadError(err, res, next);
    }
  });

  router.get('/summary', async (_req, res, next) => {
    try {
      res.json(summarizeSnapshot(await overlay.getSnapshot()));
    } catch (err) {
      handleReadError(err, res, next);
    }
  });

  // Write-path hook: handlers that change agent state call this afterwards
  router.post('/invalidate', (_req, res) => {
    overlay.invalidate();
    res.json({ success: true });
  });

  return router;
}
