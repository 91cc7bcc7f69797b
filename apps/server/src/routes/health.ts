import { Router } from 'express';
import type { OverlayStateService } from '@netglass/overlay';
import type { HealthResponse } from '@netglass/shared/overlay-schemas';
import { SERVER_VERSION } from '../lib/version.js';

export type HealthSource = Pick<OverlayStateService, 'peek' | 'getCacheState' | 'getGeneration'>;

/**
 * Liveness plus overlay freshness. Never triggers a refresh: reports what the
 * cache holds right now, `degraded` when that is nothing or stale.
 */
export function createHealthRouter(overlay: HealthSource): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const snapshot = overlay.peek();
    const body: HealthResponse = {
      status: snapshot && !snapshot.stale ? 'ok' : 'degraded',
      version: SERVER_VERSION,
      uptime: process.uptime(),
      overlay: {
        cacheState: overlay.getCacheState(),
        generation: overlay.getGeneration(),
        stale: snapshot ? snapshot.stale : null,
      },
    };
    res.json(body);
  });

  return router;
}
