import { Router } from 'express';
import type { ConfigResponse, UserConfig } from '@netglass/shared/config-schema';
import { SERVER_VERSION } from '../lib/version.js';

/** Effective configuration, with the API key reduced to whether one is set. */
export function createConfigRouter(config: UserConfig): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const { apiKey, ...remote } = config.remote;
    const body: ConfigResponse = {
      version: SERVER_VERSION,
      port: config.server.port,
      uptime: process.uptime(),
      nodeVersion: process.version,
      logging: config.logging,
      agent: config.agent,
      cache: config.cache,
      refresher: config.refresher,
      remote: { ...remote, apiKeyConfigured: apiKey !== null },
    };
    res.json(body);
  });

  return router;
}
