import express from 'express';
import cors, { type CorsOptions } from 'cors';
import type { OverlayStateService } from '@netglass/overlay';
import type { UserConfig } from '@netglass/shared/config-schema';
import { createOverlayRouter } from './routes/overlay.js';
import { createHealthRouter } from './routes/health.js';
import { createConfigRouter } from './routes/config.js';
import { generateOpenAPISpec } from './services/openapi-registry.js';
import { errorHandler } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import { sendError } from './lib/route-utils.js';
import { HTTP } from './config/constants.js';

export interface AppDeps {
  overlay: Pick<
    OverlayStateService,
    'getSnapshot' | 'invalidate' | 'peek' | 'getCacheState' | 'getGeneration'
  >;
  config: UserConfig;
  /** Raw `NETGLASS_CORS_ORIGIN` value. */
  corsOrigin?: string;
}

/** CORS allowlist: `*`, a comma-separated list, or localhost on the server and dashboard ports. */
export function buildCorsOrigin(envOrigin: string | undefined, port: number): CorsOptions['origin'] {
  if (envOrigin === '*') return '*';

  if (envOrigin) {
    return envOrigin.split(',').map((o) => o.trim());
  }

  return [
    `http://localhost:${port}`,
    `http://localhost:${HTTP.DEV_CLIENT_PORT}`,
    `http://127.0.0.1:${port}`,
    `http://127.0.0.1:${HTTP.DEV_CLIENT_PORT}`,
  ];
}

export function createApp({ overlay, config, corsOrigin }: AppDeps) {
  const app = express();

  app.use(cors({ origin: buildCorsOrigin(corsOrigin, config.server.port) }));

  app.use(express.json({ limit: HTTP.JSON_LIMIT }));
  app.use(requestLogger);

  app.use('/api/overlay', createOverlayRouter(overlay));
  app.use('/api/health', createHealthRouter(overlay));
  app.use('/api/config', createConfigRouter(config));

  const spec = generateOpenAPISpec();
  app.get('/api/openapi.json', (_req, res) => res.json(spec));

  return app;
}

/**
 * Add the API 404 catch-all and the error handler. Call after every API
 * route is mounted.
 */
export function finalizeApp(app: express.Express): void {
  app.use('/api', (_req, res) => {
    sendError(res, 404, 'Not found', 'API_NOT_FOUND');
  });

  app.use(errorHandler);
}
