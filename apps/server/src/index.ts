/**
 * Server entry point: resolve the data directory, load config, start
 * logging, then serve the overlay API until SIGINT/SIGTERM.
 *
 * @module index
 */
import { createOverlayStateService } from '@netglass/overlay';
import { LOG_LEVEL_MAP } from '@netglass/shared/config-schema';
import { createApp, finalizeApp } from './app.js';
import { env, loadConfig } from './env.js';
import { resolveNetglassHome } from './lib/netglass-home.js';
import { createTaggedLogger, initLogger, logError, logger } from './lib/logger.js';
import { LOGGING, SHUTDOWN } from './config/constants.js';

async function start(): Promise<void> {
  process.env.NETGLASS_HOME = resolveNetglassHome();

  const config = loadConfig(env);
  initLogger({
    level: LOG_LEVEL_MAP[config.logging.level] ?? 3,
    maxLogSize: config.logging.maxLogSizeKb * LOGGING.BYTES_PER_KB,
    maxLogFiles: config.logging.maxLogFiles,
  });

  const overlay = createOverlayStateService(config, {
    logger: createTaggedLogger('Overlay'),
    loggerFor: createTaggedLogger,
  });

  const app = createApp({ overlay, config, corsOrigin: env.NETGLASS_CORS_ORIGIN });
  finalizeApp(app);

  const port = config.server.port;
  const server = app.listen(port, () => {
    logger.info(`netglass server listening on http://localhost:${port}`);
  });

  await overlay.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);

    overlay.stop();
    const forceExit = setTimeout(() => {
      logger.warn(`server did not close within ${SHUTDOWN.FORCE_EXIT_MS}ms, forcing exit`);
      process.exit(1);
    }, SHUTDOWN.FORCE_EXIT_MS);
    forceExit.unref();

    server.close((err) => {
      if (err) logger.error('server close failed', logError(err));
      process.exit(err ? 1 : 0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

start().catch((err: unknown) => {
  logger.fatal('netglass server failed to start', logError(err));
  process.exit(1);
});
