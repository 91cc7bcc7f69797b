/** Server-only constants: timeouts, limits, and defaults outside the user config. */

export const SHUTDOWN = {
  /** Hard exit if the HTTP server has not closed after a signal (ms). */
  FORCE_EXIT_MS: 5_000,
} as const;

export const HTTP = {
  /** express.json body limit. Only the invalidate hook takes a body. */
  JSON_LIMIT: '100kb',
  /** Allowed by default CORS alongside the server port (a local dashboard dev server). */
  DEV_CLIENT_PORT: 4301,
} as const;

export const LOGGING = {
  /** Bytes per KB for `logging.maxLogSizeKb`. */
  BYTES_PER_KB: 1024,
} as const;
