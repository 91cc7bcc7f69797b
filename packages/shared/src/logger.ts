/**
 * Logging seam between the overlay core and its host.
 *
 * The core never imports a logging library. Hosts pass anything with these
 * four methods: a consola instance, `console`, or a test spy.
 *
 * @module shared/logger
 */

export type LogMethod = (...args: unknown[]) => void;

export interface Logger {
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  debug: LogMethod;
}

const discard: LogMethod = () => {};

/** Default for every optional `logger` option. */
export const noopLogger: Logger = {
  info: discard,
  warn: discard,
  error: discard,
  debug: discard,
};

/**
 * Label every entry of `logger` with `[component]`, for hosts that hand the
 * core one logger without a per-component factory.
 */
export function componentLogger(logger: Logger, component: string): Logger {
  const label = `[${component}]`;
  return {
    info: (...args) => logger.info(label, ...args),
    warn: (...args) => logger.warn(label, ...args),
    error: (...args) => logger.error(label, ...args),
    debug: (...args) => logger.debug(label, ...args),
  };
}
