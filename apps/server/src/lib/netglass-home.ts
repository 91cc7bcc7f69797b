import os from 'os';
import path from 'path';

/**
 * Resolve the netglass data directory with environment-aware defaults.
 *
 * Priority:
 *  1. `NETGLASS_HOME` env var, which wins in any environment
 *  2. `.temp/.netglass/` relative to `cwd` outside production
 *  3. `~/.netglass/` in production
 *
 * The resolved value is written back to `process.env.NETGLASS_HOME` at startup
 * so the logger and later readers agree on it.
 */
export function resolveNetglassHome(): string {
  if (process.env.NETGLASS_HOME) return process.env.NETGLASS_HOME;
  if (process.env.NODE_ENV !== 'production') {
    return path.join(process.cwd(), '.temp', '.netglass');
  }
  return path.join(os.homedir(), '.netglass');
}
