/**
 * Typed view of the server's environment variables.
 *
 * Blank values count as unset so `NETGLASS_PORT=` in a shell profile falls
 * back to the schema default instead of failing to parse.
 *
 * @module env
 */
import { z } from 'zod';
import { UserConfigSchema, type UserConfig } from '@netglass/shared/config-schema';

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(blankAsUndefined, z.string().optional());
const optionalInt = z.preprocess(blankAsUndefined, z.coerce.number().int().optional());

export const ServerEnvSchema = z.object({
  NODE_ENV: z.preprocess(
    blankAsUndefined,
    z.enum(['development', 'production', 'test']).default('development'),
  ),
  NETGLASS_PORT: optionalInt,
  NETGLASS_HOME: optionalString,
  NETGLASS_LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
  ),
  NETGLASS_CORS_ORIGIN: optionalString,
  NETGLASS_AGENT_BINARY: optionalString,
  NETGLASS_CACHE_TTL_MS: optionalInt,
  NETGLASS_RETRY_BACKOFF_MS: optionalInt,
  NETGLASS_REFRESH_INTERVAL_MS: optionalInt,
  NETGLASS_COMMAND_TIMEOUT_MS: optionalInt,
  TAILSCALE_API_KEY: optionalString,
  TAILSCALE_TAILNET: optionalString,
  TAILSCALE_API_TIMEOUT_MS: optionalInt,
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): ServerEnv {
  return ServerEnvSchema.parse(source);
}

export const env: ServerEnv = parseEnv(process.env);

/**
 * Fold environment overrides over the config defaults. Unset variables leave
 * the default in place; out-of-range values throw a ZodError.
 */
export function loadConfig(source: ServerEnv): UserConfig {
  return UserConfigSchema.parse({
    version: 1,
    server: { port: source.NETGLASS_PORT },
    logging: { level: source.NETGLASS_LOG_LEVEL },
    agent: {
      binaryPath: source.NETGLASS_AGENT_BINARY,
      commandTimeoutMs: source.NETGLASS_COMMAND_TIMEOUT_MS,
    },
    cache: {
      ttlMs: source.NETGLASS_CACHE_TTL_MS,
      retryBackoffMs: source.NETGLASS_RETRY_BACKOFF_MS,
    },
    refresher: { intervalMs: source.NETGLASS_REFRESH_INTERVAL_MS },
    remote: {
      apiKey: source.TAILSCALE_API_KEY,
      tailnet: source.TAILSCALE_TAILNET,
      requestTimeoutMs: source.TAILSCALE_API_TIMEOUT_MS,
    },
  });
}
