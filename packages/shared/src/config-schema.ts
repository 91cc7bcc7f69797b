import { z } from 'zod';

export const DEFAULT_PORT = 4300;

const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  maxLogSizeKb: z.number().int().min(100).max(10240).default(500),
  maxLogFiles: z.number().int().min(1).max(30).default(14),
});

export const UserConfigSchema = z.object({
  version: z.literal(1),
  server: z
    .object({
      port: z.number().int().min(1024).max(65535).default(DEFAULT_PORT),
    })
    .default(() => ({ port: DEFAULT_PORT })),
  logging: LoggingConfigSchema.default(() => ({
    level: 'info' as const,
    maxLogSizeKb: 500,
    maxLogFiles: 14,
  })),
  agent: z
    .object({
      binaryPath: z.string().nullable().default(null),
      commandTimeoutMs: z.number().int().min(100).max(120_000).default(10_000),
    })
    .default(() => ({ binaryPath: null, commandTimeoutMs: 10_000 })),
  cache: z
    .object({
      ttlMs: z.number().int().min(100).max(60_000).default(5_000),
      retryBackoffMs: z.number().int().min(0).max(30_000).default(500),
      watchdogMs: z.number().int().min(100).nullable().default(null),
    })
    .default(() => ({ ttlMs: 5_000, retryBackoffMs: 500, watchdogMs: null })),
  refresher: z
    .object({
      enabled: z.boolean().default(true),
      intervalMs: z.number().int().min(1_000).max(600_000).default(4_000),
    })
    .default(() => ({ enabled: true, intervalMs: 4_000 })),
  remote: z
    .object({
      apiKey: z.string().min(1).nullable().default(null),
      tailnet: z.string().min(1).default('-'),
      baseUrl: z.string().url().default('https://api.tailscale.com/api/v2'),
      probeTimeoutMs: z.number().int().min(100).max(30_000).default(2_000),
      requestTimeoutMs: z.number().int().min(100).max(60_000).default(5_000),
    })
    .default(() => ({
      apiKey: null,
      tailnet: '-',
      baseUrl: 'https://api.tailscale.com/api/v2',
      probeTimeoutMs: 2_000,
      requestTimeoutMs: 5_000,
    })),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<string, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/** Defaults extracted from schema */
export const USER_CONFIG_DEFAULTS: UserConfig = UserConfigSchema.parse({
  version: 1,
});

/** Effective configuration as reported by `GET /api/config`. The API key itself is never included. */
export const ConfigResponseSchema = z.object({
  version: z.string(),
  port: z.number().int(),
  uptime: z.number(),
  nodeVersion: z.string(),
  logging: LoggingConfigSchema,
  agent: UserConfigSchema.shape.agent.removeDefault(),
  cache: UserConfigSchema.shape.cache.removeDefault(),
  refresher: UserConfigSchema.shape.refresher.removeDefault(),
  remote: z.object({
    apiKeyConfigured: z.boolean(),
    tailnet: z.string(),
    baseUrl: z.string(),
    probeTimeoutMs: z.number().int(),
    requestTimeoutMs: z.number().int(),
  }),
});

export type ConfigResponse = z.infer<typeof ConfigResponseSchema>;
