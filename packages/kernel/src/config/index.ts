/**
 * Kernel configuration.
 *
 * Defaults live in the schema; `loadConfigFromEnv` overlays environment
 * variables. Callers embedding the kernel may pass a partial config instead.
 */

import { z } from 'zod';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const KernelConfigSchema = z.object({
  /** Default tool invocation timeout when a ToolSpec declares none */
  toolTimeoutMs: z.number().int().positive().default(30_000),
  /** Node tasks in flight at once */
  maxConcurrency: z.number().int().positive().default(8),
  /** Map items in flight at once, per map node */
  mapConcurrency: z.number().int().positive().default(4),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      backoffMs: z.number().int().nonnegative().default(500),
      backoffMultiplier: z.number().min(1).default(2),
    })
    .default({}),
  /** ToolSpec snapshots older than this are refreshed before a run */
  specMaxAgeMs: z.number().int().nonnegative().default(300_000),
  registryUrl: z.string().url().optional(),
  toolConfigPath: z.string().default('config/tools.json'),
  /** PEM-encoded Ed25519 private key for trace signing */
  traceSigningKey: z.string().optional(),
  logLevel: LogLevelSchema.default('info'),
});

export type KernelConfig = z.infer<typeof KernelConfigSchema>;
export type KernelConfigInput = z.input<typeof KernelConfigSchema>;

export function createConfig(input: KernelConfigInput = {}): KernelConfig {
  return KernelConfigSchema.parse(input);
}

function intFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Build a config from environment variables. Unset or unparsable numeric
 * variables fall back to the defaults; an invalid value that parses (for
 * example a negative timeout) is rejected by the schema.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): KernelConfig {
  return createConfig({
    toolTimeoutMs: intFromEnv(env['MESH_TOOL_TIMEOUT_MS']),
    maxConcurrency: intFromEnv(env['MESH_MAX_CONCURRENCY']),
    mapConcurrency: intFromEnv(env['MESH_MAP_CONCURRENCY']),
    retry: {
      maxAttempts: intFromEnv(env['MESH_RETRY_MAX_ATTEMPTS']),
      backoffMs: intFromEnv(env['MESH_RETRY_BACKOFF_MS']),
    },
    specMaxAgeMs: intFromEnv(env['MESH_SPEC_MAX_AGE_MS']),
    registryUrl: env['MESH_TOOL_REGISTRY_URL'] || undefined,
    toolConfigPath: env['MESH_TOOL_CONFIG'] || undefined,
    traceSigningKey: env['MESH_TRACE_SIGNING_KEY'] || undefined,
    logLevel: LogLevelSchema.safeParse(env['LOG_LEVEL']).data,
  });
}
