/**
 * Sync engine configuration.
 *
 * Values are validated with zod; anything omitted falls back to the defaults
 * below. Hosts that configure through the environment use `syncConfigFromEnv`.
 */

import { z } from "zod"

import { ConfigError } from "./errors"

export const SyncConfigSchema = z.object({
  /** Base URL of the remote REST service, e.g. "https://records.example.test" */
  baseUrl: z.string().default(""),
  /** Periodic drain interval while connected */
  syncIntervalMs: z.number().int().positive().default(30_000),
  /** Failed deliveries after which an item becomes a Permanent-Failure */
  maxRetries: z.number().int().positive().default(8),
  /** First retry delay; doubles per attempt */
  backoffBaseMs: z.number().int().nonnegative().default(1_000),
  /** Upper bound of the retry delay */
  backoffMaxMs: z.number().int().nonnegative().default(300_000),
  /** Abort a single remote call after this long */
  requestTimeoutMs: z.number().int().positive().default(15_000),
  /** Prefix that marks local-only identifiers */
  localIdPrefix: z.string().min(1).default("local-"),
  /** Retry rejected (4xx) items like transient failures instead of dead-lettering them */
  retryRejections: z.boolean().default(false),
  /** IndexedDB database name */
  databaseName: z.string().min(1).default("examiner-sync"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  /** Remote collection per record type; types not listed map to `<type>s` */
  collections: z.record(z.string(), z.string()).default({}),
})

export type SyncConfig = z.infer<typeof SyncConfigSchema>
export type SyncConfigInput = z.input<typeof SyncConfigSchema>

/**
 * Validate configuration overrides and fill in defaults.
 * @throws ConfigError when a value is invalid
 */
export function loadSyncConfig(overrides: SyncConfigInput = {}): SyncConfig {
  const parsed = SyncConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ")
    throw new ConfigError(`Invalid sync configuration: ${fields}`, parsed.error)
  }
  if (parsed.data.backoffMaxMs < parsed.data.backoffBaseMs) {
    throw new ConfigError("Invalid sync configuration: backoffMaxMs is below backoffBaseMs")
  }
  return parsed.data
}

function normalize(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function toInt(value: string | undefined): number | undefined {
  const normalized = normalize(value)
  return normalized === undefined ? undefined : Number(normalized)
}

function toBool(value: string | undefined): boolean | undefined {
  const normalized = normalize(value)?.toLowerCase()
  if (normalized === undefined) return undefined
  return normalized === "1" || normalized === "true"
}

/**
 * Build configuration from `EXAMINER_SYNC_*` environment variables.
 *
 * Explicit overrides win over the environment.
 */
export function syncConfigFromEnv(
  env: Record<string, string | undefined>,
  overrides: SyncConfigInput = {},
): SyncConfig {
  const fromEnv: SyncConfigInput = {
    baseUrl: normalize(env.EXAMINER_SYNC_BASE_URL),
    syncIntervalMs: toInt(env.EXAMINER_SYNC_INTERVAL_MS),
    maxRetries: toInt(env.EXAMINER_SYNC_MAX_RETRIES),
    backoffBaseMs: toInt(env.EXAMINER_SYNC_BACKOFF_BASE_MS),
    backoffMaxMs: toInt(env.EXAMINER_SYNC_BACKOFF_MAX_MS),
    requestTimeoutMs: toInt(env.EXAMINER_SYNC_REQUEST_TIMEOUT_MS),
    localIdPrefix: normalize(env.EXAMINER_SYNC_LOCAL_ID_PREFIX),
    retryRejections: toBool(env.EXAMINER_SYNC_RETRY_REJECTIONS),
    databaseName: normalize(env.EXAMINER_SYNC_DATABASE),
  }

  const level = normalize(env.EXAMINER_SYNC_LOG_LEVEL)
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    fromEnv.logLevel = level
  }

  // zod applies defaults to keys left undefined
  return loadSyncConfig({ ...fromEnv, ...overrides })
}
