import { describe, expect, test } from "vitest"

import { loadSyncConfig, syncConfigFromEnv } from "../config"
import { ConfigError } from "../errors"

describe("loadSyncConfig", () => {
  test("fills in defaults", () => {
    expect(loadSyncConfig()).toEqual({
      baseUrl: "",
      syncIntervalMs: 30_000,
      maxRetries: 8,
      backoffBaseMs: 1_000,
      backoffMaxMs: 300_000,
      requestTimeoutMs: 15_000,
      localIdPrefix: "local-",
      retryRejections: false,
      databaseName: "examiner-sync",
      logLevel: "info",
      collections: {},
    })
  })

  test("keeps overrides", () => {
    const config = loadSyncConfig({ syncIntervalMs: 5_000, retryRejections: true })
    expect(config.syncIntervalMs).toBe(5_000)
    expect(config.retryRejections).toBe(true)
  })

  test("rejects invalid values", () => {
    expect(() => loadSyncConfig({ maxRetries: 0 })).toThrow(ConfigError)
    expect(() => loadSyncConfig({ maxRetries: 0 })).toThrow("Invalid sync configuration: maxRetries")
  })

  test("rejects a backoff cap below the base", () => {
    expect(() => loadSyncConfig({ backoffBaseMs: 5_000, backoffMaxMs: 1_000 })).toThrow(
      "backoffMaxMs is below backoffBaseMs",
    )
  })
})

describe("syncConfigFromEnv", () => {
  test("reads EXAMINER_SYNC_* variables", () => {
    const config = syncConfigFromEnv({
      EXAMINER_SYNC_BASE_URL: " https://records.example.test ",
      EXAMINER_SYNC_INTERVAL_MS: "60000",
      EXAMINER_SYNC_MAX_RETRIES: "3",
      EXAMINER_SYNC_RETRY_REJECTIONS: "true",
      EXAMINER_SYNC_DATABASE: "tablet-db",
      EXAMINER_SYNC_LOG_LEVEL: "debug",
    })

    expect(config.baseUrl).toBe("https://records.example.test")
    expect(config.syncIntervalMs).toBe(60_000)
    expect(config.maxRetries).toBe(3)
    expect(config.retryRejections).toBe(true)
    expect(config.databaseName).toBe("tablet-db")
    expect(config.logLevel).toBe("debug")
  })

  test("ignores blank variables and unknown log levels", () => {
    const config = syncConfigFromEnv({
      EXAMINER_SYNC_INTERVAL_MS: "  ",
      EXAMINER_SYNC_LOG_LEVEL: "verbose",
    })

    expect(config.syncIntervalMs).toBe(30_000)
    expect(config.logLevel).toBe("info")
  })

  test("lets overrides win over the environment", () => {
    const config = syncConfigFromEnv({ EXAMINER_SYNC_MAX_RETRIES: "3" }, { maxRetries: 5 })
    expect(config.maxRetries).toBe(5)
  })

  test("rejects non-numeric numbers", () => {
    expect(() => syncConfigFromEnv({ EXAMINER_SYNC_MAX_RETRIES: "many" })).toThrow(ConfigError)
  })
})
