export type { SyncConfig, SyncConfigInput } from "@core/config"
export { loadSyncConfig, SyncConfigSchema, syncConfigFromEnv } from "@core/config"
export {
  AppError,
  ConfigError,
  RecordConflictError,
  RecordNotFoundError,
  RemoteError,
  StorageError,
  ValidationError,
} from "@core/errors"
export type { Logger, LogLevel } from "@core/logger"
export { createLogger, setLogLevel } from "@core/logger"
export * from "@core/sync"
export * from "@core/transport"
export * from "@examiner/index"
