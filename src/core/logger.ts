/**
 * Context-tagged console logger.
 *
 * Messages are prefixed with their source, e.g. `[SyncCoordinator] drain aborted`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

/** Logger bound to one context. */
export interface Logger {
  debug(message: string, data?: unknown): void
  info(message: string, data?: unknown): void
  warn(message: string, data?: unknown): void
  error(message: string, error?: unknown): void
}

let minimumLevel: LogLevel = "info"

/** Set the lowest level that is written. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level
}

export function getLogLevel(): LogLevel {
  return minimumLevel
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel]
}

function format(context: string, message: string): string {
  return `[${context}] ${message}`
}

/**
 * Create a logger for a component.
 *
 * @example
 * ```typescript
 * const log = createLogger("SyncCoordinator")
 * log.warn("item rejected", { sequence: 4 })
 * ```
 */
export function createLogger(context: string): Logger {
  return {
    debug(message, data) {
      if (enabled("debug")) console.debug(format(context, message), data ?? "")
    },
    info(message, data) {
      if (enabled("info")) console.log(format(context, message), data ?? "")
    },
    warn(message, data) {
      if (enabled("warn")) console.warn(format(context, message), data ?? "")
    },
    error(message, error) {
      if (enabled("error")) console.error(format(context, message), error ?? "")
    },
  }
}
