import { BaseError, errorChain, serializeError } from "@tributary/errors"

export type ConfigErrorCode =
  | "key_not_found"
  | "type_assert"
  | "unsupported_format"
  | "source_failed"
  | "merge_failed"
  | "resolve_failed"
  | "scan_failed"
  | "watcher_stopped"
  | "already_loaded"
  | "config_closed"
  | "close_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static keyNotFound(key: string): ConfigError {
    return new ConfigError(`Key not found: ${key}`, {
      code: "key_not_found",
      context: { key },
    })
  }

  static typeAssert(key: string, expected: string, actual: string, cause?: unknown): ConfigError {
    return new ConfigError(`Value at "${key}" is ${actual}, expected ${expected}`, {
      code: "type_assert",
      context: { key, expected, actual },
      cause,
    })
  }

  static unsupportedFormat(key: string, format: string): ConfigError {
    return new ConfigError(`Unsupported format "${format}" for ${key}`, {
      code: "unsupported_format",
      context: { key, format },
    })
  }

  static sourceFailed(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Failed to read config source ${source}`, {
      code: "source_failed",
      context: { source },
      cause,
      isRetryable: true,
    })
  }

  static mergeFailed(key: string, format: string, cause: unknown): ConfigError {
    return new ConfigError(`Failed to merge ${key}`, {
      code: "merge_failed",
      context: { key, format },
      cause,
    })
  }

  static resolveFailed(cause: unknown): ConfigError {
    return new ConfigError("Failed to resolve placeholders", {
      code: "resolve_failed",
      cause,
    })
  }

  static scanFailed(cause: unknown, detail?: string): ConfigError {
    return new ConfigError(detail ? `Failed to scan config:\n${detail}` : "Failed to scan config", {
      code: "scan_failed",
      cause,
    })
  }

  static watcherStopped(source?: string): ConfigError {
    return new ConfigError("Watcher stopped", {
      code: "watcher_stopped",
      context: source === undefined ? {} : { source },
    })
  }

  static alreadyLoaded(): ConfigError {
    return new ConfigError("Config already loaded", {
      code: "already_loaded",
      isOperational: false,
    })
  }

  static closed(): ConfigError {
    return new ConfigError("Config is closed", {
      code: "config_closed",
      isOperational: false,
    })
  }

  static closeFailed(failures: unknown[]): ConfigError {
    return new ConfigError(`Failed to stop ${failures.length} watcher(s)`, {
      code: "close_failed",
      context: {
        failures: failures.length,
        errors: failures.map((failure) => serializeError(failure)),
      },
      cause: new AggregateError(failures, "watcher stop failures"),
    })
  }
}

/**
 * `true` when `err`, or anything in its cause chain, reports that a watcher
 * was stopped or its signal aborted.
 */
export function isCancellation(err: unknown): boolean {
  return errorChain(err).some(
    (e) =>
      (e instanceof ConfigError && e.code === "watcher_stopped") ||
      (e instanceof Error && e.name === "AbortError"),
  )
}
