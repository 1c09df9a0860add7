import { constant, type DelayPolicy } from "@tributary/backoff"
import { type Clock, SystemClock } from "@tributary/clock"
import { createNullLogger, type Logger } from "@tributary/logger"
import type { Reader } from "../ports/reader"
import type { Source } from "../ports/source"
import { TreeReader, type TreeReaderOptions } from "./reader"

type ReaderChoice =
  | (TreeReaderOptions & { reader?: undefined })
  | {
      /** Replaces the built-in reader, together with its decoder, resolver and merge */
      reader: Reader
      decoder?: never
      resolver?: never
      merge?: never
    }

export type ConfigOptions = ReaderChoice & {
  /** Applied in order; later sources override earlier ones */
  sources: Source[]

  /** @default NullLogger */
  logger?: Logger

  /** Drives the wait between failed `next()` calls. @default SystemClock */
  clock?: Clock

  /**
   * Wait after a failed `next()`, by consecutive failure count.
   *
   * @default constant 1000 ms
   */
  watchRetryDelay?: DelayPolicy
}

export type ResolvedConfigOptions = {
  sources: Source[]
  reader: Reader
  logger: Logger
  clock: Clock
  watchRetryDelay: DelayPolicy
}

export const DEFAULT_WATCH_RETRY_DELAY = constant({ delay: { milliseconds: 1000 } })

export function resolveConfigOptions(options: ConfigOptions): ResolvedConfigOptions {
  const reader =
    options.reader ??
    new TreeReader({ decoder: options.decoder, resolver: options.resolver, merge: options.merge })

  return {
    sources: [...options.sources],
    reader,
    logger: options.logger ?? createNullLogger(),
    clock: options.clock ?? new SystemClock(),
    watchRetryDelay: options.watchRetryDelay ?? DEFAULT_WATCH_RETRY_DELAY,
  }
}
