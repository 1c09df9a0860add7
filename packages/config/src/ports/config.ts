import type { ZodType } from "zod"
import type { Value } from "./value"

/** Called inline by the reconciling source when a watched key changes. */
export type Observer = (key: string, value: Value) => void

/** Object that `scan()` overwrites with the whole configuration. */
export type ScanTarget = Record<string, unknown>

/**
 * Live view over every configured source.
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   sources: [new FileSource({ path: "config/app.yaml" }), new EnvSource({ prefixes: ["APP"] })],
 * })
 * await config.load()
 *
 * const port = config.value("server.port").int()
 * config.watch("log.level", (key, value) => logger.info("changed", { key, level: value.string() }))
 * ```
 */
export interface IConfig {
  /**
   * Load every source in order, start watching each, then resolve.
   * May be called once.
   */
  load(): Promise<void>

  /**
   * Look up a key. Never throws: a missing key yields a `not_found` value
   * whose accessors throw instead.
   */
  value(key: string): Value

  /**
   * Overwrite each target with an independent copy of the whole resolved
   * configuration.
   */
  scan(...targets: ScanTarget[]): void

  /** Parse the whole resolved configuration with a zod schema. */
  decode<T>(schema: ZodType<T>): T

  /**
   * Register the observer for a key that currently resolves, replacing any
   * previous observer for that key. Throws `key_not_found` otherwise.
   */
  watch(key: string, observer: Observer): void

  /** Stop every watcher and wait for their reconciliation loops to end. */
  close(): Promise<void>
}
