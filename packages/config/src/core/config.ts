import { isDeepStrictEqual } from "node:util"
import type { DelayPolicy } from "@tributary/backoff"
import type { Clock } from "@tributary/clock"
import type { Logger } from "@tributary/logger"
import { type ZodType, z } from "zod"
import { jsonCodec } from "../adapters/codecs/json-codec"
import type { IConfig, Observer, ScanTarget } from "../ports/config"
import type { KeyValue } from "../ports/key-value"
import type { Reader } from "../ports/reader"
import type { Source, Watcher } from "../ports/source"
import type { FoundValue, Value } from "../ports/value"
import { ConfigError, isCancellation } from "./errors"
import { type ConfigOptions, resolveConfigOptions } from "./options"
import { isRecord, typeOf } from "./utils/type-of"
import { MissingValue } from "./value"

type State = "idle" | "loading" | "loaded" | "closed"

type Subscription = {
  source: string
  watcher: Watcher
  loop: Promise<void>
}

/**
 * Live configuration assembled from ordered sources.
 *
 * `load()` starts one reconciliation loop per source. Each loop waits on its
 * watcher, merges and resolves the batch, then refreshes every cached value
 * whose payload changed without changing runtime type, notifying that key's
 * observer. Merging, resolving and the refresh run without awaiting, so a
 * lookup never sees half of a cycle.
 */
export class Config implements IConfig {
  private readonly sources: Source[]
  private readonly reader: Reader
  private readonly log: Logger
  private readonly clock: Clock
  private readonly watchRetryDelay: DelayPolicy

  private readonly cached = new Map<string, FoundValue>()
  private readonly observers = new Map<string, Observer>()
  private readonly subscriptions: Subscription[] = []
  private readonly lifecycle = new AbortController()
  private state: State = "idle"

  constructor(options: ConfigOptions) {
    const resolved = resolveConfigOptions(options)

    this.sources = resolved.sources
    this.reader = resolved.reader
    this.log = resolved.logger.child({ module: "config" })
    this.clock = resolved.clock
    this.watchRetryDelay = resolved.watchRetryDelay
  }

  async load(): Promise<void> {
    if (this.state === "closed") throw ConfigError.closed()
    if (this.state !== "idle") throw ConfigError.alreadyLoaded()
    this.state = "loading"

    for (const source of this.sources) {
      const kvs = await source.load()

      for (const kv of kvs) {
        this.log.debug("config loaded", { source: source.name, key: kv.key, format: kv.format })
      }

      try {
        this.reader.merge(...kvs)
      } catch (err) {
        this.log.error("failed to merge config source", { source: source.name, err })
        throw err
      }

      let watcher: Watcher
      try {
        watcher = await source.watch()
      } catch (err) {
        this.log.error("failed to watch config source", { source: source.name, err })
        throw err
      }

      // close() may have run while this source was loading
      if (this.isClosed()) {
        await watcher.stop()
        throw ConfigError.closed()
      }

      this.subscriptions.push({
        source: source.name,
        watcher,
        loop: this.reconcile(source.name, watcher),
      })
    }

    try {
      this.reader.resolve()
    } catch (err) {
      this.log.error("failed to resolve config source", { err })
      throw err
    }

    this.state = "loaded"
  }

  value(key: string): Value {
    const cached = this.cached.get(key)
    if (cached) return cached

    const found = this.reader.value(key)
    if (!found) return new MissingValue(key)

    this.cached.set(key, found)

    return found
  }

  watch(key: string, observer: Observer): void {
    const current = this.value(key).load()
    if (current === undefined || current === null) throw ConfigError.keyNotFound(key)

    this.observers.set(key, observer)
  }

  scan(...targets: ScanTarget[]): void {
    const data = this.reader.source()

    for (const target of targets) {
      const snapshot = this.snapshot(data)

      for (const key of Object.keys(target)) delete target[key]
      Object.assign(target, snapshot)
    }
  }

  decode<T>(schema: ZodType<T>): T {
    const result = schema.safeParse(this.snapshot(this.reader.source()))

    if (!result.success) {
      throw ConfigError.scanFailed(result.error, z.prettifyError(result.error))
    }

    return result.data
  }

  async close(): Promise<void> {
    if (this.state === "closed") return
    this.state = "closed"
    this.lifecycle.abort()

    const failures: unknown[] = []
    const ending: Promise<void>[] = []

    for (const { source, watcher, loop } of this.subscriptions) {
      try {
        await watcher.stop()
        ending.push(loop)
      } catch (err) {
        this.log.error("failed to stop watcher", { source, err })
        failures.push(err)
      }
    }

    await Promise.all(ending)

    if (failures.length > 0) throw ConfigError.closeFailed(failures)
  }

  private isClosed(): boolean {
    return this.state === "closed"
  }

  private snapshot(data: Uint8Array): Record<string, unknown> {
    let decoded: unknown
    try {
      decoded = jsonCodec.unmarshal(data)
    } catch (err) {
      throw ConfigError.scanFailed(err)
    }

    if (!isRecord(decoded)) {
      throw ConfigError.scanFailed(new TypeError(`snapshot is ${typeOf(decoded)}`))
    }

    return decoded
  }

  private async reconcile(sourceName: string, watcher: Watcher): Promise<void> {
    const log = this.log.child({ source: sourceName })
    const signal = this.lifecycle.signal
    let failures = 0

    try {
      while (!signal.aborted) {
        let kvs: KeyValue[]

        try {
          kvs = await watcher.next(signal)
        } catch (err) {
          if (signal.aborted || isCancellation(err)) {
            log.info("watcher stopped", { err })
            return
          }

          log.error("failed to watch next config", { err })
          await this.clock.sleep(this.watchRetryDelay.getDelay(failures).milliseconds, signal)
          failures++
          continue
        }

        failures = 0
        this.apply(kvs, log)
      }
    } catch (err) {
      log.fatal("config reconciliation stopped unexpectedly", { err })
    }
  }

  private apply(kvs: KeyValue[], log: Logger): void {
    try {
      this.reader.merge(...kvs)
    } catch (err) {
      log.error("failed to merge next config", { err })
      return
    }

    try {
      this.reader.resolve()
    } catch (err) {
      log.error("failed to resolve next config", { err })
      return
    }

    for (const [key, cached] of this.cached) {
      const fresh = this.reader.value(key)
      if (!fresh) continue

      const next = fresh.load()
      const previous = cached.load()
      if (typeOf(next) !== typeOf(previous) || isDeepStrictEqual(next, previous)) continue

      cached.store(next)
      this.notify(key, cached, log)
    }
  }

  private notify(key: string, value: Value, log: Logger): void {
    const observer = this.observers.get(key)
    if (!observer) return

    try {
      observer(key, value)
    } catch (err) {
      log.error("config observer failed", { key, err })
    }
  }
}

export function createConfig(options: ConfigOptions): IConfig {
  return new Config(options)
}
