import type { KeyValue } from "./key-value"

/**
 * A source of configuration fragments.
 *
 * Sources only load and watch raw data; decoding, merging and placeholder
 * resolution happen in the reader. Sources are applied in order, later
 * sources override earlier ones.
 */
export interface Source {
  /**
   * Human-readable name for logs.
   * Example: "env", "file:config/app.yaml", "memory"
   */
  readonly name: string

  /** Read every fragment the source currently holds. */
  load(): Promise<KeyValue[]>

  /** Open a change stream for this source. */
  watch(): Promise<Watcher>
}

/**
 * Change stream of one source.
 */
export interface Watcher {
  /**
   * Wait for the next batch of changed fragments.
   *
   * Rejects with a `watcher_stopped` error once `stop()` was called or
   * `signal` aborted, including while already waiting. Any other rejection
   * is a transient failure of the source.
   */
  next(signal?: AbortSignal): Promise<KeyValue[]>

  /** Release resources and unblock a pending `next()`. Idempotent. */
  stop(): Promise<void>
}
