import type { KeyValue } from "../ports/key-value"
import type { Watcher } from "../ports/source"
import { ConfigError } from "./errors"

type Delivery = { ok: true; kvs: KeyValue[] } | { ok: false; error: unknown }

type Waiter = {
  settle(delivery: Delivery): void
}

/**
 * Watcher fed from the outside. Batches and errors pushed while nobody is
 * waiting are queued in order and handed to later `next()` calls.
 *
 * @example
 * ```typescript
 * const watcher = new QueueWatcher({ source: "memory" })
 * watcher.push([{ key: "app", value: bytes, format: "json" }])
 * await watcher.next() // resolves with that batch
 * ```
 */
export class QueueWatcher implements Watcher {
  private readonly pending: Delivery[] = []
  private waiter: Waiter | undefined
  private stopped = false

  constructor(
    private readonly opts: {
      /** Name reported in the `watcher_stopped` error context */
      source?: string
      /** Called once by the first `stop()` */
      onStop?: () => void | Promise<void>
    } = {},
  ) {}

  get isStopped(): boolean {
    return this.stopped
  }

  push(kvs: KeyValue[]): void {
    this.deliver({ ok: true, kvs })
  }

  fail(error: unknown): void {
    this.deliver({ ok: false, error })
  }

  next(signal?: AbortSignal): Promise<KeyValue[]> {
    if (this.stopped || signal?.aborted) {
      return Promise.reject(ConfigError.watcherStopped(this.opts.source))
    }

    const queued = this.pending.shift()
    if (queued) return queued.ok ? Promise.resolve(queued.kvs) : Promise.reject(queued.error)

    return new Promise<KeyValue[]>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = undefined
        reject(ConfigError.watcherStopped(this.opts.source))
      }

      signal?.addEventListener("abort", onAbort, { once: true })

      this.waiter = {
        settle: (delivery) => {
          signal?.removeEventListener("abort", onAbort)
          if (delivery.ok) resolve(delivery.kvs)
          else reject(delivery.error)
        },
      }
    })
  }

  async stop(): Promise<void> {
    if (this.stopped) return
    this.stopped = true
    this.pending.length = 0

    const waiter = this.waiter
    this.waiter = undefined
    waiter?.settle({ ok: false, error: ConfigError.watcherStopped(this.opts.source) })

    await this.opts.onStop?.()
  }

  private deliver(delivery: Delivery): void {
    if (this.stopped) return

    const waiter = this.waiter
    if (waiter) {
      this.waiter = undefined
      waiter.settle(delivery)
    } else {
      this.pending.push(delivery)
    }
  }
}
