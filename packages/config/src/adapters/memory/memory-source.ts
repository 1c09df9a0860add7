import { getCodec } from "../../core/codecs"
import { ConfigError } from "../../core/errors"
import { QueueWatcher } from "../../core/queue-watcher"
import type { Codec } from "../../ports/codec"
import type { KeyValue } from "../../ports/key-value"
import type { Source, Watcher } from "../../ports/source"

export type MemorySourceOptions = {
  /** @default "memory" */
  name?: string

  data: Record<string, unknown>

  /**
   * Registered codec used to encode `data`.
   *
   * @default "json"
   */
  format?: string
}

/**
 * Programmatic source, useful for overrides layered over files and for
 * tests. `set()` pushes the new data to every live watcher.
 */
export class MemorySource implements Source {
  readonly name: string
  private readonly codec: Codec
  private data: Record<string, unknown>
  private readonly watchers = new Set<QueueWatcher>()

  constructor(options: MemorySourceOptions) {
    const format = options.format ?? "json"
    const codec = getCodec(format)
    if (!codec) throw ConfigError.unsupportedFormat(options.name ?? "memory", format)

    this.name = options.name ?? "memory"
    this.codec = codec
    this.data = structuredClone(options.data)
  }

  async load(): Promise<KeyValue[]> {
    return [this.fragment()]
  }

  async watch(): Promise<Watcher> {
    const watcher = new QueueWatcher({
      source: this.name,
      onStop: () => {
        this.watchers.delete(watcher)
      },
    })
    this.watchers.add(watcher)

    return watcher
  }

  /** Replace the data and emit it to every watcher. */
  set(data: Record<string, unknown>): void {
    this.data = structuredClone(data)

    for (const watcher of this.watchers) watcher.push([this.fragment()])
  }

  private fragment(): KeyValue {
    return { key: this.name, value: this.codec.marshal(this.data), format: this.codec.name }
  }
}
