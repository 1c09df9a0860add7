import { QueueWatcher } from "../../core/queue-watcher"
import type { KeyValue } from "../../ports/key-value"
import type { Source, Watcher } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Keep only variables starting with one of these prefixes, and strip the
   * prefix plus one following "_" from the key.
   *
   * @example ["APP"] turns APP_PORT into key "PORT"
   */
  prefixes?: string[]
  env?: Record<string, string | undefined>
}

/**
 * Environment variables as leaf fragments (empty format), so a variable
 * named `server.port` lands at that dotted key.
 *
 * The environment is read once per `load()`; its watcher never emits.
 */
export class EnvSource implements Source {
  readonly name = "env"
  private readonly prefixes: string[]
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefixes = options.prefixes ?? []
    this.env = options.env ?? process.env
  }

  async load(): Promise<KeyValue[]> {
    const kvs: KeyValue[] = []

    for (const [name, value] of Object.entries(this.env)) {
      if (value === undefined) continue

      const key = this.keyFor(name)
      if (!key) continue

      kvs.push({ key, value: Buffer.from(value, "utf-8"), format: "" })
    }

    return kvs
  }

  async watch(): Promise<Watcher> {
    return new QueueWatcher({ source: this.name })
  }

  private keyFor(name: string): string | undefined {
    if (this.prefixes.length === 0) return name

    const prefix = this.prefixes.find((p) => name.startsWith(p))
    if (prefix === undefined || prefix.length === name.length) return undefined

    const rest = name.slice(prefix.length)

    return rest.startsWith("_") ? rest.slice(1) || undefined : rest
  }
}
