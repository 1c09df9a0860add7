import { type FSWatcher, watch } from "node:fs"
import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../../core/errors"
import { QueueWatcher } from "../../core/queue-watcher"
import type { KeyValue } from "../../ports/key-value"
import type { Source, Watcher } from "../../ports/source"

/**
 * Options for creating a file configuration source.
 */
export type FileSourceOptions = {
  /**
   * Path to a file, or to a directory whose regular files are all read.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config/app.yaml", "./config"
   */
  path: string

  /**
   * Whether the path must exist.
   *
   * - `true`: `load()` rejects if the path is missing.
   * - `false`: a missing path yields no fragments.
   *
   * @default true
   */
  required?: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads one file, or every non-hidden file of a directory, as fragments
 * keyed by base name with the extension as format (`app.yaml` is key
 * "app.yaml", format "yaml").
 */
export class FileSource implements Source {
  readonly name: string
  private readonly target: string
  private readonly required: boolean

  constructor(opts: FileSourceOptions) {
    this.name = `file:${opts.path}`
    this.target = path.resolve(opts.cwd ?? process.cwd(), opts.path)
    this.required = opts.required ?? true
  }

  async load(): Promise<KeyValue[]> {
    try {
      const stat = await fs.stat(this.target)

      return stat.isDirectory() ? await this.loadDir(this.target) : [await this.loadFile(this.target)]
    } catch (err) {
      if (!this.required && isMissing(err)) return []
      throw ConfigError.sourceFailed(this.name, err)
    }
  }

  async watch(): Promise<Watcher> {
    let handle: FSWatcher | undefined
    const watcher = new QueueWatcher({ source: this.name, onStop: () => handle?.close() })

    let reloading = false
    let dirty = false

    const reload = async (): Promise<void> => {
      if (reloading) {
        dirty = true
        return
      }

      reloading = true
      try {
        do {
          dirty = false
          const kvs = await this.loadChanged()
          if (kvs.length > 0) watcher.push(kvs)
        } while (dirty && !watcher.isStopped)
      } catch (err) {
        watcher.fail(err)
      } finally {
        reloading = false
      }
    }

    try {
      handle = watch(this.target, { persistent: false }, () => {
        void reload()
      })
      handle.on("error", (err) => watcher.fail(ConfigError.sourceFailed(this.name, err)))
    } catch (err) {
      if (this.required || !isMissing(err)) throw ConfigError.sourceFailed(this.name, err)
    }

    return watcher
  }

  /** Like `load()`, but a file removed mid-event is skipped rather than fatal. */
  private async loadChanged(): Promise<KeyValue[]> {
    try {
      return await this.load()
    } catch (err) {
      if (err instanceof ConfigError && isMissing(err.cause)) return []
      throw err
    }
  }

  private async loadDir(dir: string): Promise<KeyValue[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    const files = entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
      .map((entry) => entry.name)
      .sort()

    const kvs: KeyValue[] = []
    for (const file of files) {
      try {
        kvs.push(await this.loadFile(path.join(dir, file)))
      } catch (err) {
        if (!isMissing(err)) throw err
      }
    }

    return kvs
  }

  private async loadFile(file: string): Promise<KeyValue> {
    const name = path.basename(file)

    return {
      key: name,
      value: await fs.readFile(file),
      format: path.extname(name).slice(1),
    }
  }
}
