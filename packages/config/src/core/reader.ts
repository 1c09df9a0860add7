import type { KeyValue } from "../ports/key-value"
import type { Decoder, MergeFn, Reader, Resolver, Tree } from "../ports/reader"
import type { FoundValue } from "../ports/value"
import { jsonCodec } from "../adapters/codecs/json-codec"
import { defaultDecoder } from "./decoder"
import { ConfigError } from "./errors"
import { deepMerge } from "./merge"
import { defaultResolver } from "./resolver"
import { readPath } from "./utils/path"
import { AtomicValue } from "./value"

export type TreeReaderOptions = {
  decoder?: Decoder
  resolver?: Resolver
  merge?: MergeFn
}

/**
 * In-memory reader holding two trees: everything merged so far, and the
 * last successful resolution of it. Lookups only ever see the latter.
 */
export class TreeReader implements Reader {
  private readonly decoder: Decoder
  private readonly resolver: Resolver
  private readonly mergeFn: MergeFn

  private merged: Tree = {}
  private resolved: Tree = {}

  constructor(options: TreeReaderOptions = {}) {
    this.decoder = options.decoder ?? defaultDecoder
    this.resolver = options.resolver ?? defaultResolver
    this.mergeFn = options.merge ?? deepMerge
  }

  merge(...kvs: KeyValue[]): void {
    let next = this.merged

    for (const kv of kvs) {
      const fragment: Tree = {}

      try {
        this.decoder(kv, fragment)
        next = this.mergeFn(next, fragment)
      } catch (err) {
        throw ConfigError.mergeFailed(kv.key, kv.format, err)
      }
    }

    this.merged = next
  }

  resolve(): void {
    try {
      this.resolved = this.resolver(structuredClone(this.merged))
    } catch (err) {
      throw ConfigError.resolveFailed(err)
    }
  }

  value(key: string): FoundValue | undefined {
    const leaf = readPath(this.resolved, key)
    if (leaf === undefined) return undefined

    return new AtomicValue(key, structuredClone(leaf))
  }

  source(): Uint8Array {
    return jsonCodec.marshal(this.resolved)
  }
}
