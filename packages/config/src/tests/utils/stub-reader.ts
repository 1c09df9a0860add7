import { ConfigError } from "../../core/errors"
import { TreeReader } from "../../core/reader"
import type { KeyValue } from "../../ports/key-value"
import type { Reader } from "../../ports/reader"
import type { FoundValue } from "../../ports/value"

/**
 * Reader over a real TreeReader that can be told to fail its next merge or
 * resolve, and counts calls.
 */
export class StubReader implements Reader {
  readonly inner = new TreeReader()
  mergeCalls = 0
  resolveCalls = 0
  failNextMerge = false
  failNextResolve = false

  merge(...kvs: KeyValue[]): void {
    this.mergeCalls++
    if (this.failNextMerge) {
      this.failNextMerge = false
      throw ConfigError.mergeFailed("stub", "json", new Error("merge refused"))
    }
    this.inner.merge(...kvs)
  }

  resolve(): void {
    this.resolveCalls++
    if (this.failNextResolve) {
      this.failNextResolve = false
      throw ConfigError.resolveFailed(new Error("resolve refused"))
    }
    this.inner.resolve()
  }

  value(key: string): FoundValue | undefined {
    return this.inner.value(key)
  }

  source(): Uint8Array {
    return this.inner.source()
  }
}
