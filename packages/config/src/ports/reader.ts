import type { KeyValue } from "./key-value"
import type { FoundValue } from "./value"

export type Tree = Record<string, unknown>

/** Decodes one fragment into `target`. Throws on malformed input. */
export type Decoder = (kv: KeyValue, target: Tree) => void

/** Expands cross-references in a merged tree, returning the resolved tree. */
export type Resolver = (tree: Tree) => Tree

/** Overlays `source` on `target` without mutating either. */
export type MergeFn = (target: Tree, source: Tree) => Tree

/**
 * The merged key space behind a config.
 *
 * Implementations must never expose a partially merged or partially
 * resolved tree to `value()` or `source()`.
 */
export interface Reader {
  /**
   * Decode and merge fragments, later ones overriding earlier ones.
   * A failure leaves the merged tree as it was before the call.
   */
  merge(...kvs: KeyValue[]): void

  /** Re-resolve the merged tree. Idempotent. */
  resolve(): void

  /** Point lookup in the resolved tree; `undefined` when the key is absent. */
  value(key: string): FoundValue | undefined

  /** The resolved tree in canonical (JSON) encoding. */
  source(): Uint8Array
}
