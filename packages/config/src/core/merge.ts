import type { MergeFn, Tree } from "../ports/reader"
import { isBlockedKey } from "./utils/path"
import { isRecord } from "./utils/type-of"

/**
 * Overlay `source` on `target` into a new tree.
 *
 * Records merge recursively; arrays and scalars from `source` replace what
 * `target` holds. Neither input is mutated.
 */
export const deepMerge: MergeFn = (target, source) => {
  const result: Tree = { ...target }

  for (const key of Object.keys(source)) {
    if (isBlockedKey(key)) continue

    const next = source[key]
    const current = result[key]

    result[key] = isRecord(current) && isRecord(next) ? deepMerge(current, next) : next
  }

  return result
}
