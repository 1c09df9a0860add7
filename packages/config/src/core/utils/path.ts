import { isRecord } from "./type-of"

const INDEX = /^(0|[1-9]\d*)$/
const BLOCKED_KEYS = new Set(["__proto__", "constructor", "prototype"])

/** Keys that could reach an object's prototype when assigned. */
export function isBlockedKey(key: string): boolean {
  return BLOCKED_KEYS.has(key)
}

/**
 * Walk `tree` along a dotted path. Numeric segments index into arrays.
 *
 * @returns the leaf, or `undefined` when any segment is missing
 */
export function readPath(tree: Record<string, unknown>, key: string): unknown {
  let current: unknown = tree

  for (const segment of key.split(".")) {
    if (isRecord(current) && Object.hasOwn(current, segment)) {
      current = current[segment]
    } else if (Array.isArray(current) && INDEX.test(segment)) {
      current = current[Number(segment)]
    } else {
      return undefined
    }
  }

  return current
}
