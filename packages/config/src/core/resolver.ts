import type { Resolver, Tree } from "../ports/reader"
import { isIntegerText, parseBool, parseFloatStrict, parseInteger, scalarText } from "./utils/convert"
import { readPath } from "./utils/path"
import { isRecord } from "./utils/type-of"

const PLACEHOLDER = /\$\{(.*?)\}/g
const SOLE_PLACEHOLDER = /^\$\{([^}]*)\}$/

export type PlaceholderResolverOptions = {
  /**
   * Store a string that is exactly one placeholder as boolean, integer or
   * float when its substitution reads as one.
   *
   * @default false
   */
  actualTypes?: boolean
}

function toActualType(text: string): unknown {
  const lowered = text.toLowerCase()
  if (lowered === "true" || lowered === "false") return parseBool(lowered)

  // integers past 2^53 stay text
  if (isIntegerText(text)) return parseInteger(text) ?? text

  return parseFloatStrict(text) ?? text
}

/**
 * Resolver for `${path}` and `${path:default}` placeholders.
 *
 * Paths are read from the tree as it was before resolution, so substituted
 * text is never expanded again. A path that is absent (or not a scalar)
 * yields its default, or the empty string.
 *
 * @example
 * ```typescript
 * // { db: { host: "db.local", url: "postgres://${db.host}:${db.port:5432}" } }
 * // resolves url to "postgres://db.local:5432"
 * ```
 */
export function createPlaceholderResolver(options: PlaceholderResolverOptions = {}): Resolver {
  const actualTypes = options.actualTypes ?? false

  return (tree) => {
    const substitute = (expr: string): string => {
      const trimmed = expr.trim()
      const sep = trimmed.indexOf(":")
      const path = sep < 0 ? trimmed : trimmed.slice(0, sep)
      const fallback = sep < 0 ? "" : trimmed.slice(sep + 1)
      const found = readPath(tree, path)

      if (found === undefined) return fallback

      return scalarText(found) ?? ""
    }

    const expand = (text: string): unknown => {
      const sole = actualTypes ? SOLE_PLACEHOLDER.exec(text) : null
      if (sole) return toActualType(substitute(sole[1] ?? ""))

      return text.replace(PLACEHOLDER, (_match, expr: string) => substitute(expr))
    }

    const walk = (value: unknown): unknown => {
      if (typeof value === "string") return expand(value)
      if (Array.isArray(value)) return value.map(walk)
      if (isRecord(value)) return walkTree(value)

      return value
    }

    const walkTree = (node: Tree): Tree => {
      return Object.fromEntries(Object.entries(node).map(([key, value]) => [key, walk(value)]))
    }

    return walkTree(tree)
  }
}

export const defaultResolver: Resolver = createPlaceholderResolver()
