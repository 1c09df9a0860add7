function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain starting at `err` (inclusive).
 *
 * Stops at `maxDepth` entries or on the first repeated object.
 *
 * @example
 * ```ts
 * const stopped = errorChain(err).some((e) => e instanceof WatcherStopped)
 * ```
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = getCause(current)
  }

  return chain
}
