import type { Milliseconds } from "@tributary/clock"

const TRUE = new Set(["1", "t", "T", "true", "TRUE", "True"])
const FALSE = new Set(["0", "f", "F", "false", "FALSE", "False"])

const INTEGER = /^[+-]?\d+$/
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const DURATION = /^[+-]?(?:(?:\d+(?:\.\d*)?|\.\d+)(?:ns|us|µs|ms|s|m|h))+$/
const DURATION_PART = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|s|m|h)/g

const UNIT: Record<string, Milliseconds> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
}

export function parseBool(text: string): boolean | undefined {
  if (TRUE.has(text)) return true
  if (FALSE.has(text)) return false

  return undefined
}

/** Integral text as a number; `undefined` when it does not fit exactly. */
export function parseInteger(text: string): number | undefined {
  if (!INTEGER.test(text)) return undefined

  const n = Number(text)

  return Number.isSafeInteger(n) ? n : undefined
}

export function isIntegerText(text: string): boolean {
  return INTEGER.test(text)
}

export function parseFloatStrict(text: string): number | undefined {
  return FLOAT.test(text) ? Number(text) : undefined
}

/**
 * Parse "300ms", "1.5s", "1h30m" and friends into milliseconds.
 * A bare integer is taken as milliseconds.
 */
export function parseDuration(text: string): Milliseconds | undefined {
  const integer = parseInteger(text)
  if (integer !== undefined) return integer

  if (!DURATION.test(text)) return undefined

  let total = 0
  for (const [, amount, unit] of text.matchAll(DURATION_PART)) {
    total += Number(amount) * (UNIT[unit ?? ""] ?? 0)
  }

  return text.startsWith("-") ? -total : total
}

/** Scalar payloads as text; `undefined` for anything else. */
export function scalarText(value: unknown): string | undefined {
  switch (typeof value) {
    case "string":
      return value
    case "number":
    case "boolean":
    case "bigint":
      return String(value)
    default:
      return undefined
  }
}
