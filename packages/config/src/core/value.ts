import type { Milliseconds } from "@tributary/clock"
import { type ZodType, z } from "zod"
import type { FoundValue, NotFoundValue, Value } from "../ports/value"
import { ConfigError } from "./errors"
import { parseBool, parseDuration, parseFloatStrict, parseInteger, scalarText } from "./utils/convert"
import { isRecord, typeOf } from "./utils/type-of"

/**
 * Found value whose payload can be swapped in place by the reconciliation
 * loop. Callers holding it see the new payload on their next read.
 */
export class AtomicValue implements FoundValue {
  readonly kind = "found"

  constructor(
    readonly key: string,
    private payload: unknown,
  ) {}

  load(): unknown {
    return this.payload
  }

  store(value: unknown): void {
    this.payload = value
  }

  bool(): boolean {
    const v = this.payload

    if (typeof v === "boolean") return v

    const parsed = typeof v === "number" || typeof v === "string" ? parseBool(String(v)) : undefined
    if (parsed === undefined) throw this.mismatch("boolean")

    return parsed
  }

  int(): number {
    const v = this.payload

    if (typeof v === "number" && Number.isFinite(v)) return Math.trunc(v)
    const parsed =
      typeof v === "string" || typeof v === "bigint" ? parseInteger(String(v)) : undefined
    if (parsed === undefined) throw this.mismatch("integer")

    return parsed
  }

  float(): number {
    const v = this.payload

    if (typeof v === "number") return v
    if (typeof v === "bigint") return Number(v)

    const parsed = typeof v === "string" ? parseFloatStrict(v) : undefined
    if (parsed === undefined) throw this.mismatch("float")

    return parsed
  }

  string(): string {
    const text = scalarText(this.payload)
    if (text === undefined) throw this.mismatch("string")

    return text
  }

  duration(): Milliseconds {
    const v = this.payload

    if (typeof v === "number" && Number.isFinite(v)) return v

    const parsed = typeof v === "string" ? parseDuration(v) : undefined
    if (parsed === undefined) throw this.mismatch("duration")

    return parsed
  }

  array(): Value[] {
    const v = this.payload
    if (!Array.isArray(v)) throw this.mismatch("array")

    return v.map((item: unknown, i) => new AtomicValue(`${this.key}.${i}`, item))
  }

  record(): Record<string, Value> {
    const v = this.payload
    if (!isRecord(v)) throw this.mismatch("object")

    const out: Record<string, Value> = {}
    for (const [name, item] of Object.entries(v)) {
      out[name] = new AtomicValue(`${this.key}.${name}`, item)
    }

    return out
  }

  scan<T>(schema: ZodType<T>): T {
    const result = schema.safeParse(this.payload)

    if (!result.success) {
      throw ConfigError.typeAssert(
        this.key,
        `schema match:\n${z.prettifyError(result.error)}`,
        typeOf(this.payload),
        result.error,
      )
    }

    return result.data
  }

  private mismatch(expected: string): ConfigError {
    return ConfigError.typeAssert(this.key, expected, typeOf(this.payload))
  }
}

/**
 * Value for a key that did not resolve. Every typed accessor throws the
 * same `key_not_found` error.
 */
export class MissingValue implements NotFoundValue {
  readonly kind = "not_found"
  readonly error: ConfigError

  constructor(readonly key: string) {
    this.error = ConfigError.keyNotFound(key)
  }

  load(): undefined {
    return undefined
  }

  bool(): never {
    throw this.error
  }

  int(): never {
    throw this.error
  }

  float(): never {
    throw this.error
  }

  string(): never {
    throw this.error
  }

  duration(): never {
    throw this.error
  }

  array(): never {
    throw this.error
  }

  record(): never {
    throw this.error
  }

  scan<T>(_schema: ZodType<T>): never {
    throw this.error
  }
}
