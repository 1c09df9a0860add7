import type { Milliseconds } from "@tributary/clock"
import type { AppError } from "@tributary/errors"
import type { ZodType } from "zod"

/**
 * Typed views of one configuration leaf.
 *
 * Conversions throw a `type_assert` ConfigError when the payload cannot be
 * read as the requested type.
 */
export interface ValueAccessors {
  readonly key: string

  /** The raw payload; `undefined` for a missing key. */
  load(): unknown

  /** Booleans, 0/1, and "true"/"false"/"t"/"f"/"1"/"0" in any common case. */
  bool(): boolean

  /** Integers; floats are truncated, strings must be integral. */
  int(): number

  float(): number

  /** Strings as-is; numbers, booleans and bigints stringified. */
  string(): string

  /** A number of milliseconds, or a string such as "1h30m" or "250ms". */
  duration(): Milliseconds

  /** Elements of an array payload, keyed `<key>.<index>`. */
  array(): Value[]

  /** Entries of a record payload, keyed `<key>.<name>`. */
  record(): Record<string, Value>

  /** Parse the payload with a zod schema. */
  scan<T>(schema: ZodType<T>): T
}

/**
 * A key that resolved. The same object is handed to every caller and is
 * updated in place when the key changes.
 */
export interface FoundValue extends ValueAccessors {
  readonly kind: "found"

  store(value: unknown): void
}

/**
 * A key that did not resolve. Immutable; every typed accessor throws `error`.
 */
export interface NotFoundValue extends ValueAccessors {
  readonly kind: "not_found"

  readonly error: AppError
}

export type Value = FoundValue | NotFoundValue
