export type RuntimeType =
  | "undefined"
  | "null"
  | "array"
  | "object"
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "function"

/** `typeof` that tells null and arrays apart from records. */
export function typeOf(value: unknown): RuntimeType {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"

  return typeof value
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
