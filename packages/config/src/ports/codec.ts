/**
 * Converts between a wire format and plain data.
 */
export interface Codec {
  /** Format name matched against `KeyValue.format`, e.g. "yaml" */
  readonly name: string

  marshal(value: unknown): Uint8Array

  unmarshal(data: Uint8Array): unknown
}
