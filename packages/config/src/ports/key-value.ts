/**
 * One fragment of raw configuration emitted by a source.
 *
 * `format` names the codec that decodes `value` ("json", "yaml", "env", ...).
 * An empty format means `value` is the UTF-8 text of a single leaf addressed
 * by the dotted `key`.
 */
export type KeyValue = Readonly<{
  key: string
  value: Uint8Array
  format: string
}>
