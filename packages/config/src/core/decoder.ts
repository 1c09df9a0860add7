import type { Decoder, Tree } from "../ports/reader"
import { type CodecRegistry, defaultCodecs } from "./codecs"
import { ConfigError } from "./errors"
import { isBlockedKey } from "./utils/path"
import { isRecord } from "./utils/type-of"

/**
 * Build a decoder over a codec registry.
 *
 * - empty format: the dotted key becomes nested records with the UTF-8 text
 *   as leaf (`a.b=x` decodes to `{ a: { b: "x" } }`)
 * - otherwise the codec for the format decodes the bytes, which must yield a
 *   record (an empty document yields nothing)
 */
export function createDecoder(codecs: CodecRegistry = defaultCodecs): Decoder {
  return (kv, target) => {
    if (kv.format === "") {
      const segments = kv.key.split(".")
      if (segments.some(isBlockedKey)) return

      const leaf = segments.pop() ?? kv.key
      let node: Tree = target

      for (const segment of segments) {
        const existing = node[segment]
        const child: Tree = isRecord(existing) ? existing : {}
        node[segment] = child
        node = child
      }
      node[leaf] = Buffer.from(kv.value).toString("utf-8")

      return
    }

    const codec = codecs.get(kv.format)
    if (!codec) throw ConfigError.unsupportedFormat(kv.key, kv.format)

    const decoded = codec.unmarshal(kv.value)
    if (decoded === null || decoded === undefined) return
    if (!isRecord(decoded)) {
      throw ConfigError.typeAssert(kv.key, "object", Array.isArray(decoded) ? "array" : typeof decoded)
    }

    for (const [key, value] of Object.entries(decoded)) {
      if (!isBlockedKey(key)) target[key] = value
    }
  }
}

export const defaultDecoder: Decoder = createDecoder()
