import { parse } from "dotenv"
import { ConfigError } from "../../core/errors"
import { scalarText } from "../../core/utils/convert"
import { isRecord, typeOf } from "../../core/utils/type-of"
import type { Codec } from "../../ports/codec"

function quote(text: string): string {
  if (text.includes("\n")) return `"${text.replaceAll("\n", "\\n")}"`
  if (!text.includes("'")) return `'${text}'`

  return `"${text}"`
}

/**
 * dotenv syntax. Decodes to a flat record of strings; encodes flat records
 * of scalars only.
 */
export const envCodec: Codec = {
  name: "env",

  marshal(value: unknown): Uint8Array {
    if (!isRecord(value)) throw ConfigError.typeAssert("env", "object", typeOf(value))

    const lines: string[] = []
    for (const [key, item] of Object.entries(value)) {
      const text = scalarText(item)
      if (text === undefined) throw ConfigError.typeAssert(key, "scalar", typeOf(item))

      lines.push(`${key}=${quote(text)}`)
    }

    return Buffer.from(lines.map((line) => `${line}\n`).join(""), "utf-8")
  },

  unmarshal(data: Uint8Array): unknown {
    return parse(Buffer.from(data))
  },
}
