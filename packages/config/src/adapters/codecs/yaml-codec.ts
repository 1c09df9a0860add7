import { parse, stringify } from "yaml"
import type { Codec } from "../../ports/codec"

export function createYamlCodec(name: string): Codec {
  return {
    name,

    marshal(value: unknown): Uint8Array {
      return Buffer.from(stringify(value), "utf-8")
    },

    unmarshal(data: Uint8Array): unknown {
      return parse(Buffer.from(data).toString("utf-8"))
    },
  }
}

export const yamlCodec = createYamlCodec("yaml")
export const ymlCodec = createYamlCodec("yml")
