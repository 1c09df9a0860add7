import type { Codec } from "../../ports/codec"

export const jsonCodec: Codec = {
  name: "json",

  marshal(value: unknown): Uint8Array {
    return Buffer.from(JSON.stringify(value), "utf-8")
  },

  unmarshal(data: Uint8Array): unknown {
    return JSON.parse(Buffer.from(data).toString("utf-8"))
  },
}
