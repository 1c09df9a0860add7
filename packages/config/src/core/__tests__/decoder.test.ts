import { jsonCodec } from "../../adapters/codecs/json-codec"
import { rawKv, thrown } from "../../tests/utils/fragments"
import { CodecRegistry } from "../codecs"
import { createDecoder, defaultDecoder } from "../decoder"

describe("defaultDecoder", () => {
  it("expands a dotted key for an empty format", () => {
    const target: Record<string, unknown> = {}

    defaultDecoder(rawKv("server.http.port", "8080"), target)

    expect(target).toEqual({ server: { http: { port: "8080" } } })
  })

  it("decodes registered formats into the target", () => {
    const target: Record<string, unknown> = {}

    defaultDecoder(rawKv("app.yaml", "server:\n  port: 8080\nnames: [a, b]\n", "yaml"), target)

    expect(target).toEqual({ server: { port: 8080 }, names: ["a", "b"] })
  })

  it("decodes env fragments to strings", () => {
    const target: Record<string, unknown> = {}

    defaultDecoder(rawKv(".env", "PORT=8080\nNAME=svc\n", "env"), target)

    expect(target).toEqual({ PORT: "8080", NAME: "svc" })
  })

  it("treats an empty document as no data", () => {
    const target: Record<string, unknown> = {}

    defaultDecoder(rawKv("empty.yaml", "", "yaml"), target)

    expect(target).toEqual({})
  })

  it("rejects unknown formats", () => {
    expect(thrown(() => defaultDecoder(rawKv("a.toml", "x = 1", "toml"), {}))).toMatchObject({
      code: "unsupported_format",
      context: { key: "a.toml", format: "toml" },
    })
  })

  it("rejects documents that are not records", () => {
    expect(thrown(() => defaultDecoder(rawKv("list.json", "[1,2]", "json"), {}))).toMatchObject({
      code: "type_assert",
      context: { actual: "array" },
    })
  })

  it("drops prototype keys", () => {
    const target: Record<string, unknown> = {}

    defaultDecoder(rawKv("a.json", '{"__proto__": {"x": 1}, "ok": true}', "json"), target)
    defaultDecoder(rawKv("__proto__.polluted", "yes"), target)

    expect(target).toEqual({ ok: true })
    expect(Object.getPrototypeOf(target)).toBe(Object.prototype)
  })

  it("uses only the codecs of its registry", () => {
    const decode = createDecoder(new CodecRegistry([jsonCodec]))

    expect(thrown(() => decode(rawKv("a.yaml", "a: 1", "yaml"), {}))).toMatchObject({
      code: "unsupported_format",
    })
  })
})
