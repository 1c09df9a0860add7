import { createPlaceholderResolver, defaultResolver } from "../resolver"

describe("placeholder resolver", () => {
  it("substitutes paths from the tree", () => {
    const resolved = defaultResolver({
      db: { host: "db.local", port: 5432 },
      url: "postgres://${db.host}:${db.port}/app",
    })

    expect(resolved.url).toBe("postgres://db.local:5432/app")
  })

  it("uses the default after the first colon", () => {
    const resolved = defaultResolver({
      endpoint: "${api.url:http://localhost:3000}",
      name: "${app.name}",
    })

    expect(resolved).toEqual({ endpoint: "http://localhost:3000", name: "" })
  })

  it("trims the placeholder expression", () => {
    expect(defaultResolver({ a: "x", b: "${ a }" }).b).toBe("x")
  })

  it("walks arrays and nested records", () => {
    const resolved = defaultResolver({
      region: "eu",
      hosts: ["${region}-1", { name: "${region}-2" }],
      nested: { deep: { value: "${region}" } },
    })

    expect(resolved.hosts).toEqual(["eu-1", { name: "eu-2" }])
    expect(resolved.nested).toEqual({ deep: { value: "eu" } })
  })

  it("does not expand substituted text again", () => {
    const resolved = defaultResolver({ a: "${b}", b: "${c}", c: "done" })

    expect(resolved).toEqual({ a: "${c}", b: "done", c: "done" })
  })

  it("substitutes records as empty text", () => {
    expect(defaultResolver({ db: { a: 1 }, s: "[${db}]" }).s).toBe("[]")
  })

  it("does not mutate its input", () => {
    const input = { a: "1", b: "${a}" }

    defaultResolver(input)

    expect(input.b).toBe("${a}")
  })

  it("is idempotent on resolved output without placeholders", () => {
    const once = defaultResolver({ a: "x", b: "${a}" })

    expect(defaultResolver(once)).toEqual(once)
  })

  describe("with actual types", () => {
    const resolve = createPlaceholderResolver({ actualTypes: true })

    it("converts a sole placeholder to boolean, integer or float", () => {
      const resolved = resolve({
        raw: { flag: "TRUE", count: "42", ratio: "0.25", name: "svc" },
        flag: "${raw.flag}",
        count: "${raw.count}",
        ratio: "${raw.ratio}",
        name: "${raw.name}",
        port: "${missing:8080}",
      })

      expect(resolved).toMatchObject({ flag: true, count: 42, ratio: 0.25, name: "svc", port: 8080 })
    })

    it("keeps mixed text as a string", () => {
      expect(resolve({ n: "1", s: "v${n}" }).s).toBe("v1")
    })

    it("keeps integers beyond the safe range as text", () => {
      const resolved = resolve({ account: "9007199254740993", ref: "${account}" })

      expect(resolved.ref).toBe("9007199254740993")
    })

    it("does not treat 1 and 0 as booleans", () => {
      expect(resolve({ n: "1", v: "${n}" }).v).toBe(1)
    })
  })
})
