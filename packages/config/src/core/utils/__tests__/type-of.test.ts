import { isRecord, typeOf } from "../type-of"

describe("typeOf", () => {
  it("separates null, arrays and records", () => {
    expect(typeOf(null)).toBe("null")
    expect(typeOf([])).toBe("array")
    expect(typeOf({})).toBe("object")
    expect(typeOf(undefined)).toBe("undefined")
    expect(typeOf(1)).toBe("number")
  })
})

describe("isRecord", () => {
  it("accepts plain and null-prototype objects only", () => {
    expect(isRecord({ a: 1 })).toBe(true)
    expect(isRecord(Object.create(null))).toBe(true)
    expect(isRecord(new Date())).toBe(false)
    expect(isRecord([])).toBe(false)
  })
})
