import { isBlockedKey, readPath } from "../path"

describe("readPath", () => {
  const tree = {
    server: { http: { port: 8080 } },
    hosts: [{ name: "a" }, { name: "b" }],
    empty: null,
  }

  it("walks nested records", () => {
    expect(readPath(tree, "server.http.port")).toBe(8080)
    expect(readPath(tree, "server.http")).toEqual({ port: 8080 })
  })

  it("indexes arrays with numeric segments", () => {
    expect(readPath(tree, "hosts.1.name")).toBe("b")
    expect(readPath(tree, "hosts.01.name")).toBeUndefined()
  })

  it("returns null leaves as they are", () => {
    expect(readPath(tree, "empty")).toBeNull()
  })

  it("returns undefined for missing segments", () => {
    expect(readPath(tree, "server.grpc")).toBeUndefined()
    expect(readPath(tree, "server.http.port.value")).toBeUndefined()
    expect(readPath(tree, "")).toBeUndefined()
  })

  it("ignores inherited properties", () => {
    expect(readPath(tree, "server.toString")).toBeUndefined()
  })
})

describe("isBlockedKey", () => {
  it("flags prototype keys", () => {
    expect(isBlockedKey("__proto__")).toBe(true)
    expect(isBlockedKey("constructor")).toBe(true)
    expect(isBlockedKey("proto")).toBe(false)
  })
})
