import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { isCancellation } from "../../core/errors"
import type { KeyValue } from "../key-value"
import type { Source } from "../source"

export type ExpectedFragment = {
  key: string
  format: string
  text: string
}

export type SourceHarness = {
  name: string
  make: (cwd: string) => Promise<{
    source: Source
    cleanup?: () => Promise<void>
  }>
  setup?: (cwd: string) => Promise<void>
  expected: () => ExpectedFragment[]
}

function describeFragments(kvs: KeyValue[]): ExpectedFragment[] {
  return kvs.map((kv) => ({
    key: kv.key,
    format: kv.format,
    text: Buffer.from(kv.value).toString("utf-8"),
  }))
}

export function describeSourceContract(h: SourceHarness) {
  describe(`${h.name} (Source contract)`, () => {
    let cwd: string
    let source: Source
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"))
      await h.setup?.(cwd)
      const result = await h.make(cwd)

      source = result.source
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() resolves to fragments with byte values", async () => {
      const kvs = await source.load()

      expect(Array.isArray(kvs)).toBe(true)
      for (const kv of kvs) {
        expect(typeof kv.key).toBe("string")
        expect(typeof kv.format).toBe("string")
        expect(kv.value).toBeInstanceOf(Uint8Array)
      }
    })

    it("load() returns expected fragments", async () => {
      expect(describeFragments(await source.load())).toEqual(h.expected())
    })

    it("load() is idempotent", async () => {
      const a = describeFragments(await source.load())
      const b = describeFragments(await source.load())

      expect(b).toEqual(a)
    })

    it("load() does not leak a mutable reference", async () => {
      const first = await source.load()
      first.push({ key: "__CONFIG_TEST_MUTATION__", value: new Uint8Array(), format: "" })

      const second = await source.load()
      expect(second.map((kv) => kv.key)).not.toContain("__CONFIG_TEST_MUTATION__")
    })

    it("watch() next() rejects with a cancellation once stopped", async () => {
      const watcher = await source.watch()
      const pending = watcher.next()

      await watcher.stop()

      const err = await pending.catch((e: unknown) => e)
      expect(isCancellation(err)).toBe(true)
      await expect(watcher.next()).rejects.toMatchObject({ code: "watcher_stopped" })
    })

    it("watch() next() honors an aborted signal", async () => {
      const watcher = await source.watch()
      const controller = new AbortController()
      controller.abort()

      const err = await watcher.next(controller.signal).catch((e: unknown) => e)
      await watcher.stop()

      expect(isCancellation(err)).toBe(true)
    })

    it("watch() stop() is idempotent", async () => {
      const watcher = await source.watch()

      await watcher.stop()
      await expect(watcher.stop()).resolves.toBeUndefined()
    })
  })
}
