import { describeClockContract } from "../../ports/__tests__/clock.contract"
import { SystemClock } from "../system-clock"

describeClockContract({
  name: "SystemClock",
  make: () => new SystemClock(),
})

describe("SystemClock behavior", () => {
  it("waits roughly the requested time", async () => {
    const clock = new SystemClock()
    const start = Date.now()

    await clock.sleep(50)

    expect(Date.now() - start).toBeGreaterThanOrEqual(45)
  })

  it("resolves early when the signal aborts mid-sleep", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()
    const start = Date.now()

    const sleeping = clock.sleep(5000, ac.signal)
    setTimeout(() => ac.abort(), 20)

    await expect(sleeping).resolves.toBeUndefined()
    expect(Date.now() - start).toBeLessThan(1000)
  })

  it("treats negative durations as no wait", async () => {
    await expect(new SystemClock().sleep(-5)).resolves.toBeUndefined()
  })
})
