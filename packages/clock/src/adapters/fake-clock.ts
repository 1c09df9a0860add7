import type { Clock, Milliseconds } from "../ports/clock"

/**
 * Deterministic clock for tests.
 *
 * `sleep()` never waits on a timer: it records the requested duration,
 * advances virtual time by it and resolves on the next microtask. An aborted
 * signal short-circuits without advancing time.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly requested: Milliseconds[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  /** Durations passed to `sleep()` that actually elapsed, in call order. */
  get sleeps(): readonly Milliseconds[] {
    return [...this.requested]
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.requested.push(ms)
    this.advance(Math.max(0, ms))
  }
}
