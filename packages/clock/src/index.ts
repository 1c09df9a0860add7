export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Clock, Milliseconds, Sleeper, TimeSource } from "./ports/clock"
