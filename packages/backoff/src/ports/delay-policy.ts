import type { Milliseconds } from "@tributary/clock"

export type Delay = Readonly<{ milliseconds: Milliseconds }>

/**
 * Wait to apply before the next attempt.
 *
 * `attempt` counts consecutive failures, starting at 0 for the first one;
 * callers reset it after a success.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
