import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ExponentialOptions {
  base: Delay

  /** Multiplier per attempt. Default: 2 */
  factor?: number

  /** Upper bound for any single delay. Default: unbounded */
  max?: Delay
}

export function exponential(opts: ExponentialOptions): DelayPolicy {
  const { base, factor = 2, max } = opts
  const ceiling = max?.milliseconds ?? Number.POSITIVE_INFINITY

  return {
    getDelay(attempt: number): Delay {
      const raw = base.milliseconds * factor ** Math.max(0, attempt)

      return { milliseconds: Math.min(raw, ceiling) }
    },
  }
}
