import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ConstantOptions {
  /** Fixed delay between attempts */
  delay: Delay
}

/**
 * Same delay after every failure. Negative delays are treated as 0.
 *
 * @example
 * ```ts
 * constant({ delay: { milliseconds: 1000 } }).getDelay(7) // { milliseconds: 1000 }
 * ```
 */
export function constant(options: ConstantOptions): DelayPolicy {
  const milliseconds = Math.max(0, options.delay.milliseconds)

  return {
    getDelay(_attempt: number): Delay {
      return { milliseconds }
    },
  }
}
