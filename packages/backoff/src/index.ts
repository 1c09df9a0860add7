export { type ConstantOptions, constant } from "./core/strategies/constant"
export { type ExponentialOptions, exponential } from "./core/strategies/exponential"
export type { Delay, DelayPolicy } from "./ports/delay-policy"
