import { constant } from "../constant"

describe("constant", () => {
  it("returns the same delay for every attempt", () => {
    const policy = constant({ delay: { milliseconds: 1000 } })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 1000 })
    expect(policy.getDelay(1)).toEqual({ milliseconds: 1000 })
    expect(policy.getDelay(100)).toEqual({ milliseconds: 1000 })
  })

  it("allows a zero delay", () => {
    expect(constant({ delay: { milliseconds: 0 } }).getDelay(3)).toEqual({ milliseconds: 0 })
  })

  it("clamps negative delays to zero", () => {
    expect(constant({ delay: { milliseconds: -50 } }).getDelay(0)).toEqual({ milliseconds: 0 })
  })

  it("returns a fresh object each call", () => {
    const policy = constant({ delay: { milliseconds: 10 } })

    expect(policy.getDelay(0)).not.toBe(policy.getDelay(0))
  })
})
