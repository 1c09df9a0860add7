import { exponential } from "../exponential"

describe("exponential", () => {
  it("doubles from the base by default", () => {
    const policy = exponential({ base: { milliseconds: 100 } })

    expect([0, 1, 2, 3].map((a) => policy.getDelay(a).milliseconds)).toEqual([
      100, 200, 400, 800,
    ])
  })

  it("uses a custom factor", () => {
    const policy = exponential({ base: { milliseconds: 100 }, factor: 1.5 })

    expect(policy.getDelay(1)).toEqual({ milliseconds: 150 })
    expect(policy.getDelay(2)).toEqual({ milliseconds: 225 })
  })

  it("caps delays at max", () => {
    const policy = exponential({ base: { milliseconds: 250 }, max: { milliseconds: 1000 } })

    expect(policy.getDelay(2)).toEqual({ milliseconds: 1000 })
    expect(policy.getDelay(10)).toEqual({ milliseconds: 1000 })
  })

  it("treats negative attempts as the first attempt", () => {
    const policy = exponential({ base: { milliseconds: 100 } })

    expect(policy.getDelay(-1)).toEqual({ milliseconds: 100 })
  })

  it("is unbounded without max", () => {
    expect(exponential({ base: { milliseconds: 100 } }).getDelay(10)).toEqual({
      milliseconds: 102400,
    })
  })
})
