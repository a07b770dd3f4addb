import { afterEach, describe, expect, it, vi } from "vitest"
import { formatInTimeZone, getDateTimePartsInTimeZone, sleep } from "../shared"

describe("formatInTimeZone", () => {
  it("applies the daylight saving offset in summer", () => {
    expect(
      formatInTimeZone(new Date("2025-06-01T17:00:00Z"), "America/Los_Angeles"),
    ).toBe("2025-06-01 10:00")
  })

  it("applies the standard offset in winter", () => {
    expect(
      formatInTimeZone(new Date("2025-01-15T08:30:00Z"), "America/Los_Angeles"),
    ).toBe("2025-01-15 00:30")
  })

  it("rolls back to the previous local day", () => {
    expect(
      formatInTimeZone(new Date("2025-06-01T03:15:00Z"), "America/Los_Angeles"),
    ).toBe("2025-05-31 20:15")
  })
})

describe("getDateTimePartsInTimeZone", () => {
  it("returns zero-padded parts", () => {
    expect(
      getDateTimePartsInTimeZone(new Date("2025-03-04T05:06:00Z"), "UTC"),
    ).toEqual({ year: "2025", month: "03", day: "04", hour: "05", minute: "06" })
  })
})

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it("resolves once the delay has elapsed", async () => {
    vi.useFakeTimers()
    let done = false
    const pending = sleep(500).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(499)
    expect(done).toBe(false)
    await vi.advanceTimersByTimeAsync(1)
    expect(done).toBe(true)
    await pending
  })

  it("does not schedule a timer for a zero delay", async () => {
    vi.useFakeTimers()
    await sleep(0)
    expect(vi.getTimerCount()).toBe(0)
  })
})
