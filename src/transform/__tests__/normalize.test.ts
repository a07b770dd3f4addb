import { describe, expect, it } from "vitest"
import { cleanDescription, parseUtcTimestamp, truncate } from "../normalize"

describe("cleanDescription", () => {
  it("strips tags and collapses whitespace including nbsp", () => {
    expect(cleanDescription("<p>Hello&nbsp;  world</p>\n<br/>Bye")).toBe(
      "Hello world Bye",
    )
  })

  it("keeps words in adjacent block elements apart", () => {
    expect(cleanDescription("<p>First</p><p>Second</p>")).toBe("First Second")
  })

  it("decodes entities after removing tags", () => {
    expect(cleanDescription("Tom &amp; Jerry&#39;s <b>show</b>")).toBe(
      "Tom & Jerry's show",
    )
    expect(cleanDescription("&lt;b&gt;literal&lt;/b&gt;")).toBe("<b>literal</b>")
  })

  it("returns an empty string for empty input", () => {
    expect(cleanDescription("")).toBe("")
    expect(cleanDescription("<div>\n  </div>")).toBe("")
  })
})

describe("parseUtcTimestamp", () => {
  const expected = Date.UTC(2025, 5, 1, 17, 0, 0)

  it("accepts a Z suffix", () => {
    expect(parseUtcTimestamp("2025-06-01T17:00:00Z").getTime()).toBe(expected)
  })

  it("reads a value without an offset as UTC", () => {
    expect(parseUtcTimestamp("2025-06-01T17:00:00").getTime()).toBe(expected)
  })

  it("honours an explicit offset", () => {
    expect(parseUtcTimestamp("2025-06-01T10:00:00-07:00").getTime()).toBe(
      expected,
    )
  })

  it("throws on malformed values", () => {
    expect(() => parseUtcTimestamp("June 1st")).toThrow(
      'Unparseable UTC timestamp: "June 1st"',
    )
    expect(() => parseUtcTimestamp("")).toThrow("Unparseable UTC timestamp")
    expect(() => parseUtcTimestamp("2025-13-45T00:00:00Z")).toThrow(
      "Unparseable UTC timestamp",
    )
  })
})

describe("truncate", () => {
  it("leaves text at the limit untouched", () => {
    const text = "a".repeat(200)
    expect(truncate(text, 200)).toBe(text)
  })

  it("cuts longer text and appends an ellipsis", () => {
    expect(truncate("b".repeat(201), 200)).toBe(`${"b".repeat(200)}...`)
  })

  it("counts astral characters once and never splits them", () => {
    const emoji = "\u{1F600}"
    expect(truncate(emoji.repeat(150), 200)).toBe(emoji.repeat(150))
    expect(truncate(`${"a".repeat(199)}${emoji}${"b".repeat(10)}`, 200)).toBe(
      `${"a".repeat(199)}${emoji}...`,
    )
  })
})
