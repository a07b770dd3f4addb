import { describe, expect, it } from "vitest"
import { escapeCsvField, renderCsv } from "../csv"
import type { EventRecord } from "../../types/event"

const record: EventRecord = {
  title: 'Say "hi", everyone',
  organizer: "SoCal Founders",
  start: "2025-06-01 10:00",
  city: "Irvine",
  venue: "The Hub",
  description: "Line one, line two",
  url: "https://example.test/e/say-hi-12345678",
  fee: "$10.00",
}

describe("escapeCsvField", () => {
  it("quotes the value and doubles embedded quotes", () => {
    expect(escapeCsvField('a "b" c')).toBe('"a ""b"" c"')
    expect(escapeCsvField("")).toBe('""')
  })
})

describe("renderCsv", () => {
  it("writes the header in fixed column order", () => {
    expect(renderCsv([])).toBe(
      "Title,Organizer,Start (PT),City,Venue,Description,URL,Fee\n",
    )
  })

  it("writes one quoted row per record", () => {
    expect(renderCsv([record])).toBe(
      "Title,Organizer,Start (PT),City,Venue,Description,URL,Fee\n" +
        '"Say ""hi"", everyone","SoCal Founders","2025-06-01 10:00","Irvine","The Hub","Line one, line two","https://example.test/e/say-hi-12345678","$10.00"\n',
    )
  })
})
