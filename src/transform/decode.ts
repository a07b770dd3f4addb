import type { EventDetail } from "../types/event"

// One accessor per optional field of the detail response. Each returns a
// string and never throws; the second argument of `orDefault` is the
// documented default.

const FREE_FEE = "Free"

function orDefault(value: string | null | undefined, fallback: string): string {
  return typeof value === "string" ? value : fallback
}

export function decodeTitle(detail: EventDetail): string {
  return orDefault(detail.name?.text, "")
}

export function decodeOrganizerName(detail: EventDetail): string {
  return orDefault(detail.organizer?.name, "")
}

export function decodeVenueName(detail: EventDetail): string {
  return orDefault(detail.venue?.name, "")
}

export function decodeVenueCity(detail: EventDetail): string {
  return orDefault(detail.venue?.address?.city, "")
}

export function decodeDescriptionHtml(detail: EventDetail): string {
  return orDefault(detail.description?.html, "")
}

export function decodeUrl(detail: EventDetail): string {
  return orDefault(detail.url, "")
}

export function decodeFee(detail: EventDetail): string {
  return orDefault(
    detail.ticket_availability?.minimum_ticket_price?.display,
    FREE_FEE,
  )
}

// Required: an empty value is left for parseUtcTimestamp to reject.
export function decodeStartUtc(detail: EventDetail): string {
  return orDefault(detail.start?.utc, "")
}
