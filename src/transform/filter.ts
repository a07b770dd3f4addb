import { DISPLAY_TIME_ZONE } from "../config"
import { formatInTimeZone } from "../fetchers/shared"
import type { EventDetail, EventRecord, RunWindow, SearchTarget } from "../types/event"
import {
  decodeDescriptionHtml,
  decodeFee,
  decodeOrganizerName,
  decodeStartUtc,
  decodeTitle,
  decodeUrl,
  decodeVenueCity,
  decodeVenueName,
} from "./decode"
import { cleanDescription, parseUtcTimestamp } from "./normalize"

const DAY_MS = 24 * 60 * 60 * 1000

export type FilterResult =
  | { accepted: true; record: EventRecord }
  | { accepted: false; reason: "date" | "city" }

export function createRunWindow(now: Date, lookaheadDays: number): RunWindow {
  return {
    start: now,
    end: new Date(now.getTime() + lookaheadDays * DAY_MS),
  }
}

// Both bounds inclusive.
export function isWithinWindow(start: Date, window: RunWindow): boolean {
  const time = start.getTime()
  return time >= window.start.getTime() && time <= window.end.getTime()
}

// Exact, case-sensitive comparison against the configured city name.
export function matchesCity(venueCity: string, targetCity: string): boolean {
  return venueCity === targetCity
}

export function toEventRecord(
  detail: EventDetail,
  target: SearchTarget,
  window: RunWindow,
): FilterResult {
  const start = parseUtcTimestamp(decodeStartUtc(detail))

  if (!isWithinWindow(start, window)) {
    return { accepted: false, reason: "date" }
  }
  if (!matchesCity(decodeVenueCity(detail), target.city)) {
    return { accepted: false, reason: "city" }
  }

  return {
    accepted: true,
    record: {
      title: decodeTitle(detail),
      organizer: decodeOrganizerName(detail),
      start: formatInTimeZone(start, DISPLAY_TIME_ZONE),
      city: target.city,
      venue: decodeVenueName(detail),
      description: cleanDescription(decodeDescriptionHtml(detail)),
      url: decodeUrl(detail),
      fee: decodeFee(detail),
    },
  }
}
