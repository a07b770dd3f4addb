import { logError } from "../log"
import type { EventDetail } from "../types/event"
import { fetchOnce } from "./shared"

const EXPAND = "venue,organizer,ticket_availability"

export class DetailFetcher {
  constructor(
    private readonly apiBaseUrl: string,
    private readonly token: string,
  ) {}

  buildUrl(eventId: string): string {
    return `${this.apiBaseUrl}/v3/events/${eventId}/?expand=${EXPAND}`
  }

  async fetchDetail(eventId: string): Promise<EventDetail | null> {
    const response = await fetchOnce(
      this.buildUrl(eventId),
      {
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${this.token}`,
        },
      },
      `Event detail ${eventId}`,
    )
    if (!response) {
      return null
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      logError(`⚠️ Event detail ${eventId} returned invalid JSON:`, error)
      return null
    }

    if (!isEventDetail(body)) {
      console.warn(`⚠️ Event detail ${eventId} returned a non-object body`)
      return null
    }
    return body
  }
}

function isEventDetail(value: unknown): value is EventDetail {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
