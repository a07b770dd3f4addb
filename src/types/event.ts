export interface SearchTarget {
  city: string
  citySlug: string
  keyword: string
  keywordSlug: string
}

// Detail API response (v3 events endpoint, expanded with venue, organizer
// and ticket_availability). The API omits sub-resources freely, so every
// field is optional.
export interface EventDetail {
  id?: string
  name?: EventTextField | null
  description?: EventTextField | null
  url?: string | null
  start?: EventDateTime | null
  end?: EventDateTime | null
  organizer?: EventOrganizer | null
  venue?: EventVenue | null
  ticket_availability?: TicketAvailability | null
}

// Multipart text: the API sends both a plain and an HTML rendering.
export interface EventTextField {
  text?: string | null
  html?: string | null
}

export interface EventDateTime {
  timezone?: string
  local?: string
  utc?: string | null
}

export interface EventOrganizer {
  id?: string
  name?: string | null
}

export interface EventVenue {
  id?: string
  name?: string | null
  address?: EventAddress | null
}

export interface EventAddress {
  address_1?: string | null
  city?: string | null
  region?: string | null
  postal_code?: string | null
}

export interface TicketAvailability {
  has_available_tickets?: boolean
  is_free?: boolean
  minimum_ticket_price?: TicketPrice | null
}

export interface TicketPrice {
  currency?: string
  major_value?: string
  value?: number
  display?: string | null
}

export interface EventRecord {
  title: string
  organizer: string
  start: string // YYYY-MM-DD HH:MM, Pacific Time
  city: string
  venue: string
  description: string
  url: string
  fee: string
}

export interface RunWindow {
  start: Date
  end: Date
}

export type PageOutcome =
  | { kind: "continue"; ids: string[] }
  | { kind: "stop"; reason: "http-failure" | "no-new-ids" }

export interface RunStats {
  pagesFetched: number
  listingFailures: number
  idsDiscovered: number
  detailFailures: number
  rejectedByDate: number
  rejectedByCity: number
  accepted: number
}

export interface RunContext {
  seenIds: Set<string>
  records: EventRecord[]
  window: RunWindow
  stats: RunStats
}
