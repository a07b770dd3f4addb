import type { SearchTarget } from "./types/event"

export const KEYWORDS: Record<string, string> = {
  "Startup Networking": "startup-networking",
  Entrepreneurship: "entrepreneurship",
  "Leadership Workshop": "leadership-workshop",
  "Career Fair": "career-fair",
}

export const CITIES: Record<string, string> = {
  "Los Angeles": "los-angeles",
  "San Diego": "san-diego",
  Irvine: "irvine",
  Pasadena: "pasadena",
  "Santa Monica": "santa-monica",
}

export const DISPLAY_TIME_ZONE = "America/Los_Angeles"
export const CSV_FILENAME = "leap_events_socal.csv"
export const MARKDOWN_FILENAME = "leap_events_socal.md"

const DEFAULT_LISTING_BASE_URL = "https://www.eventbrite.com"
const DEFAULT_API_BASE_URL = "https://www.eventbriteapi.com"
const DEFAULT_DETAIL_PAUSE_MS = 500
const DEFAULT_LOOKAHEAD_DAYS = 30

export interface AppConfig {
  apiToken: string
  listingBaseUrl: string
  apiBaseUrl: string
  detailPauseMs: number
  lookaheadDays: number
  outputDir: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

function toNonNegativeNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback
  }
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback
  }
  return parsed
}

function stripTrailingSlashes(value: string): string {
  return value.trim().replace(/\/+$/, "")
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiToken = env.EVENT_API_TOKEN?.trim()
  if (!apiToken) {
    throw new ConfigError(
      "EVENT_API_TOKEN is not set. Add it to .env or the environment.",
    )
  }

  return {
    apiToken,
    listingBaseUrl: stripTrailingSlashes(
      env.LISTING_BASE_URL || DEFAULT_LISTING_BASE_URL,
    ),
    apiBaseUrl: stripTrailingSlashes(env.EVENT_API_BASE_URL || DEFAULT_API_BASE_URL),
    detailPauseMs: toNonNegativeNumber(
      env.DETAIL_PAUSE_MS,
      DEFAULT_DETAIL_PAUSE_MS,
    ),
    lookaheadDays: toNonNegativeNumber(env.LOOKAHEAD_DAYS, DEFAULT_LOOKAHEAD_DAYS),
    outputDir: env.OUTPUT_DIR || ".",
  }
}

/**
 * Every (city, keyword) pair, cities in the outer loop.
 */
export function buildSearchTargets(
  cities: Record<string, string> = CITIES,
  keywords: Record<string, string> = KEYWORDS,
): SearchTarget[] {
  const targets: SearchTarget[] = []
  for (const [city, citySlug] of Object.entries(cities)) {
    for (const [keyword, keywordSlug] of Object.entries(keywords)) {
      targets.push({ city, citySlug, keyword, keywordSlug })
    }
  }
  return targets
}
