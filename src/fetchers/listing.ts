import { logError } from "../log"
import type { SearchTarget } from "../types/event"
import { DEFAULT_BROWSER_HEADERS, fetchOnce } from "./shared"

// `/e/<slug>-<id>` where the id is 8-12 digits and does not run on into
// more digits or a further path segment.
const EVENT_LINK_PATTERN = /\/e\/[^/"'\s<>]+-(\d{8,12})(?![\d/])/g

export function extractEventIds(html: string): string[] {
  const ids = new Set<string>()
  for (const match of html.matchAll(EVENT_LINK_PATTERN)) {
    ids.add(match[1])
  }
  return [...ids]
}

export class ListingFetcher {
  constructor(private readonly baseUrl: string) {}

  buildUrl(target: SearchTarget, page: number): string {
    return `${this.baseUrl}/d/ca--${target.citySlug}/${target.keywordSlug}/?page=${page}`
  }

  /**
   * Returns the page markup, or null when the listing could not be fetched.
   */
  async fetchPage(target: SearchTarget, page: number): Promise<string | null> {
    const label = `Listing ${target.city} / ${target.keyword} (page ${page})`
    const response = await fetchOnce(
      this.buildUrl(target, page),
      { headers: DEFAULT_BROWSER_HEADERS },
      label,
    )
    if (!response) {
      return null
    }

    try {
      return await response.text()
    } catch (error) {
      logError(`⚠️ ${label} body could not be read:`, error)
      return null
    }
  }
}
