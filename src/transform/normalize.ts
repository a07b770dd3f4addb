/**
 * Text and timestamp normalization for event detail fields
 */
import he from "he"

const ISO_UTC_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/

function decodeHtmlEntities(text: string): string {
  return he.decode(text)
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim()
}

/**
 * Strips tags, decodes entities and collapses whitespace (nbsp included).
 */
export function cleanDescription(html: string): string {
  const withoutTags = html.replace(/<[^>]*>/g, " ")
  return collapseWhitespace(decodeHtmlEntities(withoutTags))
}

/**
 * Parses an ISO-8601 timestamp. A value without an offset is read as UTC,
 * matching the API's `start.utc` field. Throws on anything else.
 */
export function parseUtcTimestamp(value: string): Date {
  const trimmed = value.trim()
  const match = trimmed.match(ISO_UTC_PATTERN)
  if (!match) {
    throw new Error(`Unparseable UTC timestamp: "${value}"`)
  }

  const date = new Date(match[1] ? trimmed : `${trimmed}Z`)
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Unparseable UTC timestamp: "${value}"`)
  }
  return date
}

// Counts code points so a surrogate pair is never split.
export function truncate(text: string, maxLength: number, suffix = "..."): string {
  const chars = Array.from(text)
  if (chars.length <= maxLength) {
    return text
  }
  return `${chars.slice(0, maxLength).join("")}${suffix}`
}
