import { logError } from "../log"

export const DEFAULT_BROWSER_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
  "User-Agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
}

export interface ZonedDateTimeParts {
  year: string
  month: string
  day: string
  hour: string
  minute: string
}

export function getDateTimePartsInTimeZone(
  date: Date,
  timeZone: string,
): ZonedDateTimeParts {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  })
  const parts = formatter.formatToParts(date)
  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((part) => part.type === type)?.value

  const year = pick("year")
  const month = pick("month")
  const day = pick("day")
  const hour = pick("hour")
  const minute = pick("minute")

  if (!year || !month || !day || !hour || !minute) {
    throw new Error(`Failed to parse date parts for timezone ${timeZone}`)
  }

  return { year, month, day, hour, minute }
}

/**
 * Formats an instant as `YYYY-MM-DD HH:MM` wall-clock time in `timeZone`.
 */
export function formatInTimeZone(date: Date, timeZone: string): string {
  const { year, month, day, hour, minute } = getDateTimePartsInTimeZone(
    date,
    timeZone,
  )
  return `${year}-${month}-${day} ${hour}:${minute}`
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve()
  }
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Single attempt, no retry. Resolves to null on a non-2xx status or a
 * transport error so callers can treat both as "skip". Reading the body of
 * a successful response is left to the caller, which must guard it too.
 */
export async function fetchOnce(
  url: string,
  init: RequestInit,
  label: string,
): Promise<Response | null> {
  let response: Response
  try {
    response = await fetch(url, init)
  } catch (error) {
    logError(`⚠️ ${label} errored:`, error)
    return null
  }

  if (response.ok) {
    return response
  }

  let bodyPreview: string
  try {
    bodyPreview = (await response.text()).slice(0, 200)
  } catch (error) {
    bodyPreview = `(unreadable: ${error instanceof Error ? error.message : String(error)})`
  }
  console.warn(
    `⚠️ ${label} failed: HTTP ${response.status}. Body preview: ${bodyPreview}`,
  )
  return null
}
