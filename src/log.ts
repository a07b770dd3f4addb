import type { RunStats } from "./types/event"

export function logError(context: string, error: unknown): void {
  console.error(context, error)
  // undici reports the underlying socket error as `cause` of "fetch failed".
  if (error instanceof Error && error.cause !== undefined) {
    console.error(`${context} (cause):`, error.cause)
  }
}

export function logStats(stats: RunStats, exported: number): void {
  console.log(`📊 Statistics:`)
  console.log(`   Listing pages:     ${stats.pagesFetched}`)
  console.log(`   Listing failures:  ${stats.listingFailures}`)
  console.log(`   Event IDs found:   ${stats.idsDiscovered}`)
  console.log(`   Detail failures:   ${stats.detailFailures}`)
  console.log(`   Outside window:    ${stats.rejectedByDate}`)
  console.log(`   Other city:        ${stats.rejectedByCity}`)
  console.log(`   Accepted:          ${stats.accepted}`)
  console.log(`   Exported:          ${exported}`)
}
