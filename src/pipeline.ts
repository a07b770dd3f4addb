import type { DetailFetcher } from "./fetchers/details"
import { extractEventIds, type ListingFetcher } from "./fetchers/listing"
import { sleep } from "./fetchers/shared"
import { dedupeRecords } from "./dedup/records"
import { createRunWindow, toEventRecord } from "./transform/filter"
import type {
  EventRecord,
  PageOutcome,
  RunContext,
  RunStats,
  RunWindow,
  SearchTarget,
} from "./types/event"

export interface PipelineDeps {
  listing: ListingFetcher
  details: DetailFetcher
  detailPauseMs: number
  pause?: (ms: number) => Promise<void>
}

export interface PipelineOptions {
  lookaheadDays: number
  now?: Date
}

export interface PipelineResult {
  records: EventRecord[]
  stats: RunStats
}

export function createRunContext(window: RunWindow): RunContext {
  return {
    seenIds: new Set(),
    records: [],
    window,
    stats: {
      pagesFetched: 0,
      listingFailures: 0,
      idsDiscovered: 0,
      detailFailures: 0,
      rejectedByDate: 0,
      rejectedByCity: 0,
      accepted: 0,
    },
  }
}

/**
 * Fetches one listing page and claims the ids not seen before. Claimed ids
 * are added to `ctx.seenIds` here, so a failed detail fetch later is never
 * retried from another page or target.
 */
export async function fetchListingPage(
  listing: ListingFetcher,
  target: SearchTarget,
  page: number,
  ctx: RunContext,
): Promise<PageOutcome> {
  const html = await listing.fetchPage(target, page)
  if (html === null) {
    ctx.stats.listingFailures++
    return { kind: "stop", reason: "http-failure" }
  }
  ctx.stats.pagesFetched++

  const ids = extractEventIds(html)
  const newIds = ids.filter((id) => !ctx.seenIds.has(id))

  console.log(`   Page ${page}: ${ids.length} IDs (${newIds.length} new)`)

  if (newIds.length === 0) {
    return { kind: "stop", reason: "no-new-ids" }
  }

  for (const id of newIds) {
    ctx.seenIds.add(id)
  }
  ctx.stats.idsDiscovered += newIds.length
  return { kind: "continue", ids: newIds }
}

export async function processEventIds(
  ids: string[],
  target: SearchTarget,
  ctx: RunContext,
  deps: PipelineDeps,
): Promise<void> {
  const pause = deps.pause ?? sleep
  for (const id of ids) {
    const detail = await deps.details.fetchDetail(id)

    if (detail === null) {
      ctx.stats.detailFailures++
    } else {
      const result = toEventRecord(detail, target, ctx.window)
      if (result.accepted) {
        ctx.records.push(result.record)
        ctx.stats.accepted++
      } else if (result.reason === "date") {
        ctx.stats.rejectedByDate++
      } else {
        ctx.stats.rejectedByCity++
      }
    }

    await pause(deps.detailPauseMs)
  }
}

export async function crawlTarget(
  target: SearchTarget,
  ctx: RunContext,
  deps: PipelineDeps,
): Promise<void> {
  console.log(`📥 Searching "${target.keyword}" in ${target.city}...`)

  let page = 1
  while (true) {
    const outcome = await fetchListingPage(deps.listing, target, page, ctx)
    if (outcome.kind === "stop") {
      if (outcome.reason === "http-failure") {
        console.warn(
          `⚠️ Stopped ${target.city} / ${target.keyword} at page ${page} (listing unavailable)`,
        )
      }
      break
    }

    await processEventIds(outcome.ids, target, ctx, deps)
    page++
  }
}

export async function runPipeline(
  targets: SearchTarget[],
  deps: PipelineDeps,
  options: PipelineOptions,
): Promise<PipelineResult> {
  const window = createRunWindow(options.now ?? new Date(), options.lookaheadDays)
  const ctx = createRunContext(window)

  console.log(
    `   Window (UTC): ${window.start.toISOString()} to ${window.end.toISOString()}\n`,
  )

  for (const target of targets) {
    await crawlTarget(target, ctx, deps)
  }

  return {
    records: dedupeRecords(ctx.records),
    stats: ctx.stats,
  }
}
