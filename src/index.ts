import "dotenv/config"
import { buildSearchTargets, loadConfig } from "./config"
import { writeExports } from "./export/writer"
import { DetailFetcher } from "./fetchers/details"
import { ListingFetcher } from "./fetchers/listing"
import { logError, logStats } from "./log"
import { runPipeline } from "./pipeline"

async function main() {
  console.log("🎉 SoCal Event Export Starting...\n")

  try {
    const config = loadConfig()
    const targets = buildSearchTargets()

    console.log(`🔎 ${targets.length} searches (next ${config.lookaheadDays} days)`)

    const { records, stats } = await runPipeline(
      targets,
      {
        listing: new ListingFetcher(config.listingBaseUrl),
        details: new DetailFetcher(config.apiBaseUrl, config.apiToken),
        detailPauseMs: config.detailPauseMs,
      },
      { lookaheadDays: config.lookaheadDays },
    )

    console.log("\n💾 Writing exports...")
    const { csvPath, markdownPath } = writeExports(records, config.outputDir)
    console.log(`   ${csvPath}`)
    console.log(`   ${markdownPath}\n`)

    logStats(stats, records.length)
    console.log(`\n✅ Exported ${records.length} events`)
  } catch (error) {
    logError("❌ Error:", error)
    process.exit(1)
  }
}

void main()
