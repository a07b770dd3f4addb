import { mkdirSync, writeFileSync } from "node:fs"
import path from "node:path"
import { CSV_FILENAME, MARKDOWN_FILENAME } from "../config"
import type { EventRecord } from "../types/event"
import { renderCsv } from "./csv"
import { renderMarkdown } from "./markdown"

export interface ExportPaths {
  csvPath: string
  markdownPath: string
}

export function writeExports(records: EventRecord[], outputDir: string): ExportPaths {
  mkdirSync(outputDir, { recursive: true })

  const csvPath = path.join(outputDir, CSV_FILENAME)
  const markdownPath = path.join(outputDir, MARKDOWN_FILENAME)

  writeFileSync(csvPath, renderCsv(records), "utf8")
  writeFileSync(markdownPath, renderMarkdown(records), "utf8")

  return { csvPath, markdownPath }
}
