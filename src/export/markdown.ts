import { truncate } from "../transform/normalize"
import type { EventRecord } from "../types/event"

const DESCRIPTION_PREVIEW_LENGTH = 200

function renderMarkdownBlock(record: EventRecord): string[] {
  return [
    `## ${record.title}`,
    "",
    `- **Organizer:** ${record.organizer}`,
    `- **Start (PT):** ${record.start}`,
    `- **City:** ${record.city}`,
    `- **Venue:** ${record.venue}`,
    `- **Fee:** ${record.fee}`,
    `- **URL:** ${record.url}`,
    `- **Description:** ${truncate(record.description, DESCRIPTION_PREVIEW_LENGTH)}`,
    "",
  ]
}

export function renderMarkdown(records: EventRecord[]): string {
  const lines = ["# LEAP Events in Southern California", ""]
  for (const record of records) {
    lines.push(...renderMarkdownBlock(record))
  }
  return lines.join("\n")
}
