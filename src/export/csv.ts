import type { EventRecord } from "../types/event"

export const CSV_COLUMNS: ReadonlyArray<[header: string, field: keyof EventRecord]> = [
  ["Title", "title"],
  ["Organizer", "organizer"],
  ["Start (PT)", "start"],
  ["City", "city"],
  ["Venue", "venue"],
  ["Description", "description"],
  ["URL", "url"],
  ["Fee", "fee"],
]

export function escapeCsvField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`
}

export function renderCsv(records: EventRecord[]): string {
  const lines = [CSV_COLUMNS.map(([header]) => header).join(",")]
  for (const record of records) {
    lines.push(
      CSV_COLUMNS.map(([, field]) => escapeCsvField(record[field])).join(","),
    )
  }
  return `${lines.join("\n")}\n`
}
