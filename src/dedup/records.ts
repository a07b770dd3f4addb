import type { EventRecord } from "../types/event"

function recordKey(record: EventRecord): string {
  return `${record.title}\u0000${record.start}`
}

/**
 * Drops records whose (title, start) pair was already seen. First
 * occurrence wins and the survivors keep their relative order.
 */
export function dedupeRecords(records: EventRecord[]): EventRecord[] {
  const seen = new Set<string>()
  return records.filter((record) => {
    const key = recordKey(record)
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}
