/**
 * Record filtering and ordering for listings.
 */

import type { LocalRecord, RecordFilter } from "./types"

/**
 * Check a record against every criterion of a filter.
 */
export function matchesFilter(record: LocalRecord, filter: RecordFilter): boolean {
  if (filter.type !== undefined && record.type !== filter.type) return false
  if (filter.ownerId !== undefined && record.ownerId !== filter.ownerId) return false
  if (filter.status !== undefined && record.status !== filter.status) return false
  if (filter.synced !== undefined && record.synced !== filter.synced) return false
  return true
}

/**
 * Sort records by last local mutation, newest first.
 * Ties are broken by id so the order is stable across reads.
 */
export function sortByUpdatedAtDesc(records: LocalRecord[]): LocalRecord[] {
  return [...records].sort((a, b) => {
    const diff = new Date(b.updatedAt).getTime() - new Date(a.updatedAt).getTime()
    if (diff !== 0) return diff
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
  })
}
