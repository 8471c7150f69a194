/**
 * Pure sync operations.
 * These functions build records and queue items and manage retry state.
 */

import type {
  LocalRecord,
  NewQueueItem,
  QueueAction,
  QueueItem,
  RecordInput,
} from "./types"

/**
 * Deep copy of a record, so a queued payload never aliases live state.
 */
export function snapshotRecord(record: LocalRecord): LocalRecord {
  return structuredClone(record)
}

/**
 * Build the record written for a caller input.
 * Index fields absent from the input keep their previous value.
 */
export function buildLocalRecord(
  input: RecordInput,
  id: string,
  now: Date,
  existing?: LocalRecord,
): LocalRecord {
  return {
    id,
    type: input.type,
    ownerId: input.ownerId !== undefined ? input.ownerId : (existing?.ownerId ?? null),
    status: input.status !== undefined ? input.status : (existing?.status ?? null),
    synced: false,
    updatedAt: now.toISOString(),
    syncError: null,
    fields: input.fields,
  }
}

/**
 * Create a new queue item for a record.
 * Initializes with retry_count of 0 and no scheduled retry.
 */
export function createQueueItem(
  action: QueueAction,
  record: LocalRecord,
  now: Date,
): NewQueueItem {
  return {
    recordId: record.id,
    recordType: record.type,
    action,
    payload: snapshotRecord(record),
    retryCount: 0,
    enqueuedAt: now.toISOString(),
    nextAttemptAt: null,
    lastError: null,
  }
}

/**
 * Record a failed delivery attempt.
 * Returns a new item with retry_count + 1, the error and the next attempt time.
 */
export function recordFailure(item: QueueItem, error: string, nextAttemptAt: Date): QueueItem {
  return {
    ...item,
    retryCount: item.retryCount + 1,
    lastError: error,
    nextAttemptAt: nextAttemptAt.toISOString(),
  }
}

/**
 * Check whether an item's backoff has elapsed.
 */
export function isDue(item: QueueItem, now: Date): boolean {
  if (item.nextAttemptAt === null) return true
  return new Date(item.nextAttemptAt).getTime() <= now.getTime()
}

/**
 * Sort queue items by sequence (oldest first).
 */
export function sortBySequence<T extends { sequence: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => a.sequence - b.sequence)
}

/**
 * Point a queued item at a record's new id.
 * The payload snapshot is rewritten too, so the remote call addresses the new id.
 */
export function retargetItem(item: QueueItem, newId: string): NewQueueItem {
  const { sequence: _sequence, ...rest } = item
  return {
    ...rest,
    recordId: newId,
    payload: { ...rest.payload, id: newId },
  }
}

/**
 * Mark a local record as synced.
 */
export function markAsSynced(record: LocalRecord): LocalRecord {
  return {
    ...record,
    synced: true,
    syncError: null,
  }
}

/**
 * Mark a local record as rejected by the server.
 */
export function markAsRejected(record: LocalRecord, reason: string): LocalRecord {
  return {
    ...record,
    synced: false,
    syncError: reason,
  }
}
