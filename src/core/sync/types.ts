/**
 * Sync types for offline-first assessment records.
 * A record is owned by the calling application; the engine only reads the
 * identity and indexing fields declared here.
 */

/** Application payload of a record. Opaque to the sync engine. */
export type RecordFields = { [key: string]: unknown }

/**
 * Type of a queued mutation.
 * - create: record was created locally and has no server id yet
 * - update: record was modified locally
 * - delete: record was deleted locally
 */
export type QueueAction = "create" | "update" | "delete"

/**
 * Local record as stored in IndexedDB.
 */
export interface LocalRecord {
  /** Local-only id (prefixed) or server-confirmed id */
  id: string
  /** Record type, e.g. "checklist"; selects the remote collection */
  type: string
  /** Owning examiner, if any */
  ownerId: string | null
  /** Business status, if any (e.g. "in_progress", "completed") */
  status: string | null
  /** True once the server acknowledged the current version */
  synced: boolean
  /** Timestamp of last local mutation (ISO 8601) */
  updatedAt: string
  /** Reason of the last permanent rejection, if any */
  syncError: string | null
  /** Application payload */
  fields: RecordFields
}

/**
 * Caller input for a write. A missing or null id creates a new record.
 */
export interface RecordInput {
  id?: string | null
  type: string
  ownerId?: string | null
  status?: string | null
  fields: RecordFields
}

/**
 * Record as delivered by the remote service (used to hydrate the store).
 */
export interface ServerRecord {
  id: string
  type: string
  ownerId?: string | null
  status?: string | null
  updatedAt?: string
  fields: RecordFields
}

/**
 * Filter for listing records. All given criteria must match.
 */
export interface RecordFilter {
  type?: string
  ownerId?: string
  status?: string
  synced?: boolean
}

/**
 * Pending mutation in the sync queue.
 * Items are delivered in `sequence` order and retried on transient failure.
 */
export interface QueueItem {
  /** Monotonic position in the queue (auto-increment key) */
  sequence: number
  /** Record id at enqueue time */
  recordId: string
  recordType: string
  action: QueueAction
  /** Snapshot of the record at enqueue time */
  payload: LocalRecord
  /** Failed delivery attempts so far */
  retryCount: number
  /** Timestamp when the item was enqueued (ISO 8601) */
  enqueuedAt: string
  /** Earliest time of the next attempt (ISO 8601); null when due now */
  nextAttemptAt: string | null
  /** Last error message, if any */
  lastError: string | null
}

/** Queue item before the store assigns its sequence. */
export type NewQueueItem = Omit<QueueItem, "sequence">

/**
 * Queue item that became a Permanent-Failure, kept for manual inspection.
 */
export interface DeadLetter {
  /** Dead-letter key (auto-increment) */
  id: number
  item: QueueItem
  /** Denormalized for lookups by record */
  recordId: string
  reason: string
  /** HTTP status of the rejection, if any */
  status: number | null
  /** Timestamp when the item was moved here (ISO 8601) */
  failedAt: string
}

export type NewDeadLetter = Omit<DeadLetter, "id">

/**
 * Persisted identifier remap written during reconciliation.
 */
export interface IdRemap {
  fromId: string
  toId: string
  /** Timestamp of the reconciliation (ISO 8601) */
  remappedAt: string
}

/**
 * Outcome of one queue item within a drain pass.
 * - confirmed: server acknowledged, item removed
 * - retry: transient failure, item stays queued with backoff
 * - rejected: permanent failure, item moved to dead letters
 * - deferred: skipped because the record is blocked or not yet due
 */
export type ItemOutcome = "confirmed" | "retry" | "rejected" | "deferred"

/**
 * Result of a drain pass.
 */
export interface DrainResult {
  /** Items acknowledged by the server */
  confirmed: number
  /** Items left queued after a transient failure */
  retried: number
  /** Items moved to dead letters */
  rejected: number
  /** Items skipped (blocked record or backoff) */
  deferred: number
  /** Whether the pass stopped early (disconnect or stop) */
  aborted: boolean
}

/**
 * Storage usage summary.
 */
export interface StorageInfo {
  totalRecords: number
  unsyncedRecords: number
  queueItems: number
  deadLetters: number
  /** Null where the host has no storage estimate */
  storageUsed: StorageUsage | null
}

/** Origin storage as estimated by the host, in bytes */
export interface StorageUsage {
  used: number
  available: number
}

/**
 * Create an empty drain result.
 */
export function emptyDrainResult(): DrainResult {
  return { confirmed: 0, retried: 0, rejected: 0, deferred: 0, aborted: false }
}

/**
 * Convert a ServerRecord to a synced LocalRecord.
 * Used when hydrating the store from the server.
 */
export function serverToLocalRecord(record: ServerRecord, now: Date): LocalRecord {
  return {
    id: record.id,
    type: record.type,
    ownerId: record.ownerId ?? null,
    status: record.status ?? null,
    synced: true,
    updatedAt: record.updatedAt ?? now.toISOString(),
    syncError: null,
    fields: record.fields,
  }
}
