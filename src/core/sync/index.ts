/**
 * Core sync module - types and pure functions for offline-first sync.
 * This is the Functional Core of the sync layer.
 */

export { calculateRetryDelay, nextAttemptTime } from "./backoff"
export type { FailureKind, FailurePolicy } from "./failures"
export { classifyFailure, resolveFailure } from "./failures"
export { matchesFilter, sortByUpdatedAtDesc } from "./filters"
export { createLocalId, DEFAULT_LOCAL_ID_PREFIX, isLocalId, isValidServerId } from "./identifiers"
export {
  buildLocalRecord,
  createQueueItem,
  isDue,
  markAsRejected,
  markAsSynced,
  recordFailure,
  retargetItem,
  snapshotRecord,
  sortBySequence,
} from "./operations"
export type {
  DeadLetter,
  DrainResult,
  IdRemap,
  ItemOutcome,
  LocalRecord,
  NewDeadLetter,
  NewQueueItem,
  QueueAction,
  QueueItem,
  RecordFields,
  RecordFilter,
  RecordInput,
  ServerRecord,
  StorageInfo,
  StorageUsage,
} from "./types"
export { emptyDrainResult, serverToLocalRecord } from "./types"
export { parseRecordInput, parseServerRecord, RecordInputSchema, ServerRecordSchema } from "./validation"
