/**
 * Dexie database for offline-first examiner records.
 *
 * This module provides IndexedDB storage via Dexie.js for:
 * - Local record storage with sync tracking
 * - The pending mutation queue
 * - Dead letters and identifier remaps
 */

import Dexie, { type DexieOptions, type EntityTable } from "dexie"
import type { DeadLetter, IdRemap, LocalRecord, QueueItem } from "@core/sync/types"

/**
 * Examiner sync database schema.
 *
 * Tables:
 * - records: Local records with sync tracking
 * - sync_queue: Pending mutations, drained in sequence order
 * - dead_letters: Mutations the server rejected for good
 * - id_remaps: Local id -> server id mappings from reconciliation
 */
export class ExaminerSyncDatabase extends Dexie {
  records!: EntityTable<LocalRecord, "id">
  sync_queue!: EntityTable<QueueItem, "sequence">
  dead_letters!: EntityTable<DeadLetter, "id">
  id_remaps!: EntityTable<IdRemap, "fromId">

  /**
   * @param name - IndexedDB database name
   * @param options - Dexie options; pass `indexedDB` and `IDBKeyRange` on hosts without a global IndexedDB
   */
  constructor(name: string, options?: DexieOptions) {
    super(name, options)

    this.version(1).stores({
      // Records table:
      // - id: primary key (local-only or server id)
      // - type, ownerId, status: secondary lookups for listings
      // - updatedAt: listing order
      records: "id, type, ownerId, status, updatedAt",

      // Sync queue table:
      // - sequence: auto-increment primary key, defines drain order
      // - recordId: for finding all items of one record
      sync_queue: "++sequence, recordId",

      // Dead letters table:
      // - id: auto-increment primary key
      // - recordId: for finding rejected items of one record
      dead_letters: "++id, recordId",

      // Identifier remaps:
      // - fromId: primary key (the retired local id)
      // - toId: for reverse lookups
      id_remaps: "fromId, toId",
    })
  }
}

// Re-export types for convenience
export type { DeadLetter, IdRemap, LocalRecord, QueueItem } from "@core/sync/types"
