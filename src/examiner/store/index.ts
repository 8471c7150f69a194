/**
 * Storage bundle used by the sync engine.
 *
 * The engine writes a record and its queue item through `atomically`, so a
 * crash can never leave one without the other.
 */

import type { ExaminerSyncDatabase } from "../db"
import { DexieLocalStore, type LocalStore } from "./localStore"
import { DexieIdRemapStore, type IdRemapStore } from "./remaps"
import { DexieSyncQueue, type SyncQueue } from "./syncQueue"

export interface SyncStorage {
  store: LocalStore
  queue: SyncQueue
  remaps: IdRemapStore
  /** Run `work` as one unit: all of its writes commit or none do */
  atomically<T>(work: () => Promise<T>): Promise<T>
}

/**
 * Storage bundle over one Dexie database.
 *
 * @param now - Clock used for queue timestamps
 */
export function createDexieStorage(
  db: ExaminerSyncDatabase,
  now: () => Date = () => new Date(),
): SyncStorage {
  return {
    store: new DexieLocalStore(db),
    queue: new DexieSyncQueue(db, now),
    remaps: new DexieIdRemapStore(db),
    atomically: (work) =>
      db.transaction("rw", [db.records, db.sync_queue, db.dead_letters, db.id_remaps], work),
  }
}

export type { LocalStore } from "./localStore"
export { DexieLocalStore, guardStorage } from "./localStore"
export type { IdRemapStore } from "./remaps"
export { DexieIdRemapStore } from "./remaps"
export type { SyncQueue } from "./syncQueue"
export { DexieSyncQueue } from "./syncQueue"
