/**
 * Durable Local Store.
 *
 * Persists records across restarts and serves point lookups and filtered
 * listings. Every call resolves only after IndexedDB committed it.
 */

import { RecordConflictError, RecordNotFoundError, StorageError } from "@core/errors"
import { matchesFilter, sortByUpdatedAtDesc } from "@core/sync/filters"
import type { LocalRecord, RecordFilter } from "@core/sync/types"

import type { ExaminerSyncDatabase } from "../db"

/**
 * Storage interface for records.
 * Abstracted so the engine can target other persistence backends.
 */
export interface LocalStore {
  /** Upsert by id; overwrites any prior version */
  put(record: LocalRecord): Promise<void>
  get(id: string): Promise<LocalRecord | undefined>
  /** Matching records, newest `updatedAt` first */
  query(filter?: RecordFilter): Promise<LocalRecord[]>
  count(filter?: RecordFilter): Promise<number>
  delete(id: string): Promise<void>
  /**
   * Atomically move a record to a new id.
   * @throws RecordNotFoundError if `oldId` does not exist
   * @throws RecordConflictError if `newId` already exists
   */
  rekey(oldId: string, newId: string): Promise<LocalRecord>
}

/**
 * Run a storage call, wrapping low-level failures in StorageError.
 * Domain errors pass through unchanged.
 */
export async function guardStorage<T>(what: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation()
  } catch (error) {
    if (error instanceof RecordNotFoundError || error instanceof RecordConflictError) {
      throw error
    }
    if (error instanceof StorageError) {
      throw error
    }
    throw new StorageError(`Failed to ${what}`, error)
  }
}

/**
 * LocalStore backed by the Dexie `records` table.
 */
export class DexieLocalStore implements LocalStore {
  constructor(private db: ExaminerSyncDatabase) {}

  async put(record: LocalRecord): Promise<void> {
    await guardStorage(`store record ${record.id}`, () => this.db.records.put(record))
  }

  async get(id: string): Promise<LocalRecord | undefined> {
    return guardStorage(`read record ${id}`, () => this.db.records.get(id))
  }

  async query(filter: RecordFilter = {}): Promise<LocalRecord[]> {
    return guardStorage("query records", async () => {
      const rows = await this.select(filter).toArray()
      return sortByUpdatedAtDesc(rows.filter((record) => matchesFilter(record, filter)))
    })
  }

  async count(filter: RecordFilter = {}): Promise<number> {
    return guardStorage("count records", () =>
      this.select(filter)
        .filter((record) => matchesFilter(record, filter))
        .count(),
    )
  }

  async delete(id: string): Promise<void> {
    await guardStorage(`delete record ${id}`, () => this.db.records.delete(id))
  }

  async rekey(oldId: string, newId: string): Promise<LocalRecord> {
    return guardStorage(`move record ${oldId} to ${newId}`, () =>
      this.db.transaction("rw", this.db.records, async () => {
        const existing = await this.db.records.get(oldId)
        if (!existing) {
          throw new RecordNotFoundError(oldId)
        }
        if (await this.db.records.get(newId)) {
          throw new RecordConflictError(oldId, newId)
        }

        const moved: LocalRecord = { ...existing, id: newId }
        await this.db.records.delete(oldId)
        await this.db.records.add(moved)
        return moved
      }),
    )
  }

  /**
   * Pick the narrowest index for a filter; remaining criteria are applied by matchesFilter.
   */
  private select(filter: RecordFilter) {
    if (filter.ownerId !== undefined) {
      return this.db.records.where("ownerId").equals(filter.ownerId)
    }
    if (filter.status !== undefined) {
      return this.db.records.where("status").equals(filter.status)
    }
    if (filter.type !== undefined) {
      return this.db.records.where("type").equals(filter.type)
    }
    return this.db.records.toCollection()
  }
}
