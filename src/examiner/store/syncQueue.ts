/**
 * Sync Queue.
 *
 * Ordered, persistent log of pending mutations, kept apart from the records
 * themselves so the intent to sync survives a restart mid-drain. Items that
 * fail for good move to the dead-letter table.
 */

import { createQueueItem, sortBySequence } from "@core/sync/operations"
import type {
  DeadLetter,
  LocalRecord,
  NewQueueItem,
  QueueAction,
  QueueItem,
} from "@core/sync/types"

import type { ExaminerSyncDatabase } from "../db"
import { guardStorage } from "./localStore"

export interface SyncQueue {
  /** Append a mutation at the tail; the payload is snapshotted */
  enqueue(recordId: string, action: QueueAction, payload: LocalRecord): Promise<QueueItem>
  /** Append a prepared item (keeps its retry state), assigning a new sequence */
  append(item: NewQueueItem): Promise<QueueItem>
  /** All items, oldest first */
  drain(): Promise<QueueItem[]>
  /** A single item by sequence; undefined once it has left the queue */
  get(sequence: number): Promise<QueueItem | undefined>
  /** Items of one record, oldest first */
  itemsFor(recordId: string): Promise<QueueItem[]>
  /** Remove every item referencing a record id; returns them oldest first */
  remove(recordId: string): Promise<QueueItem[]>
  removeItem(sequence: number): Promise<void>
  /** Persist retry state of an item; false if it is no longer queued */
  update(item: QueueItem): Promise<boolean>
  count(): Promise<number>
  /** Administrative reset */
  clear(): Promise<void>

  /** Move an item to the dead-letter table */
  bury(item: QueueItem, reason: string, status: number | null): Promise<DeadLetter>
  deadLetters(): Promise<DeadLetter[]>
  /** Take a dead letter out of the table */
  exhume(id: number): Promise<DeadLetter | undefined>
  clearDeadLetters(): Promise<void>
}

/**
 * SyncQueue backed by the Dexie `sync_queue` and `dead_letters` tables.
 */
export class DexieSyncQueue implements SyncQueue {
  constructor(
    private db: ExaminerSyncDatabase,
    private now: () => Date = () => new Date(),
  ) {}

  async enqueue(recordId: string, action: QueueAction, payload: LocalRecord): Promise<QueueItem> {
    const item = createQueueItem(action, payload, this.now())
    return this.append({ ...item, recordId })
  }

  async append(item: NewQueueItem): Promise<QueueItem> {
    return guardStorage(`enqueue ${item.action} for ${item.recordId}`, async () => {
      const sequence = await this.db.sync_queue.add(item)
      return { ...item, sequence }
    })
  }

  async drain(): Promise<QueueItem[]> {
    return guardStorage("read sync queue", async () =>
      sortBySequence(await this.db.sync_queue.toArray()),
    )
  }

  async get(sequence: number): Promise<QueueItem | undefined> {
    return guardStorage(`read queue item ${sequence}`, () => this.db.sync_queue.get(sequence))
  }

  async itemsFor(recordId: string): Promise<QueueItem[]> {
    return guardStorage(`read queue items for ${recordId}`, async () =>
      sortBySequence(await this.db.sync_queue.where("recordId").equals(recordId).toArray()),
    )
  }

  async remove(recordId: string): Promise<QueueItem[]> {
    return guardStorage(`remove queue items for ${recordId}`, () =>
      this.db.transaction("rw", this.db.sync_queue, async () => {
        const items = await this.itemsFor(recordId)
        await this.db.sync_queue.where("recordId").equals(recordId).delete()
        return items
      }),
    )
  }

  async removeItem(sequence: number): Promise<void> {
    await guardStorage(`remove queue item ${sequence}`, () => this.db.sync_queue.delete(sequence))
  }

  async update(item: QueueItem): Promise<boolean> {
    return guardStorage(`update queue item ${item.sequence}`, async () => {
      const updated = await this.db.sync_queue.update(item.sequence, {
        retryCount: item.retryCount,
        nextAttemptAt: item.nextAttemptAt,
        lastError: item.lastError,
      })
      return updated > 0
    })
  }

  async count(): Promise<number> {
    return guardStorage("count sync queue", () => this.db.sync_queue.count())
  }

  async clear(): Promise<void> {
    await guardStorage("clear sync queue", () => this.db.sync_queue.clear())
  }

  async bury(item: QueueItem, reason: string, status: number | null): Promise<DeadLetter> {
    return guardStorage(`dead-letter queue item ${item.sequence}`, () =>
      this.db.transaction("rw", this.db.sync_queue, this.db.dead_letters, async () => {
        const letter = {
          item,
          recordId: item.recordId,
          reason,
          status,
          failedAt: this.now().toISOString(),
        }
        await this.db.sync_queue.delete(item.sequence)
        const id = await this.db.dead_letters.add(letter)
        return { ...letter, id }
      }),
    )
  }

  async deadLetters(): Promise<DeadLetter[]> {
    return guardStorage("read dead letters", () => this.db.dead_letters.toArray())
  }

  async exhume(id: number): Promise<DeadLetter | undefined> {
    return guardStorage(`take dead letter ${id}`, () =>
      this.db.transaction("rw", this.db.dead_letters, async () => {
        const letter = await this.db.dead_letters.get(id)
        if (letter) {
          await this.db.dead_letters.delete(id)
        }
        return letter
      }),
    )
  }

  async clearDeadLetters(): Promise<void> {
    await guardStorage("clear dead letters", () => this.db.dead_letters.clear())
  }
}
