import { afterEach, beforeEach, describe, expect, it } from "vitest"

import type { LocalRecord } from "@core/sync/types"

import { ExaminerSyncDatabase } from "../../db"
import { createDexieStorage, type SyncStorage } from "../index"

function createTestRecord(overrides: Partial<LocalRecord> = {}): LocalRecord {
  return {
    id: "local-1",
    type: "checklist",
    ownerId: "examiner-7",
    status: "in_progress",
    synced: false,
    updatedAt: "2024-03-01T09:00:00.000Z",
    syncError: null,
    fields: { result: "pass" },
    ...overrides,
  }
}

const NOW = new Date("2024-03-01T09:00:00.000Z")

describe("DexieSyncQueue", () => {
  let db: ExaminerSyncDatabase
  let storage: SyncStorage

  beforeEach(() => {
    db = new ExaminerSyncDatabase(`sync-queue-${crypto.randomUUID()}`)
    storage = createDexieStorage(db, () => NOW)
  })

  afterEach(async () => {
    await db.delete()
  })

  it("assigns increasing sequences and drains oldest first", async () => {
    const { queue } = storage
    const first = await queue.enqueue("local-1", "create", createTestRecord())
    const second = await queue.enqueue("local-2", "create", createTestRecord({ id: "local-2" }))
    const third = await queue.enqueue("local-1", "update", createTestRecord())

    expect(second.sequence).toBeGreaterThan(first.sequence)
    expect(third.sequence).toBeGreaterThan(second.sequence)

    const drained = await queue.drain()
    expect(drained.map((item) => item.sequence)).toEqual([
      first.sequence,
      second.sequence,
      third.sequence,
    ])
    expect(drained[0]).toEqual({
      sequence: first.sequence,
      recordId: "local-1",
      recordType: "checklist",
      action: "create",
      payload: createTestRecord(),
      retryCount: 0,
      enqueuedAt: "2024-03-01T09:00:00.000Z",
      nextAttemptAt: null,
      lastError: null,
    })
  })

  it("snapshots the payload at enqueue time", async () => {
    const record = createTestRecord()
    await storage.queue.enqueue(record.id, "create", record)
    record.fields.result = "fail"

    const [item] = await storage.queue.drain()
    expect(item.payload.fields.result).toBe("pass")
  })

  it("removes every item of one record", async () => {
    const { queue } = storage
    await queue.enqueue("local-1", "create", createTestRecord())
    await queue.enqueue("local-2", "create", createTestRecord({ id: "local-2" }))
    await queue.enqueue("local-1", "update", createTestRecord())

    const removed = await queue.remove("local-1")

    expect(removed.map((item) => item.action)).toEqual(["create", "update"])
    expect((await queue.drain()).map((item) => item.recordId)).toEqual(["local-2"])
    expect(await queue.count()).toBe(1)
  })

  it("lists the items of one record", async () => {
    const { queue } = storage
    await queue.enqueue("srv-1", "update", createTestRecord({ id: "srv-1" }))
    await queue.enqueue("srv-2", "update", createTestRecord({ id: "srv-2" }))
    await queue.enqueue("srv-1", "delete", createTestRecord({ id: "srv-1" }))

    const items = await queue.itemsFor("srv-1")
    expect(items.map((item) => item.action)).toEqual(["update", "delete"])
  })

  it("reads one item by sequence", async () => {
    const { queue } = storage
    const item = await queue.enqueue("srv-1", "update", createTestRecord({ id: "srv-1" }))

    expect(await queue.get(item.sequence)).toEqual(item)

    await queue.removeItem(item.sequence)
    expect(await queue.get(item.sequence)).toBeUndefined()
  })

  it("persists retry state", async () => {
    const { queue } = storage
    const item = await queue.enqueue("srv-1", "update", createTestRecord({ id: "srv-1" }))

    const updated = await queue.update({
      ...item,
      retryCount: 1,
      lastError: "Failed to update checklist srv-1: 500",
      nextAttemptAt: "2024-03-01T09:00:01.000Z",
    })

    expect(updated).toBe(true)
    const [stored] = await queue.drain()
    expect(stored.retryCount).toBe(1)
    expect(stored.lastError).toBe("Failed to update checklist srv-1: 500")
    expect(stored.nextAttemptAt).toBe("2024-03-01T09:00:01.000Z")
  })

  it("does not bring back an item removed meanwhile", async () => {
    const { queue } = storage
    const item = await queue.enqueue("srv-1", "update", createTestRecord({ id: "srv-1" }))
    await queue.removeItem(item.sequence)

    expect(await queue.update({ ...item, retryCount: 1 })).toBe(false)
    expect(await queue.count()).toBe(0)
  })

  it("clears the queue", async () => {
    await storage.queue.enqueue("local-1", "create", createTestRecord())
    await storage.queue.clear()

    expect(await storage.queue.count()).toBe(0)
  })

  describe("dead letters", () => {
    it("moves an item out of the queue", async () => {
      const { queue } = storage
      const item = await queue.enqueue("local-1", "create", createTestRecord())

      const letter = await queue.bury(item, "Failed to create checklist: 422", 422)

      expect(await queue.count()).toBe(0)
      expect(letter).toEqual({
        id: letter.id,
        item,
        recordId: "local-1",
        reason: "Failed to create checklist: 422",
        status: 422,
        failedAt: "2024-03-01T09:00:00.000Z",
      })
      expect(await queue.deadLetters()).toEqual([letter])
    })

    it("takes a dead letter back out", async () => {
      const { queue } = storage
      const item = await queue.enqueue("local-1", "create", createTestRecord())
      const letter = await queue.bury(item, "rejected", 400)

      expect(await queue.exhume(letter.id)).toEqual(letter)
      expect(await queue.exhume(letter.id)).toBeUndefined()
      expect(await queue.deadLetters()).toEqual([])
    })

    it("clears dead letters", async () => {
      const { queue } = storage
      const item = await queue.enqueue("local-1", "create", createTestRecord())
      await queue.bury(item, "rejected", 400)
      await queue.clearDeadLetters()

      expect(await queue.deadLetters()).toEqual([])
    })
  })
})

describe("SyncStorage.atomically", () => {
  let db: ExaminerSyncDatabase
  let storage: SyncStorage

  beforeEach(() => {
    db = new ExaminerSyncDatabase(`atomic-${crypto.randomUUID()}`)
    storage = createDexieStorage(db, () => NOW)
  })

  afterEach(async () => {
    await db.delete()
  })

  it("commits the record and its queue item together", async () => {
    const record = createTestRecord()
    await storage.atomically(async () => {
      await storage.store.put(record)
      await storage.queue.enqueue(record.id, "create", record)
    })

    expect(await storage.store.get(record.id)).toEqual(record)
    expect(await storage.queue.count()).toBe(1)
  })

  it("rolls back both when the unit fails", async () => {
    const record = createTestRecord()

    await expect(
      storage.atomically(async () => {
        await storage.store.put(record)
        await storage.queue.enqueue(record.id, "create", record)
        throw new Error("crash after enqueue")
      }),
    ).rejects.toThrow("crash after enqueue")

    expect(await storage.store.get(record.id)).toBeUndefined()
    expect(await storage.queue.count()).toBe(0)
  })
})
