/**
 * OfflineSyncEngine - caller-facing surface of the offline sync layer.
 *
 * Responsibilities:
 * - Write records locally and queue their mutation in the same transaction
 * - Resolve retired local ids through the persisted remaps
 * - Schedule drains through the Connectivity Monitor
 * - Publish status and sync events; background errors never reach callers
 *
 * This is the Imperative Shell around the coordinator, using pure functions
 * from @core/sync for logic.
 *
 * Usage:
 * ```typescript
 * const engine = createOfflineSyncEngine(loadSyncConfig({ baseUrl: "https://records.example.test" }))
 * engine.start()
 * const record = await engine.write({ type: "checklist", fields: { result: "pass" } })
 * ```
 */

import { type SyncConfig, loadSyncConfig } from "@core/config"
import { RecordNotFoundError, ValidationError } from "@core/errors"
import { createLogger, setLogLevel } from "@core/logger"
import { createLocalId, isLocalId, isValidServerId } from "@core/sync/identifiers"
import { buildLocalRecord, createQueueItem } from "@core/sync/operations"
import type {
  DeadLetter,
  DrainResult,
  LocalRecord,
  QueueAction,
  QueueItem,
  RecordFilter,
  RecordInput,
  ServerRecord,
  StorageInfo,
  StorageUsage,
} from "@core/sync/types"
import { emptyDrainResult, serverToLocalRecord } from "@core/sync/types"
import { parseRecordInput, parseServerRecord } from "@core/sync/validation"
import type { RemoteService } from "@core/transport/types"
import { createWebRemote } from "@core/transport/web"

import { ExaminerSyncDatabase } from "../db"
import { createDexieStorage, type SyncStorage } from "../store"
import { type Clock, systemClock } from "./clock"
import {
  type ConnectivitySource,
  ConnectivityMonitor,
  createBrowserConnectivitySource,
  type SyncTrigger,
} from "./connectivity"
import { SyncCoordinator } from "./coordinator"
import { type SyncEvent, SyncEventEmitter, type SyncEventListener, type SyncStatus } from "./events"

const log = createLogger("OfflineSyncEngine")

/**
 * Dependencies of the engine. Everything with I/O is injected.
 */
export interface OfflineSyncEngineOptions {
  db: ExaminerSyncDatabase
  remote: RemoteService
  connectivity: ConnectivitySource
  /** Defaults to the system clock */
  clock?: Clock
  /** Defaults to `loadSyncConfig()` */
  config?: SyncConfig
  /** Storage over `db`; replaced in tests that need to fail storage calls */
  storage?: SyncStorage
}

export class OfflineSyncEngine {
  private db: ExaminerSyncDatabase
  private connectivity: ConnectivitySource
  private clock: Clock
  private config: SyncConfig
  private storage: SyncStorage
  private events: SyncEventEmitter = new SyncEventEmitter()
  private coordinator: SyncCoordinator
  private monitor: ConnectivityMonitor
  private lastError: string | null = null
  private lastSyncAt: string | null = null
  private syncing: boolean = false
  private passFailed: boolean = false

  constructor(options: OfflineSyncEngineOptions) {
    this.db = options.db
    this.connectivity = options.connectivity
    this.clock = options.clock ?? systemClock
    this.config = options.config ?? loadSyncConfig()
    this.storage = options.storage ?? createDexieStorage(this.db, () => this.clock.now())

    setLogLevel(this.config.logLevel)

    this.coordinator = new SyncCoordinator(
      this.storage,
      options.remote,
      this.clock,
      this.events,
      this.config,
    )

    this.monitor = new ConnectivityMonitor(
      this.connectivity,
      this.clock,
      this.config.syncIntervalMs,
      {
        onSyncDue: (trigger) => {
          this.requestSync(trigger).catch((error) => log.error(`${trigger} sync failed`, error))
        },
        onDisconnect: () => this.coordinator.abort(),
        onChange: (connected) =>
          this.events.emit({ type: "connectivity", connected, at: this.nowIso() }),
      },
    )

    // Registered first so status is current when caller listeners run
    this.events.subscribe((event) => this.trackStatus(event))
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Start listening for connectivity changes and the periodic drain.
   * Drains immediately when connected.
   */
  start(): void {
    this.monitor.start()
  }

  /**
   * Stop scheduling drains. A running drain stops at the next item boundary.
   */
  stop(): void {
    this.monitor.stop()
    this.coordinator.abort()
  }

  /**
   * Stop, drop all listeners and close the database.
   */
  dispose(): void {
    this.stop()
    this.events.clear()
    this.db.close()
  }

  // ============================================================================
  // Records
  // ============================================================================

  /**
   * Write a record locally and queue it for sync.
   *
   * A missing or null `id` creates a record under a new local-only id.
   * Durable on return; the remote side follows on the next drain.
   *
   * @throws ValidationError if the input is malformed
   * @throws RecordNotFoundError if `id` names no record
   * @throws StorageError if the local write fails
   */
  async write(input: RecordInput): Promise<LocalRecord> {
    const parsed = parseRecordInput(input)
    const now = this.clock.now()
    const { store, queue, remaps } = this.storage
    const prefix = this.config.localIdPrefix

    const record = await this.storage.atomically(async () => {
      if (parsed.id === undefined || parsed.id === null) {
        const created = buildLocalRecord(parsed, createLocalId(prefix), now)
        await store.put(created)
        await queue.enqueue(created.id, "create", created)
        return created
      }

      const id = await remaps.resolve(parsed.id)
      const existing = await store.get(id)
      if (!existing) {
        throw new RecordNotFoundError(parsed.id)
      }

      const updated = buildLocalRecord(parsed, id, now, existing)
      const queued = await queue.itemsFor(id)
      // A local record whose create was dead-lettered needs a fresh create
      const action: QueueAction =
        isLocalId(id, prefix) && !queued.some((item) => item.action === "create")
          ? "create"
          : "update"

      await store.put(updated)
      await queue.enqueue(id, action, updated)
      return updated
    })

    log.debug(`wrote ${record.id}`)
    return record
  }

  /**
   * Read a record by id. Retired local ids resolve to the record's server id.
   */
  async read(id: string): Promise<LocalRecord | undefined> {
    const current = await this.storage.remaps.resolve(id)
    return this.storage.store.get(current)
  }

  /**
   * List records matching a filter, newest first.
   */
  async list(filter: RecordFilter = {}): Promise<LocalRecord[]> {
    return this.storage.store.query(filter)
  }

  /**
   * Delete a record.
   *
   * A record the server never saw is removed with its queue items and no
   * remote call. A server record is removed locally and a `delete` is queued.
   *
   * @returns false if no such record exists
   */
  async delete(id: string): Promise<boolean> {
    const { store, queue, remaps } = this.storage
    const prefix = this.config.localIdPrefix

    return this.storage.atomically(async () => {
      const current = await remaps.resolve(id)
      const record = await store.get(current)
      if (!record) return false

      // Pending creates and updates are superseded by the delete
      await queue.remove(current)
      await store.delete(current)
      if (!isLocalId(current, prefix)) {
        await queue.enqueue(current, "delete", record)
      }
      return true
    })
  }

  /**
   * Store records fetched from the server as synced, without queueing anything.
   * Records with unsynced local changes are left alone.
   *
   * @returns Number of records stored
   * @throws ValidationError if a record is malformed or carries a local-only id
   */
  async hydrate(records: ServerRecord[]): Promise<number> {
    const parsed = records.map((record) => parseServerRecord(record))
    const prefix = this.config.localIdPrefix
    for (const record of parsed) {
      if (!isValidServerId(record.id, prefix)) {
        throw new ValidationError(`Server record id ${record.id} is in the local id namespace`)
      }
    }

    const now = this.clock.now()
    const { store, queue } = this.storage

    return this.storage.atomically(async () => {
      let stored = 0
      for (const record of parsed) {
        const local = await store.get(record.id)
        if (local && !local.synced) continue
        if ((await queue.itemsFor(record.id)).length > 0) continue

        await store.put(serverToLocalRecord(record, now))
        stored += 1
      }
      return stored
    })
  }

  /**
   * Current id of a record, following remaps from retired local ids.
   */
  async resolveId(id: string): Promise<string> {
    return this.storage.remaps.resolve(id)
  }

  // ============================================================================
  // Sync
  // ============================================================================

  /**
   * Number of queued mutations not yet acknowledged.
   */
  async pendingCount(): Promise<number> {
    return this.storage.queue.count()
  }

  /**
   * Drain the queue now. Joins a drain that is already running.
   * Resolves with an empty result while offline.
   */
  async forceSync(): Promise<DrainResult> {
    return this.requestSync("manual")
  }

  private async requestSync(trigger: SyncTrigger): Promise<DrainResult> {
    if (!this.connectivity.isConnected()) {
      log.debug(`${trigger} sync skipped while offline`)
      return emptyDrainResult()
    }
    return this.coordinator.drain(trigger, () => this.connectivity.isConnected())
  }

  isOnline(): boolean {
    return this.connectivity.isConnected()
  }

  isSyncing(): boolean {
    return this.syncing
  }

  /** Last background error, cleared by a clean drain */
  getLastError(): string | null {
    return this.lastError
  }

  /** Timestamp of the last completed drain (ISO 8601) */
  getLastSyncAt(): string | null {
    return this.lastSyncAt
  }

  async getStatus(): Promise<SyncStatus> {
    return {
      isOnline: this.isOnline(),
      isSyncing: this.isSyncing(),
      pendingCount: await this.pendingCount(),
      lastError: this.lastError,
      lastSyncAt: this.lastSyncAt,
    }
  }

  /** Subscribe to sync events. Returns unsubscribe function. */
  subscribe(listener: SyncEventListener): () => void {
    return this.events.subscribe(listener)
  }

  private trackStatus(event: SyncEvent): void {
    switch (event.type) {
      case "sync-start":
        this.syncing = true
        this.passFailed = false
        break
      case "item-retry":
      case "sync-error":
        this.passFailed = true
        this.lastError = event.message
        break
      case "item-rejected":
        this.passFailed = true
        this.lastError = event.reason
        break
      case "sync-end":
        this.syncing = false
        this.lastSyncAt = event.at
        if (!this.passFailed && event.result.deferred === 0) {
          this.lastError = null
        }
        break
      case "record-relocated":
      case "connectivity":
        break
      default: {
        const _exhaustive: never = event
        throw new Error(`Unknown event: ${JSON.stringify(_exhaustive)}`)
      }
    }
  }

  // ============================================================================
  // Dead letters
  // ============================================================================

  async deadLetters(): Promise<DeadLetter[]> {
    return this.storage.queue.deadLetters()
  }

  /**
   * Put a dead letter back on the queue with a fresh retry budget.
   * Create and update letters carry the record's current state.
   *
   * @returns The queued item, or undefined if no such dead letter exists
   */
  async retryDeadLetter(id: number): Promise<QueueItem | undefined> {
    const { store, queue, remaps } = this.storage
    const now = this.clock.now()

    return this.storage.atomically(async () => {
      const letter = await queue.exhume(id)
      if (!letter) return undefined

      const recordId = await remaps.resolve(letter.item.recordId)
      const record = await store.get(recordId)
      const { action } = letter.item

      if (action !== "delete" && !record) {
        log.warn(`record ${recordId} is gone, dropping dead letter ${id}`)
        return undefined
      }

      let payload: LocalRecord = { ...letter.item.payload, id: recordId }
      if (record && action !== "delete") {
        payload = { ...record, synced: false, syncError: null }
        await store.put(payload)
      }

      const retried: QueueAction =
        action === "create" && !isLocalId(recordId, this.config.localIdPrefix) ? "update" : action
      return queue.append(createQueueItem(retried, payload, now))
    })
  }

  /**
   * Drop a dead letter for good. Clears the record's sync error once none remain.
   *
   * @returns false if no such dead letter exists
   */
  async discardDeadLetter(id: number): Promise<boolean> {
    const { store, queue } = this.storage

    return this.storage.atomically(async () => {
      const letter = await queue.exhume(id)
      if (!letter) return false

      const remaining = (await queue.deadLetters()).filter(
        (other) => other.recordId === letter.recordId,
      )
      const record = await store.get(letter.recordId)
      if (record && remaining.length === 0) {
        await store.put({ ...record, syncError: null })
      }
      return true
    })
  }

  /**
   * Counts of records, unsynced records, queue items and dead letters,
   * plus the host's storage estimate.
   */
  async storageInfo(): Promise<StorageInfo> {
    const { store, queue } = this.storage
    const [totalRecords, unsyncedRecords, queueItems, deadLetters, storageUsed] =
      await Promise.all([
        store.count(),
        store.count({ synced: false }),
        queue.count(),
        queue.deadLetters(),
        estimateStorageUsage(),
      ])
    return {
      totalRecords,
      unsyncedRecords,
      queueItems,
      deadLetters: deadLetters.length,
      storageUsed,
    }
  }

  private nowIso(): string {
    return this.clock.now().toISOString()
  }
}

/**
 * Bytes used and available to this origin, from `navigator.storage.estimate()`.
 */
async function estimateStorageUsage(): Promise<StorageUsage | null> {
  const storage = typeof navigator === "undefined" ? undefined : navigator.storage
  if (!storage || typeof storage.estimate !== "function") return null

  try {
    const { usage, quota } = await storage.estimate()
    return { used: usage ?? 0, available: quota ?? 0 }
  } catch (error) {
    log.warn("storage estimate failed", error)
    return null
  }
}

/**
 * Optional collaborators for createOfflineSyncEngine.
 */
export interface EngineOverrides {
  remote?: RemoteService
  connectivity?: ConnectivitySource
  clock?: Clock
}

/**
 * Build an engine over IndexedDB, the web transport and browser connectivity events.
 */
export function createOfflineSyncEngine(
  config: SyncConfig,
  overrides: EngineOverrides = {},
): OfflineSyncEngine {
  const remote =
    overrides.remote ??
    createWebRemote({
      baseUrl: config.baseUrl,
      collections: config.collections,
      timeoutMs: config.requestTimeoutMs,
    })

  return new OfflineSyncEngine({
    db: new ExaminerSyncDatabase(config.databaseName),
    remote,
    connectivity: overrides.connectivity ?? createBrowserConnectivitySource(),
    clock: overrides.clock,
    config,
  })
}
