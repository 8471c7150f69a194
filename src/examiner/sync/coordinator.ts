/**
 * SyncCoordinator - drains the sync queue against the remote service.
 *
 * Responsibilities:
 * - Deliver queue items one at a time, in sequence order
 * - Reconcile local ids with server ids after a create
 * - Keep a stuck record from blocking the records behind it
 * - Back off transient failures and dead-letter permanent ones
 *
 * Only one drain pass runs at a time; a trigger that arrives during a pass
 * joins it, unless the pass is aborting, in which case a new pass follows.
 * A pass stops at an item boundary when asked to abort.
 */

import { errorMessage, RecordConflictError, RemoteError } from "@core/errors"
import { createLogger } from "@core/logger"
import { nextAttemptTime } from "@core/sync/backoff"
import { classifyFailure, type FailurePolicy, resolveFailure } from "@core/sync/failures"
import { isLocalId, isValidServerId } from "@core/sync/identifiers"
import {
  isDue,
  markAsRejected,
  markAsSynced,
  recordFailure,
  retargetItem,
} from "@core/sync/operations"
import type { DrainResult, ItemOutcome, QueueItem } from "@core/sync/types"
import { emptyDrainResult } from "@core/sync/types"
import type { RemoteService } from "@core/transport/types"

import type { SyncStorage } from "../store"
import type { Clock } from "./clock"
import type { SyncTrigger } from "./connectivity"
import type { SyncEventEmitter } from "./events"

const log = createLogger("SyncCoordinator")

/**
 * Retry and identifier settings used by the coordinator.
 */
export interface CoordinatorConfig extends FailurePolicy {
  backoffBaseMs: number
  backoffMaxMs: number
  localIdPrefix: string
}

/** Result of a successful remote call */
type Delivery =
  | { kind: "created"; serverId: string }
  | { kind: "applied" }
  /** Delete of a record the server never saw; nothing to send */
  | { kind: "local-only" }

/**
 * Outcome of one attempt within a pass.
 * superseded: the item left the queue while in flight; its record is not blocked.
 */
type PassOutcome = ItemOutcome | "superseded"

/** Working state of one drain pass */
interface PassState {
  result: DrainResult
  /** Queue as last read, oldest first */
  snapshot: QueueItem[]
  cursor: number
  /** Sequences already taken from the snapshot */
  visited: Set<number>
  /** Records whose remaining items wait for a later pass */
  blocked: Set<string>
}

/**
 * Result of applying a create acknowledgment.
 * - relocated: the local record moved to the server id
 * - duplicate: the acknowledgment had already been applied
 * - discarded: the record was deleted locally while the create was in flight
 */
export type CreateAckOutcome = "relocated" | "duplicate" | "discarded"

export class SyncCoordinator {
  private current: Promise<DrainResult> | null = null
  private abortRequested: boolean = false

  constructor(
    private storage: SyncStorage,
    private remote: RemoteService,
    private clock: Clock,
    private events: SyncEventEmitter,
    private config: CoordinatorConfig,
  ) {}

  /**
   * Whether a drain pass is in progress.
   */
  isDraining(): boolean {
    return this.current !== null
  }

  /**
   * Ask the running pass to stop before its next item.
   * The item in flight completes normally.
   */
  abort(): void {
    if (this.current) {
      this.abortRequested = true
    }
  }

  /**
   * Run a drain pass, or join the one already running.
   *
   * Never rejects: failures are reported through the event emitter.
   *
   * @param trigger - What started the pass
   * @param canContinue - Checked before every item; false aborts the pass
   */
  drain(trigger: SyncTrigger, canContinue: () => boolean): Promise<DrainResult> {
    if (this.current && this.abortRequested) {
      // The running pass is winding down; start a fresh one once it has
      return this.current.then(() => this.drain(trigger, canContinue))
    }
    if (this.current) {
      return this.current
    }

    this.abortRequested = false
    this.current = this.runPass(trigger, canContinue).finally(() => {
      this.current = null
    })
    return this.current
  }

  private async runPass(trigger: SyncTrigger, canContinue: () => boolean): Promise<DrainResult> {
    const pass: PassState = {
      result: emptyDrainResult(),
      snapshot: [],
      cursor: 0,
      visited: new Set(),
      blocked: new Set(),
    }
    const { result } = pass

    try {
      const queued = await this.storage.queue.count()
      this.events.emit({ type: "sync-start", trigger, queued, at: this.nowIso() })

      for (;;) {
        if (this.abortRequested || !canContinue()) {
          result.aborted = true
          log.info("drain aborted")
          break
        }

        const item = await this.nextItem(pass)
        if (!item) break

        const outcome = await this.deliver(item)
        this.tally(result, outcome)

        if (outcome === "retry") {
          pass.blocked.add(item.recordId)
        }
      }
    } catch (error) {
      // Local storage failed mid-pass; unacknowledged items stay queued
      result.aborted = true
      log.error("drain failed", error)
      this.events.emit({ type: "sync-error", message: errorMessage(error), at: this.nowIso() })
    }

    this.events.emit({ type: "sync-end", result, at: this.nowIso() })
    return result
  }

  /**
   * Find the oldest deliverable item.
   *
   * Walks a snapshot of the queue and reads it again once the snapshot is
   * used up, picking up items queued during the pass. Each candidate is
   * re-read before delivery; items removed since the snapshot are skipped.
   * Items of blocked records and items still in backoff are counted as
   * deferred; an item in backoff blocks its record.
   */
  private async nextItem(pass: PassState): Promise<QueueItem | undefined> {
    for (let refreshed = false; ; refreshed = true) {
      const item = await this.nextFromSnapshot(pass)
      if (item || refreshed) return item

      pass.snapshot = await this.storage.queue.drain()
      pass.cursor = 0
    }
  }

  private async nextFromSnapshot(pass: PassState): Promise<QueueItem | undefined> {
    const now = this.clock.now()

    while (pass.cursor < pass.snapshot.length) {
      const { sequence } = pass.snapshot[pass.cursor]
      pass.cursor += 1
      if (pass.visited.has(sequence)) continue
      pass.visited.add(sequence)

      const item = await this.storage.queue.get(sequence)
      if (!item) continue

      if (pass.blocked.has(item.recordId) || !isDue(item, now)) {
        pass.blocked.add(item.recordId)
        pass.result.deferred += 1
        continue
      }

      return item
    }

    return undefined
  }

  private tally(result: DrainResult, outcome: PassOutcome): void {
    switch (outcome) {
      case "superseded":
        break
      case "confirmed":
        result.confirmed += 1
        break
      case "retry":
        result.retried += 1
        break
      case "rejected":
        result.rejected += 1
        break
      case "deferred":
        result.deferred += 1
        break
      default: {
        const _exhaustive: never = outcome
        throw new Error(`Unknown outcome: ${_exhaustive}`)
      }
    }
  }

  /**
   * Send one item and apply the result locally.
   */
  private async deliver(item: QueueItem): Promise<PassOutcome> {
    let delivery: Delivery
    try {
      delivery = await this.send(item)
    } catch (error) {
      return this.handleFailure(item, error)
    }

    if (delivery.kind === "created") {
      try {
        await this.applyCreateAck(item, delivery.serverId)
      } catch (error) {
        if (error instanceof RecordConflictError) {
          log.error(`id conflict reconciling ${item.recordId}`, error)
          this.events.emit({ type: "sync-error", message: error.message, at: this.nowIso() })
          await this.reject(item, error.message, null)
          return "rejected"
        }
        throw error
      }
      return "confirmed"
    }

    await this.confirm(item)
    return "confirmed"
  }

  /**
   * Call the remote operation for an item.
   *
   * Items addressed to a local id have never reached the server: creates and
   * updates both go out as a create, deletes need no call at all.
   */
  private async send(item: QueueItem): Promise<Delivery> {
    const { recordType, recordId, payload } = item

    if (isLocalId(recordId, this.config.localIdPrefix)) {
      if (item.action === "delete") {
        return { kind: "local-only" }
      }
      const ack = await this.remote.createRecord(recordType, payload, { idempotencyKey: recordId })
      return { kind: "created", serverId: ack.id }
    }

    switch (item.action) {
      case "create":
      case "update":
        await this.remote.updateRecord(recordType, recordId, payload)
        return { kind: "applied" }
      case "delete":
        await this.remote.deleteRecord(recordType, recordId)
        return { kind: "applied" }
      default: {
        const _exhaustive: never = item.action
        throw new Error(`Unknown action: ${_exhaustive}`)
      }
    }
  }

  private async handleFailure(item: QueueItem, error: unknown): Promise<PassOutcome> {
    const message = errorMessage(error)
    const status = error instanceof RemoteError ? error.status : null
    const kind = classifyFailure(error)
    const action =
      isLocalId(item.recordId, this.config.localIdPrefix) && item.action !== "delete"
        ? "create"
        : item.action
    const decision = resolveFailure(action, kind, item.retryCount, this.config)

    switch (decision) {
      case "confirmed":
        // Delete of a record the server no longer has
        await this.confirm(item)
        return "confirmed"

      case "retry": {
        const failed = recordFailure(
          item,
          message,
          nextAttemptTime(
            this.clock.now(),
            item.retryCount + 1,
            this.config.backoffBaseMs,
            this.config.backoffMaxMs,
          ),
        )
        if (!(await this.storage.queue.update(failed))) {
          log.debug(`${item.action} ${item.recordId} was removed locally while in flight`)
          return "superseded"
        }
        log.warn(`${item.action} ${item.recordId} failed, retry ${failed.retryCount}`, message)
        this.events.emit({
          type: "item-retry",
          recordId: item.recordId,
          sequence: item.sequence,
          retryCount: failed.retryCount,
          nextAttemptAt: failed.nextAttemptAt,
          message,
          at: this.nowIso(),
        })
        return "retry"
      }

      case "rejected":
        await this.reject(item, message, status)
        return "rejected"

      default: {
        const _exhaustive: never = decision
        throw new Error(`Unknown decision: ${_exhaustive}`)
      }
    }
  }

  /**
   * Remove an acknowledged item and mark its record synced when nothing else is queued for it.
   */
  private async confirm(item: QueueItem): Promise<void> {
    const { store, queue } = this.storage
    await this.storage.atomically(async () => {
      await queue.removeItem(item.sequence)
      const record = await store.get(item.recordId)
      if (!record) return

      const remaining = await queue.itemsFor(item.recordId)
      if (remaining.length === 0) {
        await store.put(markAsSynced(record))
      }
    })
  }

  /**
   * Move a permanently failed item to the dead letters and flag its record.
   * A rejected create takes the record's later items with it, since they
   * depend on the record existing on the server.
   */
  private async reject(item: QueueItem, reason: string, status: number | null): Promise<void> {
    const { store, queue } = this.storage
    const dependsOnCreate = isLocalId(item.recordId, this.config.localIdPrefix)

    await this.storage.atomically(async () => {
      const queuedItems = await queue.itemsFor(item.recordId)
      const items = dependsOnCreate
        ? queuedItems
        : queuedItems.filter((queued) => queued.sequence === item.sequence)
      for (const queued of items) {
        await queue.bury(queued, reason, status)
      }

      const record = await store.get(item.recordId)
      if (record) {
        await store.put(markAsRejected(record, reason))
      }
    })

    log.warn(`${item.action} ${item.recordId} rejected`, reason)
    this.events.emit({
      type: "item-rejected",
      recordId: item.recordId,
      sequence: item.sequence,
      action: item.action,
      reason,
      status,
      at: this.nowIso(),
    })
  }

  /**
   * Reconcile a local record with the id the server assigned to it.
   *
   * As one unit: move the record to the server id, drop the local id's queue
   * items, re-enqueue the ones that followed the create under the server id
   * (in their original order), and persist the remap. Applying the same
   * acknowledgment twice leaves a single record.
   *
   * @throws RecordConflictError if both ids hold a record, or the server id is in the local namespace
   */
  async applyCreateAck(item: QueueItem, serverId: string): Promise<CreateAckOutcome> {
    const localId = item.recordId
    if (!isValidServerId(serverId, this.config.localIdPrefix)) {
      throw new RecordConflictError(localId, serverId)
    }

    const { store, queue, remaps } = this.storage
    const now = this.clock.now()

    const outcome = await this.storage.atomically(async (): Promise<CreateAckOutcome> => {
      const local = await store.get(localId)
      const existing = await store.get(serverId)
      if (local && existing) {
        throw new RecordConflictError(localId, serverId)
      }

      const queued = await queue.remove(localId)
      // Later creates for the same local id are duplicate deliveries
      const later = queued.filter(
        (queuedItem) => queuedItem.sequence !== item.sequence && queuedItem.action !== "create",
      )
      for (const queuedItem of later) {
        await queue.append(retargetItem(queuedItem, serverId))
      }

      if (local) {
        const moved = await store.rekey(localId, serverId)
        await store.put(later.length === 0 ? markAsSynced(moved) : moved)
        await remaps.put({ fromId: localId, toId: serverId, remappedAt: now.toISOString() })
        return "relocated"
      }

      if (existing) {
        return "duplicate"
      }

      // Deleted locally while the create was in flight: remove the server copy too
      if (!later.some((queuedItem) => queuedItem.action === "delete")) {
        const removal: QueueItem = {
          ...item,
          action: "delete",
          retryCount: 0,
          nextAttemptAt: null,
          lastError: null,
        }
        await queue.append(retargetItem(removal, serverId))
      }
      return "discarded"
    })

    if (outcome === "relocated") {
      log.info(`relocated ${localId} -> ${serverId}`)
      this.events.emit({
        type: "record-relocated",
        fromId: localId,
        toId: serverId,
        at: now.toISOString(),
      })
    }

    return outcome
  }

  private nowIso(): string {
    return this.clock.now().toISOString()
  }
}
