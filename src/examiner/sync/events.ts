/**
 * Sync events and the status channel.
 *
 * Background sync never throws into callers; outcomes are published here.
 */

import { createLogger } from "@core/logger"
import type { DrainResult, QueueAction } from "@core/sync/types"

import type { SyncTrigger } from "./connectivity"

const log = createLogger("SyncEvents")

export type SyncEvent =
  | { type: "sync-start"; trigger: SyncTrigger; queued: number; at: string }
  | { type: "sync-end"; result: DrainResult; at: string }
  | { type: "record-relocated"; fromId: string; toId: string; at: string }
  | {
      type: "item-retry"
      recordId: string
      sequence: number
      retryCount: number
      /** ISO 8601 */
      nextAttemptAt: string | null
      message: string
      at: string
    }
  | {
      type: "item-rejected"
      recordId: string
      sequence: number
      action: QueueAction
      reason: string
      status: number | null
      at: string
    }
  | { type: "sync-error"; message: string; at: string }
  | { type: "connectivity"; connected: boolean; at: string }

export type SyncEventListener = (event: SyncEvent) => void

/**
 * Snapshot of the engine state for status indicators.
 */
export interface SyncStatus {
  isOnline: boolean
  isSyncing: boolean
  /** Queue items not yet acknowledged */
  pendingCount: number
  /** Last background error, cleared by a clean drain */
  lastError: string | null
  /** Timestamp of the last completed drain (ISO 8601) */
  lastSyncAt: string | null
}

/**
 * Fan-out of sync events to listeners.
 * A throwing listener is logged and does not affect the others.
 */
export class SyncEventEmitter {
  private listeners: Set<SyncEventListener> = new Set()

  /** Subscribe to events. Returns unsubscribe function. */
  subscribe(listener: SyncEventListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  emit(event: SyncEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (error) {
        log.error(`listener failed on ${event.type}`, error)
      }
    }
  }

  clear(): void {
    this.listeners.clear()
  }
}
