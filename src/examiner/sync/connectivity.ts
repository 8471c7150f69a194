/**
 * Connectivity Monitor.
 *
 * Tracks whether the device is connected and decides when a drain runs:
 * - on start, if connected
 * - on every disconnected -> connected transition
 * - every `intervalMs` while connected
 * On disconnect it asks the running drain to stop at the next item boundary.
 */

import { createLogger } from "@core/logger"

import type { Clock } from "./clock"

const log = createLogger("ConnectivityMonitor")

/**
 * Source of connectivity signals. Only boolean transitions are needed.
 */
export interface ConnectivitySource {
  isConnected(): boolean
  /** Subscribe to changes. Returns unsubscribe function. */
  subscribe(listener: (connected: boolean) => void): () => void
}

/**
 * Connectivity source driven by the host (native bridge, tests).
 */
export class ManualConnectivitySource implements ConnectivitySource {
  private listeners: Set<(connected: boolean) => void> = new Set()

  constructor(private connected: boolean = false) {}

  isConnected(): boolean {
    return this.connected
  }

  subscribe(listener: (connected: boolean) => void): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  setConnected(connected: boolean): void {
    if (this.connected === connected) return
    this.connected = connected
    for (const listener of this.listeners) {
      listener(connected)
    }
  }
}

/**
 * Minimal window surface used by the browser source.
 */
export interface OnlineEventTarget {
  addEventListener(type: "online" | "offline", listener: () => void): void
  removeEventListener(type: "online" | "offline", listener: () => void): void
}

/**
 * Connectivity source backed by the browser's `online`/`offline` events.
 */
export function createBrowserConnectivitySource(
  target: OnlineEventTarget = window,
  initiallyOnline: boolean = typeof navigator !== "undefined" ? navigator.onLine : true,
): ConnectivitySource {
  let connected = initiallyOnline

  return {
    isConnected: () => connected,
    subscribe(listener) {
      const onlineHandler = () => {
        connected = true
        listener(true)
      }
      const offlineHandler = () => {
        connected = false
        listener(false)
      }
      target.addEventListener("online", onlineHandler)
      target.addEventListener("offline", offlineHandler)
      return () => {
        target.removeEventListener("online", onlineHandler)
        target.removeEventListener("offline", offlineHandler)
      }
    },
  }
}

/**
 * Callbacks the monitor drives.
 */
export interface ConnectivityHandlers {
  /** Start a drain attempt (coalesced by the receiver) */
  onSyncDue(reason: SyncTrigger): void
  /** Stop the running drain at the next item boundary */
  onDisconnect(): void
  /** Connectivity changed */
  onChange?(connected: boolean): void
}

export type SyncTrigger = "startup" | "reconnect" | "interval" | "manual"

/**
 * Scheduler for the sync coordinator. Holds no persistent state.
 */
export class ConnectivityMonitor {
  private connected: boolean
  private cancelTimer: (() => void) | null = null
  private unsubscribe: (() => void) | null = null

  constructor(
    private source: ConnectivitySource,
    private clock: Clock,
    private intervalMs: number,
    private handlers: ConnectivityHandlers,
  ) {
    this.connected = source.isConnected()
  }

  isConnected(): boolean {
    return this.connected
  }

  isRunning(): boolean {
    return this.unsubscribe !== null
  }

  /**
   * Subscribe to the source and start the interval timer.
   * Triggers an initial drain when already connected.
   */
  start(): void {
    if (this.unsubscribe) return

    this.connected = this.source.isConnected()
    this.unsubscribe = this.source.subscribe((connected) => this.handleChange(connected))
    this.cancelTimer = this.clock.setInterval(() => this.handleTick(), this.intervalMs)

    if (this.connected) {
      this.handlers.onSyncDue("startup")
    }
  }

  stop(): void {
    this.unsubscribe?.()
    this.unsubscribe = null
    this.cancelTimer?.()
    this.cancelTimer = null
  }

  private handleChange(connected: boolean): void {
    const wasConnected = this.connected
    this.connected = connected
    if (wasConnected === connected) return

    log.info(connected ? "connected" : "disconnected")
    this.handlers.onChange?.(connected)

    if (connected) {
      this.handlers.onSyncDue("reconnect")
    } else {
      this.handlers.onDisconnect()
    }
  }

  private handleTick(): void {
    if (this.connected) {
      this.handlers.onSyncDue("interval")
    }
  }
}
