/**
 * React hook for the sync status.
 *
 * Reactive online, syncing and error state from engine events, plus a live
 * pending count straight from the queue table.
 */

import type { DrainResult } from "@core/sync/types"
import { useLiveQuery } from "dexie-react-hooks"
import { useCallback, useEffect, useState } from "react"

import { useSyncEngineContext } from "../contexts/SyncEngineContext"

/** Result from useSyncEngine hook */
export interface UseSyncEngineResult {
  /** Whether the device is currently connected */
  isOnline: boolean
  /** Whether a drain is in progress */
  isSyncing: boolean
  /** Number of queued mutations waiting to sync */
  pendingCount: number
  /** Last background sync error, if any */
  lastError: string | null
  /** Timestamp of the last completed drain (ISO 8601) */
  lastSyncAt: string | null
  /** Manually trigger a drain */
  syncNow: () => Promise<DrainResult>
}

/**
 * Hook for the sync state of the engine in context.
 *
 * @example
 * ```tsx
 * function SyncBadge() {
 *   const { isOnline, pendingCount, syncNow } = useSyncEngine()
 *
 *   return (
 *     <button onClick={() => void syncNow()} disabled={!isOnline}>
 *       {pendingCount > 0 ? `${pendingCount} pending` : "Up to date"}
 *     </button>
 *   )
 * }
 * ```
 */
export function useSyncEngine(): UseSyncEngineResult {
  const engine = useSyncEngineContext()
  const [isOnline, setIsOnline] = useState(() => engine.isOnline())
  const [isSyncing, setIsSyncing] = useState(() => engine.isSyncing())
  const [lastError, setLastError] = useState(() => engine.getLastError())
  const [lastSyncAt, setLastSyncAt] = useState(() => engine.getLastSyncAt())

  // Dexie's liveQuery re-runs the count whenever the queue table changes
  const pendingCount = useLiveQuery(() => engine.pendingCount(), [engine], 0) ?? 0

  useEffect(() => {
    const refresh = () => {
      setIsOnline(engine.isOnline())
      setIsSyncing(engine.isSyncing())
      setLastError(engine.getLastError())
      setLastSyncAt(engine.getLastSyncAt())
    }

    refresh()
    return engine.subscribe(refresh)
  }, [engine])

  const syncNow = useCallback(() => engine.forceSync(), [engine])

  return {
    isOnline,
    isSyncing,
    pendingCount,
    lastError,
    lastSyncAt,
    syncNow,
  }
}
