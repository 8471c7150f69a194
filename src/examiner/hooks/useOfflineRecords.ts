/**
 * Live record listing from the Local Store.
 */

import type { LocalRecord, RecordFilter } from "@core/sync/types"
import { useLiveQuery } from "dexie-react-hooks"

import { useSyncEngineContext } from "../contexts/SyncEngineContext"

export interface UseOfflineRecordsResult {
  /** Matching records, newest first */
  records: LocalRecord[]
  /** True until the first query resolves */
  isLoading: boolean
}

/**
 * Records matching a filter, re-queried whenever the records table changes.
 */
export function useOfflineRecords(filter: RecordFilter = {}): UseOfflineRecordsResult {
  const engine = useSyncEngineContext()
  const { type, ownerId, status, synced } = filter

  const records = useLiveQuery(
    () => engine.list({ type, ownerId, status, synced }),
    [engine, type, ownerId, status, synced],
  )

  return {
    records: records ?? [],
    isLoading: records === undefined,
  }
}
