export type { UseOfflineRecordsResult } from "./useOfflineRecords"
export { useOfflineRecords } from "./useOfflineRecords"
export { useResolvedRecordId } from "./useResolvedRecordId"
export type { UseSyncEngineResult } from "./useSyncEngine"
export { useSyncEngine } from "./useSyncEngine"
