/**
 * Examiner offline sync - application shell.
 *
 * Dexie storage, the sync engine and its React bindings.
 */

export * from "./contexts"
export { ExaminerSyncDatabase } from "./db"
export * from "./hooks"
export * from "./store"
export * from "./sync"
