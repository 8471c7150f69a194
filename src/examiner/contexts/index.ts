export type { SyncEngineProviderProps } from "./SyncEngineContext"
export { SyncEngineProvider, useSyncEngineContext } from "./SyncEngineContext"
