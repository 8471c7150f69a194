export type { Clock } from "./clock"
export { systemClock } from "./clock"
export type {
  ConnectivityHandlers,
  ConnectivitySource,
  OnlineEventTarget,
  SyncTrigger,
} from "./connectivity"
export {
  ConnectivityMonitor,
  createBrowserConnectivitySource,
  ManualConnectivitySource,
} from "./connectivity"
export type { CoordinatorConfig, CreateAckOutcome } from "./coordinator"
export { SyncCoordinator } from "./coordinator"
export type { EngineOverrides, OfflineSyncEngineOptions } from "./engine"
export { createOfflineSyncEngine, OfflineSyncEngine } from "./engine"
export type { SyncEvent, SyncEventListener, SyncStatus } from "./events"
export { SyncEventEmitter } from "./events"
