/**
 * React Context for OfflineSyncEngine.
 *
 * The engine is built by the host application and injected here, so tests
 * can hand in an engine wired to fakes.
 */

import { createContext, type ReactNode, useContext, useEffect } from "react"

import type { OfflineSyncEngine } from "../sync/engine"

/**
 * Context holding the engine instance.
 * Null when accessed outside of SyncEngineProvider.
 */
const SyncEngineContext = createContext<OfflineSyncEngine | null>(null)

/**
 * Props for SyncEngineProvider.
 */
export interface SyncEngineProviderProps {
  engine: OfflineSyncEngine
  /** Start scheduling drains on mount and stop on unmount (default true) */
  autoStart?: boolean
  children: ReactNode
}

/**
 * Provider component that exposes an engine to the component tree.
 *
 * @example
 * ```tsx
 * const engine = createOfflineSyncEngine(loadSyncConfig({ baseUrl }))
 *
 * function App() {
 *   return (
 *     <SyncEngineProvider engine={engine}>
 *       <ChecklistScreen />
 *     </SyncEngineProvider>
 *   )
 * }
 * ```
 */
export function SyncEngineProvider({ engine, autoStart = true, children }: SyncEngineProviderProps) {
  useEffect(() => {
    if (!autoStart) return
    engine.start()
    return () => engine.stop()
  }, [engine, autoStart])

  return <SyncEngineContext.Provider value={engine}>{children}</SyncEngineContext.Provider>
}

/**
 * Hook to access the engine from context.
 *
 * @throws Error if used outside of SyncEngineProvider
 */
export function useSyncEngineContext(): OfflineSyncEngine {
  const engine = useContext(SyncEngineContext)
  if (!engine) {
    throw new Error("useSyncEngineContext must be used within a SyncEngineProvider")
  }
  return engine
}
