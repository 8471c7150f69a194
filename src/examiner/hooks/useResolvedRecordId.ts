/**
 * Follow a record across reconciliation.
 *
 * Screens that opened a record under its local-only id keep working after
 * the server assigns the real id.
 */

import { useEffect, useState } from "react"

import { createLogger } from "@core/logger"

import { useSyncEngineContext } from "../contexts/SyncEngineContext"

const log = createLogger("useResolvedRecordId")

/**
 * Current id of a record, updated on `record-relocated` events.
 */
export function useResolvedRecordId(id: string): string {
  const engine = useSyncEngineContext()
  const [resolvedId, setResolvedId] = useState(id)

  useEffect(() => {
    let active = true
    setResolvedId(id)

    engine
      .resolveId(id)
      .then((current) => {
        if (active) setResolvedId(current)
      })
      .catch((error) => log.error(`failed to resolve ${id}`, error))

    const unsubscribe = engine.subscribe((event) => {
      if (event.type !== "record-relocated") return
      setResolvedId((current) => (current === event.fromId ? event.toId : current))
    })

    return () => {
      active = false
      unsubscribe()
    }
  }, [engine, id])

  return resolvedId
}
