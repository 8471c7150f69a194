// @vitest-environment jsdom

import { act, cleanup, renderHook, waitFor } from "@testing-library/react"
import type { ReactNode } from "react"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

import { loadSyncConfig } from "@core/config"

import { FakeRemote, ManualClock } from "../../../test/fakes"
import { SyncEngineProvider } from "../../contexts/SyncEngineContext"
import { ExaminerSyncDatabase } from "../../db"
import { ManualConnectivitySource } from "../../sync/connectivity"
import { OfflineSyncEngine } from "../../sync/engine"
import { useOfflineRecords } from "../useOfflineRecords"
import { useResolvedRecordId } from "../useResolvedRecordId"
import { useSyncEngine } from "../useSyncEngine"

describe("sync hooks", () => {
  let name: string
  let connectivity: ManualConnectivitySource
  let engine: OfflineSyncEngine

  function wrapper({ children }: { children: ReactNode }) {
    return <SyncEngineProvider engine={engine}>{children}</SyncEngineProvider>
  }

  beforeEach(() => {
    name = `hooks-${crypto.randomUUID()}`
    connectivity = new ManualConnectivitySource(false)
    engine = new OfflineSyncEngine({
      db: new ExaminerSyncDatabase(name),
      remote: new FakeRemote(),
      connectivity,
      clock: new ManualClock(),
      config: loadSyncConfig({ logLevel: "error" }),
    })
  })

  afterEach(async () => {
    cleanup()
    vi.restoreAllMocks()
    engine.dispose()
    await new ExaminerSyncDatabase(name).delete()
  })

  describe("useSyncEngine", () => {
    it("starts offline with nothing pending", () => {
      const { result } = renderHook(() => useSyncEngine(), { wrapper })

      expect(result.current.isOnline).toBe(false)
      expect(result.current.isSyncing).toBe(false)
      expect(result.current.pendingCount).toBe(0)
      expect(result.current.lastError).toBeNull()
      expect(result.current.lastSyncAt).toBeNull()
    })

    it("tracks the pending count live", async () => {
      const { result } = renderHook(() => useSyncEngine(), { wrapper })

      await act(async () => {
        await engine.write({ type: "checklist", fields: {} })
      })

      await waitFor(() => expect(result.current.pendingCount).toBe(1))
    })

    it("follows connectivity and the drain it triggers", async () => {
      const { result } = renderHook(() => useSyncEngine(), { wrapper })
      await act(async () => {
        await engine.write({ type: "checklist", fields: {} })
      })

      await act(async () => {
        connectivity.setConnected(true)
        await engine.forceSync()
      })

      expect(result.current.isOnline).toBe(true)
      expect(result.current.lastSyncAt).toBe("2024-03-01T09:00:00.000Z")
      await waitFor(() => expect(result.current.pendingCount).toBe(0))
    })

    it("syncs on demand", async () => {
      connectivity.setConnected(true)
      const { result } = renderHook(() => useSyncEngine(), { wrapper })

      // Let the provider's startup drain finish first
      await act(async () => {
        await result.current.syncNow()
      })

      let confirmed = -1
      await act(async () => {
        await engine.write({ type: "checklist", fields: {} })
        confirmed = (await result.current.syncNow()).confirmed
      })

      expect(confirmed).toBe(1)
      await waitFor(() => expect(result.current.pendingCount).toBe(0))
    })

    it("requires a provider", () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined)

      expect(() => renderHook(() => useSyncEngine())).toThrow(
        "useSyncEngineContext must be used within a SyncEngineProvider",
      )
    })
  })

  describe("useOfflineRecords", () => {
    it("lists matching records live", async () => {
      const { result } = renderHook(() => useOfflineRecords({ ownerId: "examiner-7" }), {
        wrapper,
      })

      await waitFor(() => expect(result.current.isLoading).toBe(false))
      expect(result.current.records).toEqual([])

      await act(async () => {
        await engine.write({ type: "checklist", ownerId: "examiner-7", fields: { text: "mine" } })
        await engine.write({ type: "checklist", ownerId: "examiner-8", fields: { text: "other" } })
      })

      await waitFor(() => expect(result.current.records).toHaveLength(1))
      expect(result.current.records[0].fields).toEqual({ text: "mine" })
    })
  })

  describe("useResolvedRecordId", () => {
    it("follows a record to its server id", async () => {
      const record = await engine.write({ type: "checklist", fields: {} })
      const { result } = renderHook(() => useResolvedRecordId(record.id), { wrapper })

      expect(result.current).toBe(record.id)

      await act(async () => {
        connectivity.setConnected(true)
        await engine.forceSync()
      })

      await waitFor(() => expect(result.current).toBe("srv-1"))
    })

    it("resolves an id retired before mount", async () => {
      connectivity.setConnected(true)
      const record = await engine.write({ type: "checklist", fields: {} })
      await engine.forceSync()

      const { result } = renderHook(() => useResolvedRecordId(record.id), { wrapper })

      await waitFor(() => expect(result.current).toBe("srv-1"))
    })
  })
})
