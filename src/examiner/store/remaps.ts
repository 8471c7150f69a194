/**
 * Persisted identifier remaps.
 *
 * Every reconciliation records `localId -> serverId`, so a reference to a
 * retired local id still resolves after a restart.
 */

import type { IdRemap } from "@core/sync/types"

import type { ExaminerSyncDatabase } from "../db"
import { guardStorage } from "./localStore"

/** Upper bound on chained remaps followed by resolve() */
const MAX_HOPS = 8

export interface IdRemapStore {
  put(remap: IdRemap): Promise<void>
  /** Follow remaps from an id to its current id; unknown ids resolve to themselves */
  resolve(id: string): Promise<string>
}

export class DexieIdRemapStore implements IdRemapStore {
  constructor(private db: ExaminerSyncDatabase) {}

  async put(remap: IdRemap): Promise<void> {
    await guardStorage(`record remap ${remap.fromId}`, () => this.db.id_remaps.put(remap))
  }

  async resolve(id: string): Promise<string> {
    return guardStorage(`resolve ${id}`, async () => {
      let current = id
      for (let hop = 0; hop < MAX_HOPS; hop++) {
        const remap = await this.db.id_remaps.get(current)
        if (!remap) break
        current = remap.toId
      }
      return current
    })
  }
}
