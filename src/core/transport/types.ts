/**
 * Transport layer types for the remote record service.
 *
 * The sync coordinator only talks to this interface, so tests and hosts can
 * substitute their own implementation.
 */

import type { LocalRecord } from "../sync/types"

/**
 * Acknowledgment of a create.
 */
export interface RemoteCreateResult {
  /** Server-assigned identifier */
  id: string
}

/**
 * Options for a create call.
 */
export interface RemoteCreateOptions {
  /** Stable key for the logical record; lets the server drop duplicate deliveries */
  idempotencyKey: string
}

/**
 * Remote service operations, per record type.
 *
 * Implementations throw a RemoteError on failure; `status: null` means no
 * response was received.
 */
export interface RemoteService {
  createRecord(
    type: string,
    payload: LocalRecord,
    options: RemoteCreateOptions,
  ): Promise<RemoteCreateResult>
  updateRecord(type: string, id: string, payload: LocalRecord): Promise<void>
  deleteRecord(type: string, id: string): Promise<void>
}

/**
 * JSON body sent for creates and updates.
 */
export interface RecordWireBody {
  type: string
  ownerId: string | null
  status: string | null
  updatedAt: string
  fields: LocalRecord["fields"]
}
