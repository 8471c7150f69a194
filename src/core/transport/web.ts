/**
 * Web transport implementation.
 *
 * Uses fetch() with JSON bodies against `${baseUrl}/api/<collection>`.
 */

import { z } from "zod"

import { errorMessage, RemoteError } from "../errors"
import type { LocalRecord } from "../sync/types"
import type { RecordWireBody, RemoteCreateResult, RemoteService } from "./types"

const CreateResponseSchema = z.object({
  id: z.union([z.string().min(1), z.number()]),
})

/**
 * Options for the web transport.
 */
export interface WebRemoteOptions {
  /** Base URL for API requests (e.g., "http://localhost:8000") */
  baseUrl: string
  /** Collection path segment per record type; defaults to `<type>s` */
  collections?: Record<string, string>
  /** Abort a request after this many milliseconds */
  timeoutMs?: number
  /** Extra headers sent with every request */
  headers?: Record<string, string>
  /** fetch implementation (defaults to the global one) */
  fetch?: typeof fetch
}

interface JsonRequest {
  method: "POST" | "PUT" | "DELETE"
  headers?: Record<string, string>
  body?: string
}

/**
 * Convert a record to the request body.
 * The id travels in the URL, never in the body.
 */
export function toWireBody(record: LocalRecord): RecordWireBody {
  return {
    type: record.type,
    ownerId: record.ownerId,
    status: record.status,
    updatedAt: record.updatedAt,
    fields: record.fields,
  }
}

/**
 * Create a web transport that uses fetch() for HTTP communication.
 */
export function createWebRemote(options: WebRemoteOptions): RemoteService {
  const { baseUrl, collections = {}, timeoutMs = 15_000, headers = {} } = options
  const fetchImpl = options.fetch ?? fetch

  const collectionUrl = (type: string): string =>
    `${baseUrl}/api/${encodeURIComponent(collections[type] ?? `${type}s`)}`

  const recordUrl = (type: string, id: string): string =>
    `${collectionUrl(type)}/${encodeURIComponent(id)}`

  async function send(url: string, request: JsonRequest, what: string): Promise<Response> {
    let response: Response
    try {
      response = await fetchImpl(url, {
        method: request.method,
        headers: { ...headers, ...request.headers },
        body: request.body,
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      throw new RemoteError(`Failed to ${what}: ${errorMessage(error)}`, null, error)
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "")
      throw new RemoteError(
        `Failed to ${what}: ${response.status} ${text}`.trim(),
        response.status,
      )
    }

    return response
  }

  return {
    async createRecord(type, payload, createOptions): Promise<RemoteCreateResult> {
      const response = await send(
        collectionUrl(type),
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "Idempotency-Key": createOptions.idempotencyKey,
          },
          body: JSON.stringify(toWireBody(payload)),
        },
        `create ${type}`,
      )

      let body: unknown
      try {
        body = await response.json()
      } catch (error) {
        throw new RemoteError(`Invalid create response for ${type}`, null, error)
      }

      const parsed = CreateResponseSchema.safeParse(body)
      // No status: the create is retried under the same idempotency key
      if (!parsed.success) {
        throw new RemoteError(`Create response for ${type} has no id`, null, parsed.error)
      }

      return { id: String(parsed.data.id) }
    },

    async updateRecord(type, id, payload): Promise<void> {
      await send(
        recordUrl(type, id),
        {
          method: "PUT",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(toWireBody(payload)),
        },
        `update ${type} ${id}`,
      )
    },

    async deleteRecord(type, id): Promise<void> {
      await send(recordUrl(type, id), { method: "DELETE" }, `delete ${type} ${id}`)
    },
  }
}
