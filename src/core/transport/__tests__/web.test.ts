import { describe, expect, it } from "vitest"

import { RemoteError } from "../../errors"
import type { LocalRecord } from "../../sync/types"
import { createWebRemote, toWireBody } from "../web"

interface SentRequest {
  url: string
  init: RequestInit | undefined
}

/** fetch stand-in that records requests and answers with `respond` */
function createFakeFetch(respond: () => Response | Promise<Response>) {
  const requests: SentRequest[] = []
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({ url: String(input), init })
    return respond()
  }
  return { fetchImpl, requests }
}

function jsonResponse(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  })
}

function headerOf(request: SentRequest, name: string): string | undefined {
  const headers = request.init?.headers
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return undefined
  return headers[name]
}

const record: LocalRecord = {
  id: "local-1",
  type: "checklist",
  ownerId: "examiner-7",
  status: "completed",
  synced: false,
  updatedAt: "2024-03-01T09:00:00.000Z",
  syncError: null,
  fields: { result: "pass" },
}

describe("toWireBody", () => {
  it("leaves the id and local bookkeeping out", () => {
    expect(toWireBody(record)).toEqual({
      type: "checklist",
      ownerId: "examiner-7",
      status: "completed",
      updatedAt: "2024-03-01T09:00:00.000Z",
      fields: { result: "pass" },
    })
  })
})

describe("createWebRemote", () => {
  it("posts creates with the idempotency key", async () => {
    const { fetchImpl, requests } = createFakeFetch(() => jsonResponse({ id: 42 }, 201))
    const remote = createWebRemote({ baseUrl: "https://records.example.test", fetch: fetchImpl })

    const result = await remote.createRecord("checklist", record, { idempotencyKey: "local-1" })

    expect(result).toEqual({ id: "42" })
    expect(requests).toHaveLength(1)
    expect(requests[0].url).toBe("https://records.example.test/api/checklists")
    expect(requests[0].init?.method).toBe("POST")
    expect(headerOf(requests[0], "Idempotency-Key")).toBe("local-1")
    expect(headerOf(requests[0], "Content-Type")).toBe("application/json")
    expect(requests[0].init?.body).toBe(JSON.stringify(toWireBody(record)))
  })

  it("routes types through the collection map", async () => {
    const { fetchImpl, requests } = createFakeFetch(() => new Response(null, { status: 204 }))
    const remote = createWebRemote({
      baseUrl: "",
      collections: { checklist: "driver-checklists" },
      fetch: fetchImpl,
    })

    await remote.updateRecord("checklist", "srv 1", record)

    expect(requests[0].url).toBe("/api/driver-checklists/srv%201")
    expect(requests[0].init?.method).toBe("PUT")
  })

  it("sends extra headers with every request", async () => {
    const { fetchImpl, requests } = createFakeFetch(() => new Response(null, { status: 204 }))
    const remote = createWebRemote({
      baseUrl: "",
      headers: { "X-Device": "tablet-3" },
      fetch: fetchImpl,
    })

    await remote.deleteRecord("checklist", "srv-1")

    expect(requests[0].url).toBe("/api/checklists/srv-1")
    expect(requests[0].init?.method).toBe("DELETE")
    expect(headerOf(requests[0], "X-Device")).toBe("tablet-3")
  })

  it("turns HTTP failures into RemoteError with the status", async () => {
    const { fetchImpl } = createFakeFetch(() => new Response("bad field", { status: 422 }))
    const remote = createWebRemote({ baseUrl: "", fetch: fetchImpl })

    const error = await remote.updateRecord("checklist", "srv-1", record).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RemoteError)
    if (!(error instanceof RemoteError)) return
    expect(error.status).toBe(422)
    expect(error.message).toBe("Failed to update checklist srv-1: 422 bad field")
  })

  it("turns network failures into RemoteError without a status", async () => {
    const { fetchImpl } = createFakeFetch(() => {
      throw new TypeError("fetch failed")
    })
    const remote = createWebRemote({ baseUrl: "", fetch: fetchImpl })

    const error = await remote.deleteRecord("checklist", "srv-1").catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RemoteError)
    if (!(error instanceof RemoteError)) return
    expect(error.status).toBeNull()
    expect(error.message).toBe("Failed to delete checklist srv-1: fetch failed")
  })

  it("rejects a create response without an id", async () => {
    const { fetchImpl } = createFakeFetch(() => jsonResponse({ ok: true }, 201))
    const remote = createWebRemote({ baseUrl: "", fetch: fetchImpl })

    const error = await remote
      .createRecord("checklist", record, { idempotencyKey: "local-1" })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RemoteError)
    if (!(error instanceof RemoteError)) return
    expect(error.status).toBeNull()
    expect(error.message).toBe("Create response for checklist has no id")
  })
})
