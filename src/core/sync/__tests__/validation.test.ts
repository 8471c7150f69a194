import { describe, expect, test } from "vitest"

import { ValidationError } from "../../errors"
import { parseRecordInput, parseServerRecord } from "../validation"

describe("parseRecordInput", () => {
  test("accepts a new record without id", () => {
    const input = parseRecordInput({ type: "checklist", fields: { text: "result A" } })
    expect(input).toEqual({ type: "checklist", fields: { text: "result A" } })
  })

  test("accepts a null id", () => {
    expect(parseRecordInput({ id: null, type: "checklist", fields: {} }).id).toBeNull()
  })

  test("rejects a missing type", () => {
    expect(() => parseRecordInput({ fields: {} })).toThrow(ValidationError)
  })

  test("names the offending field", () => {
    expect(() => parseRecordInput({ type: "checklist", fields: "nope" })).toThrow(/fields/)
  })
})

describe("parseServerRecord", () => {
  test("accepts a server record", () => {
    const record = parseServerRecord({
      id: "42",
      type: "checklist",
      ownerId: "examiner-7",
      updatedAt: "2024-03-01T09:00:00.000Z",
      fields: {},
    })
    expect(record.id).toBe("42")
  })

  test("rejects a malformed timestamp", () => {
    expect(() =>
      parseServerRecord({ id: "42", type: "checklist", updatedAt: "yesterday", fields: {} }),
    ).toThrow("Invalid server record: updatedAt")
  })
})
