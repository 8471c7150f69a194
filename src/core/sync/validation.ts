/**
 * Runtime validation of caller input and server records.
 */

import { z } from "zod"

import { ValidationError } from "../errors"
import type { RecordInput, ServerRecord } from "./types"

const FieldsSchema = z.record(z.string(), z.unknown())

export const RecordInputSchema = z.object({
  id: z.string().min(1).nullable().optional(),
  type: z.string().min(1),
  ownerId: z.string().nullable().optional(),
  status: z.string().nullable().optional(),
  fields: FieldsSchema,
})

export const ServerRecordSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  ownerId: z.string().nullable().optional(),
  status: z.string().nullable().optional(),
  updatedAt: z.string().datetime().optional(),
  fields: FieldsSchema,
})

function describe(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ")
}

/**
 * Validate a write input.
 * @throws ValidationError
 */
export function parseRecordInput(input: unknown): RecordInput {
  const parsed = RecordInputSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationError(`Invalid record: ${describe(parsed.error)}`, parsed.error)
  }
  return parsed.data
}

/**
 * Validate a record received from the server.
 * @throws ValidationError
 */
export function parseServerRecord(input: unknown): ServerRecord {
  const parsed = ServerRecordSchema.safeParse(input)
  if (!parsed.success) {
    throw new ValidationError(`Invalid server record: ${describe(parsed.error)}`, parsed.error)
  }
  return parsed.data
}
