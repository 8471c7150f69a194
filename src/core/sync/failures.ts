/**
 * Classification of remote failures.
 *
 * - transient: network error, timeout, 408, 425, 429 or 5xx; retried later
 * - gone: 404 or 410; success for a delete, a rejection otherwise
 * - permanent: any other 4xx; surfaced to the caller
 */

import { RemoteError } from "../errors"
import type { QueueAction } from "./types"

export type FailureKind = "transient" | "gone" | "permanent"

const TRANSIENT_STATUSES = new Set([408, 425, 429])

/**
 * Classify an error thrown by the remote service.
 * Errors that are not RemoteErrors carry no status and count as transient.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (!(error instanceof RemoteError) || error.status === null) {
    return "transient"
  }
  const { status } = error
  if (status === 404 || status === 410) return "gone"
  if (status >= 500 || TRANSIENT_STATUSES.has(status)) return "transient"
  return "permanent"
}

/**
 * Policy knobs for resolving a failed delivery.
 */
export interface FailurePolicy {
  maxRetries: number
  /** Treat permanent rejections like transient failures */
  retryRejections: boolean
}

/**
 * Decide what happens to an item after a failed delivery.
 *
 * @param action - The item's action
 * @param kind - Classified failure
 * @param retryCount - Failed attempts before this one
 * @param policy - Retry policy
 */
export function resolveFailure(
  action: QueueAction,
  kind: FailureKind,
  retryCount: number,
  policy: FailurePolicy,
): "confirmed" | "retry" | "rejected" {
  if (kind === "gone") {
    return action === "delete" ? "confirmed" : "rejected"
  }
  if (kind === "permanent" && !policy.retryRejections) {
    return "rejected"
  }
  return retryCount + 1 < policy.maxRetries ? "retry" : "rejected"
}
