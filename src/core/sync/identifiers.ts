/**
 * Local-only identifiers.
 *
 * Local ids carry a fixed prefix so they can never be mistaken for an id the
 * server assigned.
 */

export const DEFAULT_LOCAL_ID_PREFIX = "local-"

/**
 * Generate a new local-only identifier.
 */
export function createLocalId(prefix: string = DEFAULT_LOCAL_ID_PREFIX): string {
  return `${prefix}${crypto.randomUUID()}`
}

/**
 * Check whether an id was generated on-device.
 */
export function isLocalId(id: string, prefix: string = DEFAULT_LOCAL_ID_PREFIX): boolean {
  return id.startsWith(prefix)
}

/**
 * Check that a server-assigned id does not fall into the local namespace.
 */
export function isValidServerId(id: string, prefix: string = DEFAULT_LOCAL_ID_PREFIX): boolean {
  return id.length > 0 && !isLocalId(id, prefix)
}
