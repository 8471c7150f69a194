/**
 * Time source for the sync engine.
 * Injected so tests can drive timers deterministically.
 */

export interface Clock {
  now(): Date
  /** Call `callback` every `ms`. Returns a function that cancels the interval. */
  setInterval(callback: () => void, ms: number): () => void
}

/** Clock backed by the global timers. */
export const systemClock: Clock = {
  now: () => new Date(),
  setInterval: (callback, ms) => {
    const handle = setInterval(callback, ms)
    return () => clearInterval(handle)
  },
}
