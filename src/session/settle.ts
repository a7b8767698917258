import type { HarnessClock } from "../clock/HarnessClock.js"

export type SyncMode = "fixed" | "poll"

export interface SettleConfig {
  readonly shortMs: number
  readonly longMs: number
}

export interface SyncConfig {
  readonly mode: SyncMode
  readonly maxAttempts: number
  readonly backoffFactor: number
  readonly maxDelayMs: number
}

export const backoffDelays = (initialMs: number, factor: number, maxDelayMs: number, attempts: number): number[] => {
  const delays: number[] = []
  let next = Math.max(0, initialMs)
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    delays.push(Math.min(next, maxDelayMs))
    next = next * Math.max(1, factor)
  }
  return delays
}

/**
 * Sleeps through `delays`, checking `predicate` after each one. Resolves true on the first hit and
 * false once the schedule is exhausted.
 */
export const waitUntil = async (
  predicate: () => Promise<boolean>,
  clock: HarnessClock,
  delays: readonly number[],
): Promise<boolean> => {
  for (const delayMs of delays) {
    await clock.sleep(delayMs)
    if (await predicate()) return true
  }
  return false
}
