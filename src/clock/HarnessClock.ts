export interface HarnessClock {
  now(): number
  sleep(delayMs: number): Promise<void>
}

export const normalizeDelayMs = (delayMs: number): number => {
  if (!Number.isFinite(delayMs)) return 0
  return Math.max(0, Math.floor(delayMs))
}
