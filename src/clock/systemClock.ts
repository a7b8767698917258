import { setTimeout as delay } from "node:timers/promises"
import { normalizeDelayMs, type HarnessClock } from "./HarnessClock.js"

export class SystemClock implements HarnessClock {
  now(): number {
    return Date.now()
  }

  async sleep(delayMs: number): Promise<void> {
    const normalized = normalizeDelayMs(delayMs)
    if (normalized === 0) return
    await delay(normalized)
  }
}

export const DEFAULT_SYSTEM_CLOCK = new SystemClock()
