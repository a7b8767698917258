import type { HarnessClock } from "../clock/HarnessClock.js"
import { SILENT_LOGGER, type Logger } from "../logging/logger.js"
import type { StateProbe } from "../probe/stateProbe.js"
import type { MuxClient } from "../runner/muxClient.js"
import { CleanupRegistry } from "./cleanupRegistry.js"
import { backoffDelays, waitUntil, type SettleConfig, type SyncConfig } from "./settle.js"

export interface SessionManagerOptions {
  readonly mux: MuxClient
  readonly probe: StateProbe
  readonly clock: HarnessClock
  readonly settle: SettleConfig
  readonly sync: SyncConfig
  readonly registry?: CleanupRegistry
  readonly logger?: Logger
}

export const createSessionManager = (options: SessionManagerOptions) => {
  const { mux, probe, clock, settle, sync } = options
  const registry = options.registry ?? new CleanupRegistry()
  const logger = options.logger ?? SILENT_LOGGER

  const converge = async (name: string): Promise<boolean> => {
    if (sync.mode === "poll") {
      const delays = backoffDelays(settle.shortMs, sync.backoffFactor, sync.maxDelayMs, sync.maxAttempts)
      return await waitUntil(() => probe.exists(name), clock, delays)
    }
    await clock.sleep(settle.longMs)
    return await probe.exists(name)
  }

  const create = async (name: string): Promise<boolean> => {
    registry.register(name)
    await mux.killSession(name)
    await clock.sleep(settle.shortMs)
    mux.launchSession(name)
    const created = await converge(name)
    if (!created) {
      logger.debug(`session ${name} did not come up`)
    }
    return created
  }

  const kill = async (name: string): Promise<void> => {
    await mux.killSession(name)
    await clock.sleep(settle.shortMs)
  }

  const cleanupMany = async (names: Iterable<string>): Promise<void> => {
    for (const name of names) {
      try {
        await mux.killSession(name)
      } catch (error) {
        logger.debug(`cleanup of ${name} failed: ${error instanceof Error ? error.message : String(error)}`)
      }
    }
  }

  return { registry, create, kill, cleanupMany }
}

export type SessionManager = ReturnType<typeof createSessionManager>
