import { SILENT_LOGGER, type Logger } from "../logging/logger.js"

export type WorkUnit<T> = () => Promise<T>

export type UnitResult<T> =
  | { readonly status: "fulfilled"; readonly value: T }
  | { readonly status: "rejected"; readonly reason: unknown }

/**
 * Runs `units` with at most `size` in flight and resolves only after every unit has settled.
 * Results keep unit order regardless of completion order.
 */
export const runPool = async <T>(units: readonly WorkUnit<T>[], size: number): Promise<UnitResult<T>[]> => {
  const results: UnitResult<T>[] = new Array(units.length)
  let cursor = 0
  const workerCount = Math.max(1, Math.min(Math.floor(size) || 1, units.length))

  const worker = async () => {
    while (cursor < units.length) {
      const index = cursor
      cursor += 1
      try {
        results[index] = { status: "fulfilled", value: await units[index]() }
      } catch (reason) {
        results[index] = { status: "rejected", reason }
      }
    }
  }

  await Promise.all(Array.from({ length: units.length === 0 ? 0 : workerCount }, () => worker()))
  return results
}

export const runBooleanBatch = async (
  units: readonly WorkUnit<boolean>[],
  size: number,
  logger: Logger = SILENT_LOGGER,
): Promise<boolean[]> => {
  const settled = await runPool(units, size)
  return settled.map((result, index) => {
    if (result.status === "fulfilled") return result.value
    const reason = result.reason instanceof Error ? result.reason.message : String(result.reason)
    logger.warn(`work unit ${index} failed: ${reason}`)
    return false
  })
}
