import { Chalk } from "chalk"
import { describe, expect, it } from "vitest"
import { createLogger } from "../../logging/logger.js"
import { runBooleanBatch, runPool } from "../workerPool.js"

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0))

describe("worker pool", () => {
  it("never has more than `size` units in flight", async () => {
    let active = 0
    let peak = 0
    const units = Array.from({ length: 12 }, (_, index) => async () => {
      active += 1
      peak = Math.max(peak, active)
      await tick()
      active -= 1
      return index * 2
    })

    const results = await runPool(units, 3)

    expect(peak).toBe(3)
    expect(results.map((result) => (result.status === "fulfilled" ? result.value : null))).toEqual(
      Array.from({ length: 12 }, (_, index) => index * 2),
    )
  })

  it("keeps going after a rejection and joins every unit", async () => {
    const finished: number[] = []
    const units = [0, 1, 2, 3].map((index) => async () => {
      await tick()
      if (index === 1) throw new Error("unit one broke")
      finished.push(index)
      return index
    })

    const results = await runPool(units, 2)

    expect(finished.sort()).toEqual([0, 2, 3])
    expect(results[1]).toMatchObject({ status: "rejected" })
  })

  it("returns an empty list for no units", async () => {
    await expect(runPool([], 4)).resolves.toEqual([])
  })

  it("maps rejections to false and logs them", async () => {
    const lines: string[] = []
    const logger = createLogger({ level: "warn", write: (line) => lines.push(line), colors: new Chalk({ level: 0 }) })
    const results = await runBooleanBatch(
      [async () => true, async () => Promise.reject(new Error("lost")), async () => false],
      5,
      logger,
    )
    expect(results).toEqual([true, false, false])
    expect(lines).toEqual(["[mux-battle] warn: work unit 1 failed: lost"])
  })
})
