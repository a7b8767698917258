import { evaluateQuorum } from "../concurrency/quorum.js"
import { runBooleanBatch } from "../concurrency/workerPool.js"
import { DIRECTIONS, type Direction } from "../runner/muxClient.js"
import { openSession, splitTimes } from "./checks.js"
import type { Scenario } from "./types.js"

const STEPS_PER_WORKER = 20

export const pickDirection = (random: () => number): Direction =>
  DIRECTIONS[Math.min(DIRECTIONS.length - 1, Math.max(0, Math.floor(random() * DIRECTIONS.length)))]

export const concurrentOpsScenario: Scenario = {
  id: "concurrent-ops",
  title: "CONCURRENT OPERATIONS TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("concurrent_ops")
    const { workers, quorum } = ctx.settings
    await openSession(ctx, session)
    try {
      await splitTimes(ctx, session, 3, 200)

      const totalOps = workers * STEPS_PER_WORKER
      ctx.reporter.test(`Concurrent pane navigation (${totalOps} ops)`)
      // Individual steps are not checked: a storm only has to finish without hanging the workers.
      const storm = async (): Promise<boolean> => {
        for (let step = 0; step < STEPS_PER_WORKER; step += 1) {
          await ctx.mux.selectPane(session, pickDirection(ctx.random))
          await ctx.pause(10)
        }
        return true
      }
      const results = await runBooleanBatch(
        Array.from({ length: workers }, () => storm),
        workers,
        ctx.logger,
      )
      const verdict = evaluateQuorum(results, quorum)
      if (verdict.passed) {
        ctx.ledger.recordPass(`${totalOps} concurrent navigation ops completed`)
      } else {
        ctx.ledger.recordFail(`Only ${verdict.succeeded}/${verdict.total} navigation workers finished`)
      }
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
