import { evaluateCount, evaluateQuorum } from "../concurrency/quorum.js"
import { runBooleanBatch } from "../concurrency/workerPool.js"
import type { Scenario } from "./types.js"

export const concurrentSessionNames = (sessionName: (suffix: string) => string, count: number): string[] =>
  Array.from({ length: count }, (_, index) => sessionName(`concurrent_${index}`))

export const concurrentSessionsScenario: Scenario = {
  id: "concurrent-sessions",
  title: "CONCURRENT SESSION TESTS",
  run: async (ctx) => {
    const { quorum, workers, concurrentSessions } = ctx.settings
    const names = concurrentSessionNames((suffix) => ctx.sessionName(suffix), concurrentSessions)
    try {
      ctx.reporter.test(`Create ${names.length} sessions concurrently`)
      const results = await runBooleanBatch(
        names.map((name) => () => ctx.sessions.create(name)),
        workers,
        ctx.logger,
      )
      const created = evaluateQuorum(results, quorum)
      if (created.passed) {
        ctx.ledger.recordPass(`Created ${created.succeeded}/${created.total} sessions concurrently`)
      } else {
        ctx.ledger.recordFail(
          `Only created ${created.succeeded}/${created.total} sessions (needed ${created.required})`,
        )
      }

      ctx.reporter.test("Verify all sessions in list")
      const listed = await ctx.probe.countListed(names)
      if (listed === null) {
        ctx.ledger.recordSkip("Session listing timed out")
      } else {
        const verdict = evaluateCount(listed, names.length, quorum)
        if (verdict.passed) {
          ctx.ledger.recordPass(`Found ${listed}/${names.length} sessions in list`)
        } else {
          ctx.ledger.recordFail(`Only found ${listed}/${names.length} sessions (needed ${verdict.required})`)
        }
      }
    } finally {
      await ctx.sessions.cleanupMany(names)
    }
  },
}
