import { checkKilled } from "./checks.js"
import type { Scenario } from "./types.js"

export const lifecycleScenario: Scenario = {
  id: "lifecycle",
  title: "SESSION LIFECYCLE TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("lifecycle_test")
    try {
      ctx.reporter.test("Create session")
      if (await ctx.sessions.create(session)) {
        ctx.ledger.recordPass(`Session '${session}' created`)
      } else {
        ctx.ledger.recordFail(`Failed to create session '${session}'`)
        return
      }

      ctx.reporter.test("List sessions")
      if (await ctx.probe.listContains(session)) {
        ctx.ledger.recordPass("Session appears in list")
      } else {
        ctx.ledger.recordFail("Session not in list")
      }

      ctx.reporter.test("Kill session")
      await checkKilled(ctx, session)
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
