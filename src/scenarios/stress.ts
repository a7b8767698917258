import { evaluateQuorum } from "../concurrency/quorum.js"
import type { Outcome } from "../runner/types.js"
import { checkSettled, openSession } from "./checks.js"
import type { Scenario } from "./types.js"

const MIXED_ROUNDS = 25
const RAPID_CYCLES = 10

export const stressScenario: Scenario = {
  id: "stress",
  title: "STRESS TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("stress_test")
    await openSession(ctx, session)
    try {
      ctx.reporter.test(`Stress: ${MIXED_ROUNDS * 4} mixed operations`)
      const outcomes: Outcome[] = []
      for (let round = 0; round < MIXED_ROUNDS; round += 1) {
        outcomes.push(await ctx.mux.splitWindow(session, "vertical"))
        outcomes.push(await ctx.mux.selectPane(session, "up"))
        outcomes.push(await ctx.mux.resizePane(session, "down", 1))
        outcomes.push(await ctx.mux.sendKeys(session, ["echo test", "Enter"]))
        await ctx.pause(20)
      }
      checkSettled(ctx, outcomes, `${outcomes.length} operations completed`, "Mixed stress stalled")

      ctx.reporter.test(`Stress: Rapid session create/destroy (${RAPID_CYCLES} cycles)`)
      const created: boolean[] = []
      for (let cycle = 0; cycle < RAPID_CYCLES; cycle += 1) {
        const name = ctx.sessionName(`rapid_${cycle}`)
        created.push(await ctx.sessions.create(name))
        await ctx.sessions.kill(name)
      }
      const verdict = evaluateQuorum(created, ctx.settings.quorum)
      if (verdict.passed) {
        ctx.ledger.recordPass(`${RAPID_CYCLES} rapid cycles completed (${verdict.succeeded} sessions came up)`)
      } else {
        ctx.ledger.recordFail(`Only ${verdict.succeeded}/${verdict.total} rapid sessions came up`)
      }
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
