import { LAYOUTS } from "../runner/muxClient.js"
import { checkSucceeded, openSession, splitTimes } from "./checks.js"
import type { Scenario } from "./types.js"

export const layoutsScenario: Scenario = {
  id: "layouts",
  title: "LAYOUT TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("layout_test")
    await openSession(ctx, session)
    try {
      await splitTimes(ctx, session, 3, 200)
      for (const layout of LAYOUTS) {
        ctx.reporter.test(`Apply layout: ${layout}`)
        const outcome = await ctx.mux.selectLayout(session, layout)
        await ctx.pause(300)
        checkSucceeded(ctx, [outcome], `${layout} applied`, `${layout} rejected`)
      }
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
