import { checkKilled, checkSucceeded, openSession, splitTimes } from "./checks.js"
import type { Scenario } from "./types.js"

export const killScenario: Scenario = {
  id: "kill",
  title: "KILL OPERATIONS TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("kill_test")
    await openSession(ctx, session)
    try {
      ctx.reporter.test("Create and kill panes")
      await splitTimes(ctx, session, 3, 200)
      const killedPane = await ctx.mux.killPane(session)
      await ctx.pause(300)
      checkSucceeded(ctx, [killedPane], "Pane killed", "kill-pane failed")

      ctx.reporter.test("Create and kill windows")
      await ctx.mux.newWindow(session)
      await ctx.mux.newWindow(session)
      await ctx.pause(300)
      const killedWindow = await ctx.mux.killWindow(session)
      await ctx.pause(300)
      checkSucceeded(ctx, [killedWindow], "Window killed", "kill-window failed")

      ctx.reporter.test("Kill session")
      await checkKilled(ctx, session)
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
