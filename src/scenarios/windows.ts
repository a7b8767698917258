import { checkOutput, checkSettled, checkSucceeded, openSession, repeatCommand } from "./checks.js"
import type { Scenario } from "./types.js"

const WINDOW_COUNT = 5
const NAVIGATION_ROUNDS = 10
const SELECTED_INDICES = 3

export const windowsScenario: Scenario = {
  id: "windows",
  title: "WINDOW OPERATIONS TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("window_test")
    await openSession(ctx, session)
    try {
      ctx.reporter.test(`Create ${WINDOW_COUNT} windows`)
      const created = await repeatCommand(ctx, WINDOW_COUNT, () => ctx.mux.newWindow(session), 200)
      checkSucceeded(ctx, created, `${WINDOW_COUNT} windows created`, "new-window failed")

      ctx.reporter.test("List windows")
      checkOutput(ctx, await ctx.mux.listWindows(session), "list-windows returned data", "list-windows failed", "fail")

      ctx.reporter.test("Window navigation")
      const navigation = await repeatCommand(ctx, NAVIGATION_ROUNDS * 2, (index) =>
        index % 2 === 0 ? ctx.mux.nextWindow(session) : ctx.mux.previousWindow(session),
      )
      checkSettled(ctx, navigation, "Window navigation completed", "Window navigation stalled")

      ctx.reporter.test("Select window by index")
      const selected = await repeatCommand(ctx, SELECTED_INDICES, (index) => ctx.mux.selectWindow(session, index), 100)
      checkSettled(ctx, selected, "Window selection by index works", "Window selection stalled")
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
