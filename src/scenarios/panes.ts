import { DIRECTIONS } from "../runner/muxClient.js"
import { checkOutput, checkSettled, checkSucceeded, openSession, repeatCommand } from "./checks.js"
import type { Scenario } from "./types.js"

const RAPID_SPLITS = 6
const NAVIGATION_CYCLES = 5

export const panesScenario: Scenario = {
  id: "panes",
  title: "PANE OPERATIONS TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("pane_test")
    await openSession(ctx, session)
    try {
      ctx.reporter.test("Vertical split")
      const vertical = await ctx.mux.splitWindow(session, "vertical")
      await ctx.pause(300)
      checkSucceeded(ctx, [vertical], "Vertical split created", "Vertical split failed")

      ctx.reporter.test("Horizontal split")
      const horizontal = await ctx.mux.splitWindow(session, "horizontal")
      await ctx.pause(300)
      checkSucceeded(ctx, [horizontal], "Horizontal split created", "Horizontal split failed")

      ctx.reporter.test("Multiple rapid splits")
      const rapid = await repeatCommand(
        ctx,
        RAPID_SPLITS,
        (index) => ctx.mux.splitWindow(session, index % 2 === 0 ? "vertical" : "horizontal"),
        200,
      )
      checkSettled(ctx, rapid, `${RAPID_SPLITS} additional splits created`, "Rapid splits stalled")

      ctx.reporter.test("List panes")
      checkOutput(ctx, await ctx.mux.listPanes(session), "list-panes returned data", "list-panes failed", "fail")

      ctx.reporter.test("Pane navigation all directions")
      const navigation = await repeatCommand(
        ctx,
        DIRECTIONS.length * NAVIGATION_CYCLES,
        (index) => ctx.mux.selectPane(session, DIRECTIONS[index % DIRECTIONS.length]),
        50,
      )
      checkSettled(ctx, navigation, "Pane navigation completed", "Pane navigation stalled")
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
