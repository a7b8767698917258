import { DIRECTIONS } from "../runner/muxClient.js"
import { checkSettled, checkSucceeded, openSession, repeatCommand } from "./checks.js"
import type { Scenario } from "./types.js"

const RESIZE_STEPS = 5
const RESIZE_AMOUNT = 3

export const resizeScenario: Scenario = {
  id: "resize",
  title: "RESIZE OPERATIONS TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("resize_test")
    await openSession(ctx, session)
    try {
      await ctx.mux.splitWindow(session, "vertical")
      await ctx.mux.splitWindow(session, "horizontal")
      await ctx.pause(500)

      for (const direction of DIRECTIONS) {
        ctx.reporter.test(`Resize pane ${direction}`)
        const steps = await repeatCommand(
          ctx,
          RESIZE_STEPS,
          () => ctx.mux.resizePane(session, direction, RESIZE_AMOUNT),
          50,
        )
        checkSettled(ctx, steps, `Resize ${direction} completed`, `Resize ${direction} stalled`)
      }

      ctx.reporter.test("Zoom pane toggle")
      const zoomIn = await ctx.mux.toggleZoom(session)
      await ctx.pause(300)
      const zoomOut = await ctx.mux.toggleZoom(session)
      checkSucceeded(ctx, [zoomIn, zoomOut], "Zoom toggle completed", "Zoom toggle failed")
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
