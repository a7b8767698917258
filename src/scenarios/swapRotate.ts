import { checkSettled, checkSucceeded, openSession, repeatCommand } from "./checks.js"
import type { Scenario } from "./types.js"

const ROTATIONS = 5

export const swapRotateScenario: Scenario = {
  id: "swap-rotate",
  title: "SWAP AND ROTATE TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("swap_test")
    await openSession(ctx, session)
    try {
      await ctx.mux.splitWindow(session, "vertical")
      await ctx.mux.splitWindow(session, "horizontal")
      await ctx.pause(500)

      ctx.reporter.test("Swap pane up/down")
      const up = await ctx.mux.swapPane(session, "up")
      const down = await ctx.mux.swapPane(session, "down")
      checkSucceeded(ctx, [up, down], "Swap operations completed", "swap-pane failed")

      ctx.reporter.test("Rotate window")
      const rotations = await repeatCommand(ctx, ROTATIONS, () => ctx.mux.rotateWindow(session), 100)
      checkSettled(ctx, rotations, `${ROTATIONS} rotations completed`, "rotate-window stalled")
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
