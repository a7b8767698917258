import { checkOutput, checkSucceeded, openSession } from "./checks.js"
import type { Scenario } from "./types.js"

export const BUFFER_TEXT = "Test buffer content 12345"

export const buffersScenario: Scenario = {
  id: "buffers",
  title: "BUFFER TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("buffer_test")
    await openSession(ctx, session)
    try {
      ctx.reporter.test("Set buffer")
      checkSucceeded(ctx, [await ctx.mux.setBuffer(session, BUFFER_TEXT)], "Buffer set", "set-buffer failed")

      ctx.reporter.test("List buffers")
      checkSucceeded(ctx, [await ctx.mux.listBuffers(session)], "list-buffers executed", "list-buffers failed")

      // Buffer storage is not required to round-trip through show-buffer; missing text is
      // indeterminate rather than wrong.
      ctx.reporter.test("Show buffer")
      const shown = await ctx.mux.showBuffer(session)
      if (shown.kind === "completed" && shown.stdout.includes(BUFFER_TEXT)) {
        ctx.ledger.recordPass("show-buffer returned the stored text")
      } else {
        ctx.ledger.recordSkip("show-buffer did not return the stored text")
      }

      ctx.reporter.test("Capture pane")
      checkOutput(ctx, await ctx.mux.capturePane(session), "capture-pane returned content", "capture-pane returned empty", "skip")
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
