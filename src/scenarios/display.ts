import { stdoutOf } from "../runner/types.js"
import { checkOutput, openSession } from "./checks.js"
import type { Scenario } from "./types.js"

export const DISPLAY_FORMAT = "#S:#I:#W"

export const displayScenario: Scenario = {
  id: "display",
  title: "DISPLAY COMMAND TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("display_test")
    await openSession(ctx, session)
    try {
      ctx.reporter.test("display-message with format")
      const message = await ctx.mux.displayMessage(session, DISPLAY_FORMAT)
      const rendered = stdoutOf(message).trim()
      checkOutput(ctx, message, `display-message: ${rendered}`, "display-message returned empty", "skip")

      ctx.reporter.test("list-commands")
      checkOutput(ctx, await ctx.mux.listCommands(), "list-commands works", "list-commands failed", "fail")

      ctx.reporter.test("list-keys")
      checkOutput(ctx, await ctx.mux.listKeys(), "list-keys works", "list-keys returned empty", "skip")
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
