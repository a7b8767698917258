import { checkSettled, checkSucceeded, openSession, repeatCommand } from "./checks.js"
import type { Scenario } from "./types.js"

const SPECIAL_KEYS = ["Tab", "Escape", "Up", "Down", "Left", "Right"] as const
const RAPID_COMMANDS = 20

export const sendKeysScenario: Scenario = {
  id: "send-keys",
  title: "SEND-KEYS TESTS",
  run: async (ctx) => {
    const session = ctx.sessionName("keys_test")
    await openSession(ctx, session)
    try {
      ctx.reporter.test("Send basic keys")
      const basic = await ctx.mux.sendKeys(session, ["echo hello", "Enter"])
      await ctx.pause(300)
      checkSucceeded(ctx, [basic], "Basic keys sent", "Basic send-keys failed")

      ctx.reporter.test("Send literal keys")
      const literal = await ctx.mux.sendKeys(session, ["test literal string"], { literal: true })
      checkSucceeded(ctx, [literal], "Literal keys sent", "Literal send-keys failed")

      ctx.reporter.test("Send special keys")
      const special = await repeatCommand(
        ctx,
        SPECIAL_KEYS.length,
        (index) => ctx.mux.sendKeys(session, [SPECIAL_KEYS[index]]),
        50,
      )
      checkSucceeded(ctx, special, "Special keys sent", "Special key injection failed")

      ctx.reporter.test(`Rapid send-keys (${RAPID_COMMANDS} commands)`)
      const rapid = await repeatCommand(
        ctx,
        RAPID_COMMANDS,
        (index) => ctx.mux.sendKeys(session, [`echo test${index}`, "Enter"]),
        20,
      )
      checkSettled(ctx, rapid, "Rapid send completed", "Rapid send-keys stalled")
    } finally {
      await ctx.sessions.kill(session)
    }
  },
}
