import { describeOutcome, isSuccess, type Outcome } from "../runner/types.js"
import type { Scenario } from "./types.js"

const ERROR_TOKENS = /error|not found/i

export const SPECIAL_NAME_SUFFIXES = ["test-dash", "test_underscore", "Test123", "a".repeat(30)] as const

export type ErrorPathVerdict = "signalled" | "silent" | "indeterminate"

/** Whether the target reported a failure for a command that had to fail. */
export const classifyErrorPath = (outcome: Outcome): ErrorPathVerdict => {
  if (outcome.kind === "timedOut") return "indeterminate"
  if (outcome.exitCode !== 0 || ERROR_TOKENS.test(outcome.stderr)) return "signalled"
  return "silent"
}

export const edgeCasesScenario: Scenario = {
  id: "edge-cases",
  title: "EDGE CASE TESTS",
  run: async (ctx) => {
    ctx.reporter.test("Command on non-existent session")
    const missing = ctx.sessionName("does_not_exist_42")
    const outcome = await ctx.mux.splitWindow(missing)
    const verdict = classifyErrorPath(outcome)
    if (verdict === "signalled") {
      ctx.ledger.recordPass("Correctly handles non-existent session")
    } else if (verdict === "indeterminate") {
      ctx.ledger.recordSkip(`Error handling unclear (${describeOutcome(outcome)})`)
    } else {
      ctx.ledger.recordFail("split-window on a missing session reported success")
    }

    ctx.reporter.test("Session with special names")
    const names = SPECIAL_NAME_SUFFIXES.map((suffix) => ctx.sessionName(suffix))
    const leftovers: string[] = []
    let accepted = 0
    for (const name of names) {
      if (await ctx.sessions.create(name)) {
        accepted += 1
        await ctx.sessions.kill(name)
      }
      if (await ctx.probe.exists(name)) leftovers.push(name)
    }
    if (leftovers.length === 0) {
      ctx.ledger.recordPass(`Various session names handled (${accepted}/${names.length} accepted)`)
    } else {
      ctx.ledger.recordFail(`Sessions left behind after kill: ${leftovers.join(", ")}`)
    }

    ctx.reporter.test("Help command")
    const help = await ctx.mux.help()
    if (isSuccess(help)) ctx.ledger.recordPass("Help command works")
    else ctx.ledger.recordFail(`Help command failed (${describeOutcome(help)})`)

    ctx.reporter.test("Version command")
    const version = await ctx.mux.version()
    if (isSuccess(version)) ctx.ledger.recordPass(`Version: ${version.stdout.trim()}`)
    else ctx.ledger.recordFail(`Version command failed (${describeOutcome(version)})`)
  },
}
