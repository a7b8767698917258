import { describeOutcome, isSuccess, type Outcome } from "../runner/types.js"
import type { ScenarioContext } from "./types.js"

export interface CommandTally {
  readonly total: number
  readonly succeeded: number
  readonly nonZero: number
  readonly timedOut: number
  readonly firstProblem: string | null
}

export const tallyOutcomes = (outcomes: readonly Outcome[]): CommandTally => {
  let succeeded = 0
  let nonZero = 0
  let timedOut = 0
  let firstProblem: string | null = null
  for (const outcome of outcomes) {
    if (isSuccess(outcome)) {
      succeeded += 1
      continue
    }
    if (outcome.kind === "timedOut") timedOut += 1
    else nonZero += 1
    firstProblem ??= describeOutcome(outcome)
  }
  return { total: outcomes.length, succeeded, nonZero, timedOut, firstProblem }
}

/** Runs `step` `count` times in order, pausing `pauseMs` after each call. */
export const repeatCommand = async (
  ctx: ScenarioContext,
  count: number,
  step: (index: number) => Promise<Outcome>,
  pauseMs = 0,
): Promise<Outcome[]> => {
  const outcomes: Outcome[] = []
  for (let index = 0; index < count; index += 1) {
    outcomes.push(await step(index))
    if (pauseMs > 0) await ctx.pause(pauseMs)
  }
  return outcomes
}

/** Every command completed with exit code 0. */
export const checkSucceeded = (
  ctx: ScenarioContext,
  outcomes: readonly Outcome[],
  passMessage: string,
  failMessage: string,
): boolean => {
  const tally = tallyOutcomes(outcomes)
  if (tally.succeeded === tally.total) {
    ctx.ledger.recordPass(passMessage)
    return true
  }
  ctx.ledger.recordFail(
    `${failMessage} (${tally.total - tally.succeeded}/${tally.total} failed, first: ${tally.firstProblem ?? "unknown"})`,
  )
  return false
}

/**
 * No command hung past its timeout. Non-zero exits are noted but tolerated: navigation at an edge
 * or a split with no room left is a legitimate refusal, not a crash.
 */
export const checkSettled = (
  ctx: ScenarioContext,
  outcomes: readonly Outcome[],
  passMessage: string,
  failMessage: string,
): boolean => {
  const tally = tallyOutcomes(outcomes)
  if (tally.timedOut > 0) {
    ctx.ledger.recordFail(`${failMessage} (${tally.timedOut}/${tally.total} timed out)`)
    return false
  }
  ctx.ledger.recordPass(tally.nonZero > 0 ? `${passMessage} (${tally.nonZero} refused)` : passMessage)
  return true
}

/** Pass when stdout has content; otherwise fail or skip depending on whether output is guaranteed. */
export const checkOutput = (
  ctx: ScenarioContext,
  outcome: Outcome,
  passMessage: string,
  emptyMessage: string,
  whenEmpty: "fail" | "skip",
): boolean => {
  if (outcome.kind === "completed" && outcome.stdout.trim().length > 0) {
    ctx.ledger.recordPass(passMessage)
    return true
  }
  const detail = outcome.kind === "timedOut" ? ` (${describeOutcome(outcome)})` : ""
  if (whenEmpty === "fail") ctx.ledger.recordFail(`${emptyMessage}${detail}`)
  else ctx.ledger.recordSkip(`${emptyMessage}${detail}`)
  return false
}

/** Kill a session and confirm it is gone. */
export const checkKilled = async (ctx: ScenarioContext, name: string): Promise<boolean> => {
  await ctx.sessions.kill(name)
  if (!(await ctx.probe.exists(name))) {
    ctx.ledger.recordPass(`Session '${name}' killed`)
    return true
  }
  ctx.ledger.recordFail(`Session '${name}' still exists after kill`)
  return false
}

export const openSession = async (ctx: ScenarioContext, name: string): Promise<boolean> => {
  const created = await ctx.sessions.create(name)
  if (!created) {
    ctx.logger.warn(`session '${name}' did not come up; continuing against it anyway`)
  }
  return created
}

export const splitTimes = async (ctx: ScenarioContext, name: string, count: number, pauseMs: number) =>
  repeatCommand(ctx, count, () => ctx.mux.splitWindow(name, "vertical"), pauseMs)
