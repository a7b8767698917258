export interface Invocation {
  readonly args: readonly string[]
  readonly timeoutMs: number
}

export interface CompletedOutcome {
  readonly kind: "completed"
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

export interface TimedOutOutcome {
  readonly kind: "timedOut"
  readonly timeoutMs: number
}

export type Outcome = CompletedOutcome | TimedOutOutcome

/**
 * Anything that can execute multiplexer invocations. The real implementation spawns the target
 * binary; tests plug in an in-memory multiplexer.
 */
export interface CommandRunner {
  readonly binary: string
  run(invocation: Invocation): Promise<Outcome>
  /** Fire-and-forget spawn; returns before the target is ready. */
  launch(args: readonly string[]): void
}

export const createInvocation = (args: readonly string[], timeoutMs: number): Invocation =>
  Object.freeze({ args: Object.freeze([...args]), timeoutMs })

export const isSuccess = (outcome: Outcome): outcome is CompletedOutcome =>
  outcome.kind === "completed" && outcome.exitCode === 0

export const stdoutOf = (outcome: Outcome): string => (outcome.kind === "completed" ? outcome.stdout : "")

export const describeOutcome = (outcome: Outcome): string => {
  if (outcome.kind === "timedOut") return `timed out after ${outcome.timeoutMs}ms`
  const stderr = outcome.stderr.trim()
  return stderr ? `exit ${outcome.exitCode}: ${stderr}` : `exit ${outcome.exitCode}`
}
