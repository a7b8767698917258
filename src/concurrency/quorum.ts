export interface QuorumPolicy {
  /** Failures tolerated per batch. */
  readonly tolerance: number
}

export interface QuorumVerdict {
  readonly passed: boolean
  readonly succeeded: number
  readonly total: number
  readonly required: number
}

export const requiredSuccesses = (total: number, policy: QuorumPolicy): number =>
  Math.max(0, total - Math.max(0, Math.floor(policy.tolerance)))

export const evaluateCount = (succeeded: number, total: number, policy: QuorumPolicy): QuorumVerdict => {
  const required = requiredSuccesses(total, policy)
  return { passed: total > 0 && succeeded >= required, succeeded, total, required }
}

export const evaluateQuorum = (results: readonly boolean[], policy: QuorumPolicy): QuorumVerdict =>
  evaluateCount(results.filter((value) => value).length, results.length, policy)
