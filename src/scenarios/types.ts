import type { QuorumPolicy } from "../concurrency/quorum.js"
import type { ResultLedger } from "../ledger/resultLedger.js"
import type { Logger } from "../logging/logger.js"
import type { StateProbe } from "../probe/stateProbe.js"
import type { Reporter } from "../report/reporter.js"
import type { MuxClient } from "../runner/muxClient.js"
import type { SessionManager } from "../session/sessionManager.js"

export interface ScenarioSettings {
  readonly sessionPrefix: string
  readonly workers: number
  readonly concurrentSessions: number
  readonly quorum: QuorumPolicy
}

export interface ScenarioContext {
  readonly mux: MuxClient
  readonly probe: StateProbe
  readonly sessions: SessionManager
  readonly ledger: ResultLedger
  readonly reporter: Reporter
  readonly logger: Logger
  readonly settings: ScenarioSettings
  readonly random: () => number
  /** Inter-step pause, scaled by the configured pacing factor. */
  pause(delayMs: number): Promise<void>
  sessionName(suffix: string): string
}

export interface Scenario {
  readonly id: string
  readonly title: string
  run(ctx: ScenarioContext): Promise<void>
}
