import { DEFAULT_SYSTEM_CLOCK } from "../clock/systemClock.js"
import type { HarnessClock } from "../clock/HarnessClock.js"
import type { HarnessConfig } from "../config/types.js"
import { ResultLedger, type LedgerEntry, type LedgerSnapshot } from "../ledger/resultLedger.js"
import { SILENT_LOGGER, type Logger } from "../logging/logger.js"
import { createStateProbe } from "../probe/stateProbe.js"
import { createReporter, formatTimestamp, type Reporter } from "../report/reporter.js"
import { createMuxClient } from "../runner/muxClient.js"
import type { CommandRunner } from "../runner/types.js"
import { SCENARIOS, type Scenario, type ScenarioContext } from "../scenarios/index.js"
import { CleanupRegistry } from "../session/cleanupRegistry.js"
import { createSessionManager } from "../session/sessionManager.js"

export interface OrchestratorOptions {
  readonly config: HarnessConfig
  readonly runner: CommandRunner
  readonly scenarios?: readonly Scenario[]
  readonly clock?: HarnessClock
  readonly reporter?: Reporter
  readonly logger?: Logger
  readonly random?: () => number
  readonly now?: () => Date
}

export interface RunSummary {
  readonly binary: string
  readonly scenarios: readonly string[]
  readonly startedAt: Date
  readonly finishedAt: Date
  readonly snapshot: LedgerSnapshot
  readonly entries: readonly LedgerEntry[]
  readonly swept: readonly string[]
  readonly leaked: readonly string[]
  readonly exitCode: number
}

export const exitCodeFor = (snapshot: LedgerSnapshot): number => (snapshot.failed === 0 ? 0 : 1)

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error))

export interface Harness {
  readonly context: ScenarioContext
  readonly registry: CleanupRegistry
  readonly ledger: ResultLedger
}

/** Wires runner, probe, session manager and ledger into the context every scenario receives. */
export const buildHarness = (options: OrchestratorOptions & { reporter: Reporter }): Harness => {
  const { config, runner, reporter } = options
  const clock = options.clock ?? DEFAULT_SYSTEM_CLOCK
  const logger = options.logger ?? SILENT_LOGGER
  const registry = new CleanupRegistry()
  const ledger = new ResultLedger((kind, message) => reporter.result(kind, message))
  const mux = createMuxClient({ runner, timeoutMs: config.commandTimeoutMs })
  const probe = createStateProbe(mux)
  const sessions = createSessionManager({
    mux,
    probe,
    clock,
    settle: config.settle,
    sync: config.sync,
    registry,
    logger,
  })
  const context: ScenarioContext = {
    mux,
    probe,
    sessions,
    ledger,
    reporter,
    logger,
    settings: {
      sessionPrefix: config.sessionPrefix,
      workers: config.concurrency.workers,
      concurrentSessions: config.concurrency.sessions,
      quorum: config.quorum,
    },
    random: options.random ?? Math.random,
    pause: (delayMs) => clock.sleep(delayMs * config.pacing.factor),
    sessionName: (suffix) => `${config.sessionPrefix}${suffix}`,
  }
  return { context, registry, ledger }
}

export const runOrchestrator = async (options: OrchestratorOptions): Promise<RunSummary> => {
  const { config } = options
  const reporter = options.reporter ?? createReporter()
  const logger = options.logger ?? SILENT_LOGGER
  const now = options.now ?? (() => new Date())
  const scenarios = options.scenarios ?? SCENARIOS
  const { context, registry, ledger } = buildHarness({ ...options, reporter })

  const startedAt = now()
  reporter.banner(["Multiplexer Battle Test Suite", "Conformance and stress checks"])
  reporter.info(`Binary: ${options.runner.binary}`)
  reporter.info(`Started: ${formatTimestamp(startedAt)}`)

  for (const scenario of scenarios) {
    reporter.section(scenario.title)
    logger.debug(`scenario ${scenario.id} starting`)
    try {
      await scenario.run(context)
    } catch (error) {
      logger.debug(`scenario ${scenario.id} threw: ${messageOf(error)}`)
      ledger.recordFail(`${scenario.title} aborted: ${messageOf(error)}`)
    }
  }

  reporter.section("FINAL CLEANUP")
  registry.registerAll(config.cleanup.extraNames)
  const swept = registry.names()
  reporter.info(`Sweeping ${registry.size} session name(s)`)
  await context.sessions.cleanupMany(swept)

  const leaked: string[] = []
  if (config.cleanup.verify) {
    try {
      for (const name of swept) {
        if (await context.probe.exists(name)) leaked.push(name)
      }
      if (leaked.length === 0) {
        ledger.recordPass("Cleanup sweep left no sessions behind")
      } else {
        ledger.recordFail(`Sessions still present after cleanup: ${leaked.join(", ")}`)
      }
    } catch (error) {
      ledger.recordFail(`Cleanup verification aborted: ${messageOf(error)}`)
    }
  }

  const finishedAt = now()
  const snapshot = ledger.snapshot()
  reporter.section("TEST SUMMARY")
  reporter.summary({ snapshot, finishedAt })

  return {
    binary: options.runner.binary,
    scenarios: scenarios.map((scenario) => scenario.id),
    startedAt,
    finishedAt,
    snapshot,
    entries: ledger.entries(),
    swept,
    leaked,
    exitCode: exitCodeFor(snapshot),
  }
}
