import { Command, Options } from "@effect/cli"
import { Effect, Option } from "effect"
import { ConfigError } from "../config/errors.js"
import type { HarnessConfigInput, ResolvedHarnessConfig } from "../config/types.js"
import { createLogger } from "../logging/logger.js"
import { runOrchestrator } from "../orchestrator/runOrchestrator.js"
import { writeRunReport } from "../orchestrator/runReport.js"
import { SpawnError } from "../runner/errors.js"
import { createProcessRunner } from "../runner/processRunner.js"
import { createInvocation } from "../runner/types.js"
import { parseScenarioList, selectScenarios, type Scenario } from "../scenarios/index.js"
import { binaryOption, configPathOption, loadCommandConfig, strictConfigOption } from "./sharedOptions.js"

/** Exit status for a run that never started: bad configuration or an unusable binary. */
export const PREFLIGHT_EXIT_CODE = 2

const onlyOption = Options.text("only").pipe(
  Options.withDescription("Comma-separated scenario ids to run"),
  Options.optional,
)
const skipOption = Options.text("skip").pipe(
  Options.withDescription("Comma-separated scenario ids to leave out"),
  Options.optional,
)
const workersOption = Options.integer("workers").pipe(Options.optional)
const timeoutOption = Options.integer("timeout-ms").pipe(
  Options.withDescription("Per-command timeout in milliseconds"),
  Options.optional,
)
const toleranceOption = Options.integer("quorum-tolerance").pipe(Options.optional)
const syncOption = Options.choice("sync", ["fixed", "poll"] as const).pipe(Options.optional)
const pacingOption = Options.float("pacing").pipe(
  Options.withDescription("Multiplier for inter-step pauses (0 disables them)"),
  Options.optional,
)
const reportOption = Options.text("report").pipe(
  Options.withDescription("Write a JSON run report to this path"),
  Options.optional,
)

export const runCommand = Command.make(
  "run",
  {
    binary: binaryOption,
    config: configPathOption,
    strictConfig: strictConfigOption,
    only: onlyOption,
    skip: skipOption,
    workers: workersOption,
    timeoutMs: timeoutOption,
    quorumTolerance: toleranceOption,
    sync: syncOption,
    pacing: pacingOption,
    report: reportOption,
  },
  (args) =>
    Effect.tryPromise(async () => {
      const overrides: HarnessConfigInput = {}
      const workers = Option.getOrNull(args.workers)
      if (workers !== null) overrides.concurrency = { workers }
      const timeoutMs = Option.getOrNull(args.timeoutMs)
      if (timeoutMs !== null) overrides.commandTimeoutMs = timeoutMs
      const tolerance = Option.getOrNull(args.quorumTolerance)
      if (tolerance !== null) overrides.quorum = { tolerance }
      const sync = Option.getOrNull(args.sync)
      if (sync !== null) overrides.sync = { mode: sync }
      const pacing = Option.getOrNull(args.pacing)
      if (pacing !== null) overrides.pacing = { factor: pacing }
      const reportPath = Option.getOrNull(args.report)
      if (reportPath !== null) overrides.report = { path: reportPath }

      let config: ResolvedHarnessConfig
      let scenarios: Scenario[]
      try {
        config = await loadCommandConfig(args, overrides)
        scenarios = selectScenarios({
          only: parseScenarioList(Option.getOrNull(args.only)),
          skip: parseScenarioList(Option.getOrNull(args.skip)),
        })
      } catch (error) {
        console.error(error instanceof Error ? error.message : String(error))
        if (!(error instanceof ConfigError)) {
          console.error("Run `mux-battle scenarios` for the list of ids.")
        }
        process.exitCode = PREFLIGHT_EXIT_CODE
        return
      }

      const logger = createLogger({ level: config.logLevel })
      for (const warning of config.meta.warnings) {
        logger.warn(warning)
      }
      const runner = createProcessRunner({ binary: config.binary, logger })

      try {
        await runner.run(createInvocation(["--version"], config.commandTimeoutMs))
      } catch (error) {
        if (error instanceof SpawnError) {
          console.error(error.message)
          console.error("Set --binary or MUX_BATTLE_BINARY to a multiplexer on PATH.")
          process.exitCode = PREFLIGHT_EXIT_CODE
          return
        }
        throw error
      }

      const summary = await runOrchestrator({ config, runner, scenarios, logger })
      if (config.report.path) {
        const written = await writeRunReport(config.report.path, summary)
        logger.info(`Run report written to ${written}`)
      }
      process.exitCode = summary.exitCode
    }),
)
