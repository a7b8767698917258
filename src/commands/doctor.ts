import { Command } from "@effect/cli"
import { Effect } from "effect"
import { resolveUserConfigPath } from "../config/load.js"
import { SpawnError } from "../runner/errors.js"
import { createProcessRunner } from "../runner/processRunner.js"
import { createInvocation, describeOutcome, isSuccess } from "../runner/types.js"
import { PREFLIGHT_EXIT_CODE } from "./run.js"
import { binaryOption, configPathOption, loadCommandConfig, strictConfigOption } from "./sharedOptions.js"

export const doctorCommand = Command.make(
  "doctor",
  {
    binary: binaryOption,
    config: configPathOption,
    strictConfig: strictConfigOption,
  },
  (args) =>
    Effect.tryPromise(async () => {
      const config = await loadCommandConfig(args)
      const runner = createProcessRunner({ binary: config.binary })

      console.log("mux-battle doctor")
      console.log(`Binary: ${config.binary}`)
      console.log(`User config: ${resolveUserConfigPath()}`)
      console.log(`Config sources: ${config.meta.sources.join(" -> ")}`)

      try {
        const version = await runner.run(createInvocation(["--version"], config.commandTimeoutMs))
        if (isSuccess(version)) {
          console.log(`Version: ${version.stdout.trim() || "(empty)"}`)
        } else {
          console.error(`Version check failed (${describeOutcome(version)})`)
        }
        const help = await runner.run(createInvocation(["--help"], config.commandTimeoutMs))
        console.log(`--help: ${help.kind === "completed" ? `exit ${help.exitCode}` : describeOutcome(help)}`)
      } catch (error) {
        if (!(error instanceof SpawnError)) throw error
        console.error(error.message)
        process.exitCode = PREFLIGHT_EXIT_CODE
      }
    }),
)
