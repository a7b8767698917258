import { Command, Options } from "@effect/cli"
import { Effect } from "effect"
import { stringify } from "yaml"
import type { ResolvedHarnessConfig } from "../config/types.js"
import { binaryOption, configPathOption, loadCommandConfig, strictConfigOption } from "./sharedOptions.js"

const outputOption = Options.choice("output", ["json", "yaml", "summary"] as const).pipe(Options.withDefault("json"))

export const summarizeConfig = (resolved: ResolvedHarnessConfig): string[] => {
  const lines = [
    "Effective harness config",
    `binary: ${resolved.binary}`,
    `commandTimeoutMs: ${resolved.commandTimeoutMs}`,
    `sessionPrefix: ${resolved.sessionPrefix}`,
    `settle: short ${resolved.settle.shortMs}ms, long ${resolved.settle.longMs}ms`,
    `sync.mode: ${resolved.sync.mode}`,
    `pacing.factor: ${resolved.pacing.factor}`,
    `concurrency: ${resolved.concurrency.workers} workers, ${resolved.concurrency.sessions} sessions`,
    `quorum.tolerance: ${resolved.quorum.tolerance}`,
    `cleanup.verify: ${resolved.cleanup.verify}`,
    `report.path: ${resolved.report.path ?? "none"}`,
    `logLevel: ${resolved.logLevel}`,
    `meta.strict: ${resolved.meta.strict}`,
    `meta.sources: ${resolved.meta.sources.join(" -> ")}`,
  ]
  if (resolved.cleanup.extraNames.length > 0) {
    lines.push(`cleanup.extraNames: ${resolved.cleanup.extraNames.join(", ")}`)
  }
  if (resolved.meta.warnings.length > 0) {
    lines.push("meta.warnings:", ...resolved.meta.warnings.map((warning) => `- ${warning}`))
  }
  return lines
}

export const configCommand = Command.make(
  "config",
  {
    binary: binaryOption,
    config: configPathOption,
    strictConfig: strictConfigOption,
    output: outputOption,
  },
  (args) =>
    Effect.tryPromise(async () => {
      const resolved = await loadCommandConfig(args)

      if (args.output === "yaml") {
        console.log(stringify(resolved))
        return
      }

      if (args.output === "summary") {
        for (const line of summarizeConfig(resolved)) {
          console.log(line)
        }
        return
      }

      console.log(JSON.stringify(resolved, null, 2))
    }),
)
