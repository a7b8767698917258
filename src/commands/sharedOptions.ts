import { Options } from "@effect/cli"
import { Option } from "effect"
import { resolveHarnessConfig } from "../config/load.js"
import type { HarnessConfigInput, ResolvedHarnessConfig } from "../config/types.js"

export const configPathOption = Options.text("config").pipe(
  Options.withDescription("Extra YAML config file, applied after repo and user files"),
  Options.optional,
)
export const strictConfigOption = Options.boolean("strict-config").pipe(
  Options.withDescription("Treat unknown config keys as errors"),
  Options.optional,
)
export const binaryOption = Options.text("binary").pipe(
  Options.withDescription("Multiplexer executable under test"),
  Options.optional,
)

export interface SharedConfigArgs {
  readonly config: Option.Option<string>
  readonly strictConfig: Option.Option<boolean>
  readonly binary: Option.Option<string>
}

export const loadCommandConfig = async (
  args: SharedConfigArgs,
  overrides: HarnessConfigInput = {},
): Promise<ResolvedHarnessConfig> => {
  const binary = Option.getOrNull(args.binary)
  return await resolveHarnessConfig({
    workspace: process.cwd(),
    cliConfigPath: Option.getOrNull(args.config),
    // An absent flag parses as false; only an explicit --strict-config overrides the environment.
    cliStrict: Option.getOrNull(args.strictConfig) || null,
    overrides: binary ? { ...overrides, binary } : overrides,
  })
}
