#!/usr/bin/env node
import { Command } from "@effect/cli"
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"
import { configCommand } from "./commands/config.js"
import { doctorCommand } from "./commands/doctor.js"
import { runCommand } from "./commands/run.js"
import { scenariosCommand } from "./commands/scenarios.js"

const root = Command.make("mux-battle", {}, () => Effect.succeed(undefined)).pipe(
  Command.withSubcommands([runCommand, scenariosCommand, configCommand, doctorCommand]),
)

const cli = Command.run(root, { name: "mux-battle", version: "0.1.0" })

const defaultedToRun = process.argv.length <= 2
const argv = defaultedToRun ? [...process.argv.slice(0, 2), "run"] : process.argv

cli(argv)
  .pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain)
