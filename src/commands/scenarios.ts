import { Command } from "@effect/cli"
import { Console, Effect } from "effect"
import { SCENARIOS } from "../scenarios/index.js"

export const scenariosCommand = Command.make("scenarios", {}, () =>
  Effect.gen(function* () {
    const width = Math.max(...SCENARIOS.map((scenario) => scenario.id.length))
    for (const scenario of SCENARIOS) {
      yield* Console.log(`${scenario.id.padEnd(width)}  ${scenario.title}`)
    }
  }),
)
