import { buffersScenario } from "./buffers.js"
import { concurrentOpsScenario } from "./concurrentOps.js"
import { concurrentSessionsScenario } from "./concurrentSessions.js"
import { displayScenario } from "./display.js"
import { edgeCasesScenario } from "./edgeCases.js"
import { killScenario } from "./kill.js"
import { layoutsScenario } from "./layouts.js"
import { lifecycleScenario } from "./lifecycle.js"
import { panesScenario } from "./panes.js"
import { resizeScenario } from "./resize.js"
import { sendKeysScenario } from "./sendKeys.js"
import { stressScenario } from "./stress.js"
import { swapRotateScenario } from "./swapRotate.js"
import type { Scenario } from "./types.js"
import { windowsScenario } from "./windows.js"

export type { Scenario, ScenarioContext, ScenarioSettings } from "./types.js"

/** Run order. */
export const SCENARIOS: readonly Scenario[] = [
  lifecycleScenario,
  windowsScenario,
  panesScenario,
  resizeScenario,
  sendKeysScenario,
  killScenario,
  layoutsScenario,
  swapRotateScenario,
  buffersScenario,
  concurrentSessionsScenario,
  concurrentOpsScenario,
  stressScenario,
  edgeCasesScenario,
  displayScenario,
]

export interface ScenarioSelection {
  readonly only?: readonly string[]
  readonly skip?: readonly string[]
}

export const selectScenarios = (
  selection: ScenarioSelection = {},
  catalog: readonly Scenario[] = SCENARIOS,
): Scenario[] => {
  const known = new Set(catalog.map((scenario) => scenario.id))
  const unknown = [...(selection.only ?? []), ...(selection.skip ?? [])].filter((id) => !known.has(id))
  if (unknown.length > 0) {
    throw new Error(`Unknown scenario id(s): ${unknown.join(", ")}. Known: ${[...known].join(", ")}`)
  }
  const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : null
  const skip = new Set(selection.skip ?? [])
  return catalog.filter((scenario) => (only === null || only.has(scenario.id)) && !skip.has(scenario.id))
}

export const parseScenarioList = (value: string | null | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
