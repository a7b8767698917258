import { describe, expect, it } from "vitest"
import { pickDirection } from "../concurrentOps.js"
import { classifyErrorPath } from "../edgeCases.js"
import { parseScenarioList, SCENARIOS, selectScenarios } from "../index.js"

describe("scenario registry", () => {
  it("lists fourteen scenarios with unique ids", () => {
    const ids = SCENARIOS.map((scenario) => scenario.id)
    expect(ids).toHaveLength(14)
    expect(new Set(ids).size).toBe(14)
    expect(ids[0]).toBe("lifecycle")
    expect(ids[ids.length - 1]).toBe("display")
  })

  it("filters by only and skip while keeping registry order", () => {
    expect(selectScenarios({ only: ["buffers", "lifecycle", "stress"], skip: ["stress"] }).map((s) => s.id)).toEqual([
      "lifecycle",
      "buffers",
    ])
    expect(selectScenarios({ only: [] })).toHaveLength(14)
  })

  it("rejects unknown ids", () => {
    expect(() => selectScenarios({ skip: ["teleport"] })).toThrow("Unknown scenario id(s): teleport.")
  })

  it("splits comma lists", () => {
    expect(parseScenarioList(" panes, ,windows ")).toEqual(["panes", "windows"])
    expect(parseScenarioList(null)).toEqual([])
  })
})

describe("classifyErrorPath", () => {
  it("treats a non-zero exit or an error token as signalled", () => {
    expect(classifyErrorPath({ kind: "completed", exitCode: 1, stdout: "", stderr: "" })).toBe("signalled")
    expect(classifyErrorPath({ kind: "completed", exitCode: 0, stdout: "", stderr: "session not found" })).toBe(
      "signalled",
    )
  })

  it("flags a clean success as silent and a timeout as indeterminate", () => {
    expect(classifyErrorPath({ kind: "completed", exitCode: 0, stdout: "", stderr: "" })).toBe("silent")
    expect(classifyErrorPath({ kind: "timedOut", timeoutMs: 10 })).toBe("indeterminate")
  })
})

describe("pickDirection", () => {
  it("maps the unit interval onto the four directions", () => {
    expect([0, 0.3, 0.6, 0.99].map((value) => pickDirection(() => value))).toEqual(["up", "down", "left", "right"])
    expect(pickDirection(() => 1)).toBe("right")
  })
})
