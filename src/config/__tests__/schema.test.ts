import { describe, expect, it } from "vitest"
import { validateHarnessConfigInput } from "../schema.js"

describe("harness config schema", () => {
  it("accepts a complete document", () => {
    const result = validateHarnessConfigInput(
      {
        binary: "tmux",
        commandTimeoutMs: 5_000,
        sessionPrefix: "ci_",
        settle: { shortMs: 100, longMs: 900 },
        sync: { mode: "poll", maxAttempts: 5, backoffFactor: 1.5, maxDelayMs: 800 },
        pacing: { factor: 0.5 },
        concurrency: { workers: 8, sessions: 10 },
        quorum: { tolerance: 0 },
        cleanup: { verify: false, extraNames: ["left_over"] },
        report: { path: "out/run.json" },
        logLevel: "debug",
      },
      { strictUnknownKeys: true },
    )
    expect(result.issues).toEqual([])
    expect(result.config.sync).toEqual({ mode: "poll", maxAttempts: 5, backoffFactor: 1.5, maxDelayMs: 800 })
    expect(result.config.cleanup).toEqual({ verify: false, extraNames: ["left_over"] })
  })

  it("coerces string values the environment layer produces", () => {
    const result = validateHarnessConfigInput(
      { concurrency: { workers: "6" }, cleanup: { verify: "off" }, logLevel: "WARN" },
      { strictUnknownKeys: false },
    )
    expect(result.issues).toEqual([])
    expect(result.config).toEqual({ concurrency: { workers: 6 }, cleanup: { verify: false }, logLevel: "warn" })
  })

  it("reports unknown keys as warnings, or errors when strict", () => {
    expect(validateHarnessConfigInput({ colour: "blue" }, { strictUnknownKeys: false }).issues).toEqual([
      { severity: "warning", path: "colour", message: "Unknown key." },
    ])
    expect(validateHarnessConfigInput({ sync: { speed: 1 } }, { strictUnknownKeys: true }).issues).toEqual([
      { severity: "error", path: "sync.speed", message: "Unknown key." },
    ])
  })

  it("rejects out-of-range and malformed values", () => {
    const { issues } = validateHarnessConfigInput(
      {
        binary: " ",
        sessionPrefix: "bad:prefix",
        sync: { mode: "sometimes", backoffFactor: 0.5 },
        concurrency: { workers: 0 },
        quorum: { tolerance: -1 },
        cleanup: { extraNames: "oops" },
      },
      { strictUnknownKeys: false },
    )
    expect(issues.map((issue) => `${issue.path}: ${issue.message}`)).toEqual([
      "binary: Expected non-empty string.",
      "sessionPrefix: Only letters, digits, '_' and '-' are allowed.",
      "sync.mode: Expected one of fixed, poll.",
      "sync.backoffFactor: Expected number >= 1.",
      "concurrency.workers: Expected positive integer.",
      "quorum.tolerance: Expected non-negative integer.",
      "cleanup.extraNames: Expected list of strings.",
    ])
  })

  it("rejects a non-object document", () => {
    expect(validateHarnessConfigInput(["a"], { strictUnknownKeys: false }).issues).toEqual([
      { severity: "error", path: "<root>", message: "Expected top-level object." },
    ])
  })
})
