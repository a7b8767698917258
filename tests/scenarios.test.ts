import { describe, expect, it } from "vitest"
import { isSuccess, stdoutOf } from "../src/runner/types.js"
import { buffersScenario } from "../src/scenarios/buffers.js"
import { concurrentOpsScenario } from "../src/scenarios/concurrentOps.js"
import { concurrentSessionsScenario } from "../src/scenarios/concurrentSessions.js"
import { displayScenario } from "../src/scenarios/display.js"
import { edgeCasesScenario } from "../src/scenarios/edgeCases.js"
import { killScenario } from "../src/scenarios/kill.js"
import { lifecycleScenario } from "../src/scenarios/lifecycle.js"
import { stressScenario } from "../src/scenarios/stress.js"
import { windowsScenario } from "../src/scenarios/windows.js"
import { FakeMultiplexer } from "./helpers/fakeMultiplexer.js"
import { createScenarioHarness, testConfig } from "./helpers/harness.js"

const messages = (harness: ReturnType<typeof createScenarioHarness>) =>
  harness.ledger.entries().map((entry) => `${entry.kind}: ${entry.message}`)

describe("lifecycle scenario", () => {
  it("creates, lists and kills a session", async () => {
    const harness = createScenarioHarness()
    await lifecycleScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "pass: Session 'mb_lifecycle_test' created",
      "pass: Session appears in list",
      "pass: Session 'mb_lifecycle_test' killed",
    ])
    expect(harness.fake.hasSession("mb_lifecycle_test")).toBe(false)
  })

  it("stops after a failed create", async () => {
    const harness = createScenarioHarness({ fake: new FakeMultiplexer({ refuseSession: () => true }) })
    await lifecycleScenario.run(harness.context)
    expect(messages(harness)).toEqual(["fail: Failed to create session 'mb_lifecycle_test'"])
  })
})

describe("end-to-end session e2e1", () => {
  it("splits twice, lists three panes and kills", async () => {
    const { context } = createScenarioHarness()
    await expect(context.sessions.create("e2e1")).resolves.toBe(true)
    expect(isSuccess(await context.mux.splitWindow("e2e1", "vertical"))).toBe(true)
    expect(isSuccess(await context.mux.splitWindow("e2e1", "vertical"))).toBe(true)
    expect(stdoutOf(await context.mux.listPanes("e2e1"))).toBe("0: [80x24]\n1: [80x24]\n2: [80x24]\n")
    await context.sessions.kill("e2e1")
    await expect(context.probe.exists("e2e1")).resolves.toBe(false)
  })
})

describe("windows scenario", () => {
  it("fails navigation that hangs", async () => {
    const harness = createScenarioHarness({
      fake: new FakeMultiplexer({ hangOn: ["next-window", "previous-window"] }),
    })
    await windowsScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "pass: 5 windows created",
      "pass: list-windows returned data",
      "fail: Window navigation stalled (20/20 timed out)",
      "pass: Window selection by index works",
    ])
  })
})

describe("kill scenario", () => {
  it("removes a pane, a window and the session", async () => {
    const harness = createScenarioHarness()
    await killScenario.run(harness.context)
    expect(messages(harness)).toEqual(["pass: Pane killed", "pass: Window killed", "pass: Session 'mb_kill_test' killed"])
  })
})

describe("buffers scenario", () => {
  it("passes when show-buffer round-trips", async () => {
    const harness = createScenarioHarness()
    await buffersScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "pass: Buffer set",
      "pass: list-buffers executed",
      "pass: show-buffer returned the stored text",
      "pass: capture-pane returned content",
    ])
  })

  it("skips when show-buffer comes back empty", async () => {
    const harness = createScenarioHarness({ fake: new FakeMultiplexer({ showBuffer: false }) })
    await buffersScenario.run(harness.context)
    expect(messages(harness)).toContain("skip: show-buffer did not return the stored text")
    expect(harness.ledger.snapshot().failed).toBe(0)
  })
})

describe("concurrent sessions scenario", () => {
  it("creates c0..c4 concurrently and finds them listed", async () => {
    const harness = createScenarioHarness()
    await concurrentSessionsScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "pass: Created 5/5 sessions concurrently",
      "pass: Found 5/5 sessions in list",
    ])
    expect(harness.registry.names()).toEqual([
      "mb_concurrent_0",
      "mb_concurrent_1",
      "mb_concurrent_2",
      "mb_concurrent_3",
      "mb_concurrent_4",
    ])
    expect(harness.fake.sessionNames()).toEqual([])
  })

  it("tolerates one lost session", async () => {
    const harness = createScenarioHarness({
      fake: new FakeMultiplexer({ refuseSession: (name) => name === "mb_concurrent_3" }),
    })
    await concurrentSessionsScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "pass: Created 4/5 sessions concurrently",
      "pass: Found 4/5 sessions in list",
    ])
  })

  it("fails once losses exceed the tolerance", async () => {
    const harness = createScenarioHarness({
      fake: new FakeMultiplexer({ refuseSession: (name) => name.endsWith("_3") || name.endsWith("_4") }),
    })
    await concurrentSessionsScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "fail: Only created 3/5 sessions (needed 4)",
      "fail: Only found 3/5 sessions (needed 4)",
    ])
  })

  it("skips the listing check when ls hangs", async () => {
    const harness = createScenarioHarness({ fake: new FakeMultiplexer({ hangOn: ["ls"] }) })
    await concurrentSessionsScenario.run(harness.context)
    expect(messages(harness)[1]).toBe("skip: Session listing timed out")
  })

  it("keeps in-flight commands within the worker bound", async () => {
    const config = testConfig()
    const harness = createScenarioHarness({
      config: { ...config, concurrency: { workers: 2, sessions: 6 } },
    })
    await concurrentSessionsScenario.run(harness.context)
    expect(harness.fake.maxInFlight).toBeLessThanOrEqual(2)
    expect(messages(harness)[0]).toBe("pass: Created 6/6 sessions concurrently")
  })
})

describe("concurrent operations scenario", () => {
  it("runs twenty navigation steps per worker", async () => {
    const harness = createScenarioHarness()
    await concurrentOpsScenario.run(harness.context)
    expect(harness.fake.callsFor("select-pane")).toHaveLength(100)
    expect(messages(harness)).toEqual(["pass: 100 concurrent navigation ops completed"])
  })
})

describe("stress scenario", () => {
  it("completes mixed operations and rapid cycles", async () => {
    const harness = createScenarioHarness()
    await stressScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "pass: 100 operations completed",
      "pass: 10 rapid cycles completed (10 sessions came up)",
    ])
    expect(harness.fake.sessionNames()).toEqual([])
  })
})

describe("edge cases scenario", () => {
  it("expects an error for the missing session does_not_exist_42", async () => {
    const harness = createScenarioHarness()
    await edgeCasesScenario.run(harness.context)
    expect(harness.fake.callsFor("split-window")).toEqual([["split-window", "-t", "mb_does_not_exist_42"]])
    expect(messages(harness)).toEqual([
      "pass: Correctly handles non-existent session",
      "pass: Various session names handled (4/4 accepted)",
      "pass: Help command works",
      "pass: Version: fake-mux 3.4",
    ])
  })

  it("skips the error path when the command hangs", async () => {
    const harness = createScenarioHarness({ fake: new FakeMultiplexer({ hangOn: ["split-window"] }) })
    await edgeCasesScenario.run(harness.context)
    expect(messages(harness)[0]).toBe("skip: Error handling unclear (timed out after 1000ms)")
  })
})

describe("display scenario", () => {
  it("renders the format string", async () => {
    const harness = createScenarioHarness()
    await displayScenario.run(harness.context)
    expect(messages(harness)).toEqual([
      "pass: display-message: mb_display_test:0:win0",
      "pass: list-commands works",
      "pass: list-keys works",
    ])
  })
})
