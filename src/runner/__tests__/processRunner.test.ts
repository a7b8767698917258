import { EventEmitter } from "node:events"
import { Chalk } from "chalk"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

const mocks = vi.hoisted(() => ({ spawn: vi.fn() }))

vi.mock("node:child_process", () => ({ spawn: mocks.spawn }))

import { createLogger } from "../../logging/logger.js"
import { SpawnError } from "../errors.js"
import { createProcessRunner } from "../processRunner.js"
import { createInvocation } from "../types.js"

class FakeStream extends EventEmitter {
  setEncoding = vi.fn()
}

class FakeChild extends EventEmitter {
  stdout = new FakeStream()
  stderr = new FakeStream()
  kill = vi.fn(() => true)
  unref = vi.fn()
}

let child: FakeChild

beforeEach(() => {
  child = new FakeChild()
  mocks.spawn.mockReset()
  mocks.spawn.mockReturnValue(child)
})

afterEach(() => {
  vi.useRealTimers()
})

describe("process runner", () => {
  it("collects stdout, stderr and the exit code", async () => {
    const runner = createProcessRunner({ binary: "fake-mux" })
    const pending = runner.run(createInvocation(["ls"], 1_000))
    child.stdout.emit("data", "main: 1 windows\n")
    child.stderr.emit("data", "note\n")
    child.emit("close", 0)

    await expect(pending).resolves.toEqual({
      kind: "completed",
      exitCode: 0,
      stdout: "main: 1 windows\n",
      stderr: "note\n",
    })
    expect(mocks.spawn).toHaveBeenCalledWith(
      "fake-mux",
      ["ls"],
      expect.objectContaining({ stdio: ["ignore", "pipe", "pipe"] }),
    )
  })

  it("reports a signal exit as -1", async () => {
    const runner = createProcessRunner({ binary: "fake-mux" })
    const pending = runner.run(createInvocation(["has-session", "-t", "x"], 1_000))
    child.emit("close", null)
    await expect(pending).resolves.toMatchObject({ kind: "completed", exitCode: -1 })
  })

  it("kills a child that outlives its timeout", async () => {
    vi.useFakeTimers()
    const runner = createProcessRunner({ binary: "fake-mux" })
    const pending = runner.run(createInvocation(["list-keys"], 250))
    vi.advanceTimersByTime(250)

    await expect(pending).resolves.toEqual({ kind: "timedOut", timeoutMs: 250 })
    expect(child.kill).toHaveBeenCalledWith("SIGKILL")
    child.emit("close", null)
    await expect(pending).resolves.toEqual({ kind: "timedOut", timeoutMs: 250 })
  })

  it("rejects with SpawnError when the binary cannot start", async () => {
    const runner = createProcessRunner({ binary: "nope" })
    const pending = runner.run(createInvocation(["--version"], 1_000))
    child.emit("error", Object.assign(new Error("spawn nope ENOENT"), { code: "ENOENT" }))

    await expect(pending).rejects.toBeInstanceOf(SpawnError)
    await expect(pending).rejects.toMatchObject({
      name: "SpawnError",
      binary: "nope",
      code: "ENOENT",
      message: "Failed to launch nope (ENOENT): spawn nope ENOENT",
    })
  })

  it("launches detached and logs spawn failures", () => {
    const lines: string[] = []
    const logger = createLogger({ level: "debug", write: (line) => lines.push(line), colors: new Chalk({ level: 0 }) })
    const runner = createProcessRunner({ binary: "fake-mux", logger })

    runner.launch(["new-session", "-s", "mb_x", "-d"])
    expect(mocks.spawn).toHaveBeenCalledWith(
      "fake-mux",
      ["new-session", "-s", "mb_x", "-d"],
      expect.objectContaining({ detached: true, stdio: "ignore" }),
    )
    expect(child.unref).toHaveBeenCalledTimes(1)

    child.emit("error", new Error("boom"))
    expect(lines).toEqual(["[mux-battle] warn: Failed to launch fake-mux: boom"])
  })
})
