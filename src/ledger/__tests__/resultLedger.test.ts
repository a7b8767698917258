import { describe, expect, it } from "vitest"
import { runPool } from "../../concurrency/workerPool.js"
import { ResultLedger, passRate, type ResultKind } from "../resultLedger.js"

describe("result ledger", () => {
  it("counts each kind and forwards lines to the sink", () => {
    const lines: string[] = []
    const ledger = new ResultLedger((kind, message) => lines.push(`${kind}:${message}`))
    ledger.recordPass("a")
    ledger.recordFail("b")
    ledger.recordSkip("c")
    ledger.record("pass", "d")

    expect(ledger.snapshot()).toEqual({ passed: 2, failed: 1, skipped: 1, total: 4 })
    expect(lines).toEqual(["pass:a", "fail:b", "skip:c", "pass:d"])
    expect(ledger.entries().map((entry) => entry.message)).toEqual(["a", "b", "c", "d"])
  })

  it("keeps exact totals under 1000 concurrent records", async () => {
    const ledger = new ResultLedger()
    const kinds: ResultKind[] = ["pass", "fail", "skip"]
    const units = Array.from({ length: 1_000 }, (_, index) => async () => {
      await Promise.resolve()
      ledger.record(kinds[index % 3], `record ${index}`)
      return index
    })

    await runPool(units, 50)

    expect(ledger.snapshot()).toEqual({ passed: 334, failed: 333, skipped: 333, total: 1_000 })
    expect(ledger.entries()).toHaveLength(1_000)
  })

  it("computes the pass rate", () => {
    expect(passRate({ passed: 0, failed: 0, skipped: 0, total: 0 })).toBe(0)
    expect(passRate({ passed: 3, failed: 1, skipped: 0, total: 4 })).toBe(75)
  })
})
