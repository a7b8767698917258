import { Chalk } from "chalk"
import { describe, expect, it } from "vitest"
import { createReporter, formatTimestamp } from "../reporter.js"

const capture = () => {
  const lines: string[] = []
  const reporter = createReporter({ write: (line) => lines.push(line), colors: new Chalk({ level: 0 }) })
  return { lines, reporter }
}

describe("reporter", () => {
  it("tags result lines", () => {
    const { lines, reporter } = capture()
    reporter.result("pass", "ok")
    reporter.result("fail", "broken")
    reporter.result("skip", "unclear")
    reporter.test("Create session")
    reporter.info("Binary: tmux")
    expect(lines).toEqual(["[PASS] ok", "[FAIL] broken", "[SKIP] unclear", "[TEST] Create session", "[INFO] Binary: tmux"])
  })

  it("frames section headers with rules", () => {
    const { lines, reporter } = capture()
    reporter.section("FINAL CLEANUP")
    expect(lines).toEqual(["", "=".repeat(70), "  FINAL CLEANUP", "=".repeat(70)])
  })

  it("centres banner text inside a box", () => {
    const { lines, reporter } = capture()
    reporter.banner(["abcd"])
    expect(lines[0]).toBe(`╔${"═".repeat(70)}╗`)
    expect(lines[1]).toBe(`║${" ".repeat(33)}abcd${" ".repeat(33)}║`)
    expect(lines[2]).toBe(`╚${"═".repeat(70)}╝`)
  })

  it("prints the run summary", () => {
    const { lines, reporter } = capture()
    reporter.summary({
      snapshot: { passed: 7, failed: 1, skipped: 2, total: 10 },
      finishedAt: new Date(2024, 0, 2, 3, 4, 5),
    })
    expect(lines).toEqual([
      "  Total Tests: 10",
      "  ✓ Passed:    7",
      "  ✗ Failed:    1",
      "  ○ Skipped:   2",
      "",
      "  Pass Rate: 70.0%",
      "",
      "[INFO] Completed: 2024-01-02 03:04:05",
      "",
      "Some checks failed. Review the output above.",
    ])
  })

  it("formats timestamps with zero padding", () => {
    expect(formatTimestamp(new Date(2025, 10, 9, 8, 7, 6))).toBe("2025-11-09 08:07:06")
  })
})
