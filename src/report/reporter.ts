import chalk, { type ChalkInstance } from "chalk"
import { passRate, type LedgerSnapshot, type ResultKind } from "../ledger/resultLedger.js"

const RULE_WIDTH = 70

export interface ReporterOptions {
  readonly write?: (line: string) => void
  readonly colors?: ChalkInstance
}

export interface SummaryView {
  readonly snapshot: LedgerSnapshot
  readonly finishedAt: Date
}

export const formatTimestamp = (date: Date): string => {
  const pad = (value: number) => String(value).padStart(2, "0")
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

const boxLines = (lines: readonly string[]): string[] => [
  `╔${"═".repeat(RULE_WIDTH)}╗`,
  ...lines.map((line) => {
    const padded = line.length >= RULE_WIDTH ? line.slice(0, RULE_WIDTH) : line
    const left = Math.floor((RULE_WIDTH - padded.length) / 2)
    return `║${" ".repeat(left)}${padded}${" ".repeat(RULE_WIDTH - padded.length - left)}║`
  }),
  `╚${"═".repeat(RULE_WIDTH)}╝`,
]

export const createReporter = (options: ReporterOptions = {}) => {
  const write =
    options.write ??
    ((line: string) => {
      process.stdout.write(`${line}\n`)
    })
  const colors = options.colors ?? chalk

  const resultTags: Record<ResultKind, string> = {
    pass: colors.green("[PASS]"),
    fail: colors.red("[FAIL]"),
    skip: colors.yellow("[SKIP]"),
  }

  const rateColor = (rate: number) => (rate >= 80 ? colors.green : rate >= 60 ? colors.yellow : colors.red)

  return {
    result: (kind: ResultKind, message: string) => write(`${resultTags[kind]} ${message}`),
    info: (message: string) => write(`${colors.cyan("[INFO]")} ${message}`),
    test: (message: string) => write(`${colors.whiteBright("[TEST]")} ${message}`),
    blank: () => write(""),
    section: (title: string) => {
      write("")
      write(colors.magenta("=".repeat(RULE_WIDTH)))
      write(colors.magenta(`  ${title}`))
      write(colors.magenta("=".repeat(RULE_WIDTH)))
    },
    banner: (lines: readonly string[]) => {
      for (const line of boxLines(lines)) {
        write(colors.cyan(line))
      }
    },
    summary: ({ snapshot, finishedAt }: SummaryView) => {
      const rate = passRate(snapshot)
      write(`  Total Tests: ${snapshot.total}`)
      write(colors.green(`  ✓ Passed:    ${snapshot.passed}`))
      write(colors.red(`  ✗ Failed:    ${snapshot.failed}`))
      write(colors.yellow(`  ○ Skipped:   ${snapshot.skipped}`))
      write("")
      write(rateColor(rate)(`  Pass Rate: ${rate.toFixed(1)}%`))
      write("")
      write(`${colors.cyan("[INFO]")} Completed: ${formatTimestamp(finishedAt)}`)
      write("")
      if (snapshot.failed === 0) {
        write(colors.green("All checks passed."))
      } else {
        write(colors.yellow("Some checks failed. Review the output above."))
      }
    },
  }
}

export type Reporter = ReturnType<typeof createReporter>
