import { promises as fs } from "node:fs"
import path from "node:path"
import { passRate } from "../ledger/resultLedger.js"
import type { RunSummary } from "./runOrchestrator.js"

export interface RunReport {
  readonly binary: string
  readonly scenarios: readonly string[]
  readonly startedAt: string
  readonly finishedAt: string
  readonly totals: RunSummary["snapshot"] & { readonly passRate: number }
  readonly results: RunSummary["entries"]
  readonly cleanup: {
    readonly swept: readonly string[]
    readonly leaked: readonly string[]
  }
  readonly exitCode: number
}

export const toRunReport = (summary: RunSummary): RunReport => ({
  binary: summary.binary,
  scenarios: summary.scenarios,
  startedAt: summary.startedAt.toISOString(),
  finishedAt: summary.finishedAt.toISOString(),
  totals: { ...summary.snapshot, passRate: Number(passRate(summary.snapshot).toFixed(1)) },
  results: summary.entries,
  cleanup: { swept: summary.swept, leaked: summary.leaked },
  exitCode: summary.exitCode,
})

export const writeRunReport = async (filePath: string, summary: RunSummary): Promise<string> => {
  const resolved = path.resolve(filePath)
  await fs.mkdir(path.dirname(resolved), { recursive: true })
  await fs.writeFile(resolved, `${JSON.stringify(toRunReport(summary), null, 2)}\n`, "utf8")
  return resolved
}
