export type ResultKind = "pass" | "fail" | "skip"

export interface LedgerEntry {
  readonly kind: ResultKind
  readonly message: string
}

export interface LedgerSnapshot {
  readonly passed: number
  readonly failed: number
  readonly skipped: number
  readonly total: number
}

export type LedgerSink = (kind: ResultKind, message: string) => void

/**
 * Pass/fail/skip counters shared by every scenario and pool worker. Each record call counts and
 * emits inside one synchronous step, so concurrent async producers can neither lose an update nor
 * interleave a line.
 */
export class ResultLedger {
  private passed = 0
  private failed = 0
  private skipped = 0
  private readonly recorded: LedgerEntry[] = []
  private readonly sink: LedgerSink

  constructor(sink: LedgerSink = () => {}) {
    this.sink = sink
  }

  recordPass(message: string): void {
    this.record("pass", message)
  }

  recordFail(message: string): void {
    this.record("fail", message)
  }

  recordSkip(message: string): void {
    this.record("skip", message)
  }

  record(kind: ResultKind, message: string): void {
    if (kind === "pass") this.passed += 1
    else if (kind === "fail") this.failed += 1
    else this.skipped += 1
    this.recorded.push({ kind, message })
    this.sink(kind, message)
  }

  snapshot(): LedgerSnapshot {
    return {
      passed: this.passed,
      failed: this.failed,
      skipped: this.skipped,
      total: this.passed + this.failed + this.skipped,
    }
  }

  entries(): readonly LedgerEntry[] {
    return [...this.recorded]
  }
}

export const passRate = (snapshot: LedgerSnapshot): number =>
  snapshot.total > 0 ? (snapshot.passed / snapshot.total) * 100 : 0
