import type { QuorumPolicy } from "../concurrency/quorum.js"
import type { LogLevel } from "../logging/logger.js"
import type { SettleConfig, SyncConfig, SyncMode } from "../session/settle.js"

export interface HarnessConfig {
  readonly binary: string
  readonly commandTimeoutMs: number
  readonly sessionPrefix: string
  readonly settle: SettleConfig
  readonly sync: SyncConfig
  readonly pacing: {
    readonly factor: number
  }
  readonly concurrency: {
    readonly workers: number
    readonly sessions: number
  }
  readonly quorum: QuorumPolicy
  readonly cleanup: {
    readonly verify: boolean
    readonly extraNames: readonly string[]
  }
  readonly report: {
    readonly path: string | null
  }
  readonly logLevel: LogLevel
}

export interface ResolvedHarnessConfig extends HarnessConfig {
  readonly meta: {
    readonly strict: boolean
    readonly sources: readonly string[]
    readonly warnings: readonly string[]
  }
}

export type HarnessConfigInput = {
  binary?: string
  commandTimeoutMs?: number
  sessionPrefix?: string
  settle?: {
    shortMs?: number
    longMs?: number
  }
  sync?: {
    mode?: SyncMode
    maxAttempts?: number
    backoffFactor?: number
    maxDelayMs?: number
  }
  pacing?: {
    factor?: number
  }
  concurrency?: {
    workers?: number
    sessions?: number
  }
  quorum?: {
    tolerance?: number
  }
  cleanup?: {
    verify?: boolean
    extraNames?: string[]
  }
  report?: {
    path?: string
  }
  logLevel?: LogLevel
}

export interface ResolveHarnessConfigOptions {
  readonly workspace?: string | null
  readonly cliConfigPath?: string | null
  readonly cliStrict?: boolean | null
  readonly overrides?: HarnessConfigInput
  readonly env?: NodeJS.ProcessEnv
  readonly homeDir?: string
}
