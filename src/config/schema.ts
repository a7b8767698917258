import { LOG_LEVELS } from "../logging/logger.js"
import type { ValidationIssue } from "./errors.js"
import type { HarnessConfigInput } from "./types.js"

type ValidationResult = {
  readonly config: HarnessConfigInput
  readonly issues: readonly ValidationIssue[]
}

type ValidationOptions = {
  readonly strictUnknownKeys: boolean
}

const BOOL_TRUE = new Set(["1", "true", "yes", "on"])
const BOOL_FALSE = new Set(["0", "false", "no", "off"])

const SYNC_MODES = ["fixed", "poll"] as const

// tmux-style targets use ":" and "." as separators, so a prefix containing them would address
// windows or panes instead of sessions.
const SESSION_PREFIX_PATTERN = /^[A-Za-z0-9_-]*$/

const toPath = (parts: readonly string[]): string => (parts.length > 0 ? parts.join(".") : "<root>")

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value != null && !Array.isArray(value)

export const parseBooleanLike = (value: unknown): boolean | undefined => {
  if (typeof value === "boolean") return value
  if (typeof value !== "string") return undefined
  const normalized = value.trim().toLowerCase()
  if (BOOL_TRUE.has(normalized)) return true
  if (BOOL_FALSE.has(normalized)) return false
  return undefined
}

const toNumber = (value: unknown): number =>
  typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value.trim()) : Number.NaN

const readRecord = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): Record<string, unknown> | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (!isRecord(value)) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected object, received ${typeof value}.`,
    })
    return undefined
  }
  return value
}

const readBoolean = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): boolean | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = parseBooleanLike(source[key])
  if (parsed == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected boolean (or bool-like string).",
    })
    return undefined
  }
  return parsed
}

const readString = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): string | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (typeof value !== "string") {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected string, received ${typeof value}.`,
    })
    return undefined
  }
  return value
}

const readInteger = (
  source: Record<string, unknown>,
  key: string,
  min: number,
  path: readonly string[],
  issues: ValidationIssue[],
): number | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = toNumber(source[key])
  if (!Number.isInteger(parsed) || parsed < min) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: min > 0 ? "Expected positive integer." : "Expected non-negative integer.",
    })
    return undefined
  }
  return parsed
}

const readNumberAtLeast = (
  source: Record<string, unknown>,
  key: string,
  min: number,
  path: readonly string[],
  issues: ValidationIssue[],
): number | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = toNumber(source[key])
  if (!Number.isFinite(parsed) || parsed < min) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected number >= ${min}.`,
    })
    return undefined
  }
  return parsed
}

const readEnum = <T extends string>(
  source: Record<string, unknown>,
  key: string,
  values: readonly T[],
  path: readonly string[],
  issues: ValidationIssue[],
): T | undefined => {
  const raw = readString(source, key, path, issues)
  if (raw == null) return undefined
  const normalized = raw.trim().toLowerCase()
  const match = values.find((value) => value === normalized)
  if (match == null) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: `Expected one of ${values.join(", ")}.`,
    })
  }
  return match
}

const readStringList = (
  source: Record<string, unknown>,
  key: string,
  path: readonly string[],
  issues: ValidationIssue[],
): string[] | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== "string")) {
    issues.push({
      severity: "error",
      path: toPath([...path, key]),
      message: "Expected list of strings.",
    })
    return undefined
  }
  return value.filter((entry): entry is string => typeof entry === "string")
}

const detectUnknownKeys = (
  source: Record<string, unknown>,
  allowed: readonly string[],
  path: readonly string[],
  issues: ValidationIssue[],
  strictUnknownKeys: boolean,
) => {
  for (const key of Object.keys(source)) {
    if (allowed.includes(key)) continue
    issues.push({
      severity: strictUnknownKeys ? "error" : "warning",
      path: toPath([...path, key]),
      message: "Unknown key.",
    })
  }
}

export const validateHarnessConfigInput = (input: unknown, options: ValidationOptions): ValidationResult => {
  const issues: ValidationIssue[] = []
  if (!isRecord(input)) {
    issues.push({
      severity: "error",
      path: "<root>",
      message: "Expected top-level object.",
    })
    return { config: {}, issues }
  }
  const root = input
  const strict = options.strictUnknownKeys
  detectUnknownKeys(
    root,
    [
      "binary",
      "commandTimeoutMs",
      "sessionPrefix",
      "settle",
      "sync",
      "pacing",
      "concurrency",
      "quorum",
      "cleanup",
      "report",
      "logLevel",
    ],
    [],
    issues,
    strict,
  )
  const config: HarnessConfigInput = {}

  const binary = readString(root, "binary", [], issues)
  if (binary != null) {
    if (binary.trim()) config.binary = binary.trim()
    else issues.push({ severity: "error", path: "binary", message: "Expected non-empty string." })
  }
  const commandTimeoutMs = readInteger(root, "commandTimeoutMs", 1, [], issues)
  if (commandTimeoutMs != null) config.commandTimeoutMs = commandTimeoutMs
  const sessionPrefix = readString(root, "sessionPrefix", [], issues)
  if (sessionPrefix != null) {
    if (SESSION_PREFIX_PATTERN.test(sessionPrefix)) config.sessionPrefix = sessionPrefix
    else
      issues.push({
        severity: "error",
        path: "sessionPrefix",
        message: "Only letters, digits, '_' and '-' are allowed.",
      })
  }
  const logLevel = readEnum(root, "logLevel", LOG_LEVELS, [], issues)
  if (logLevel != null) config.logLevel = logLevel

  const settleRaw = readRecord(root, "settle", [], issues)
  if (settleRaw) {
    detectUnknownKeys(settleRaw, ["shortMs", "longMs"], ["settle"], issues, strict)
    const settle: NonNullable<HarnessConfigInput["settle"]> = {}
    const shortMs = readInteger(settleRaw, "shortMs", 0, ["settle"], issues)
    if (shortMs != null) settle.shortMs = shortMs
    const longMs = readInteger(settleRaw, "longMs", 0, ["settle"], issues)
    if (longMs != null) settle.longMs = longMs
    config.settle = settle
  }

  const syncRaw = readRecord(root, "sync", [], issues)
  if (syncRaw) {
    detectUnknownKeys(syncRaw, ["mode", "maxAttempts", "backoffFactor", "maxDelayMs"], ["sync"], issues, strict)
    const sync: NonNullable<HarnessConfigInput["sync"]> = {}
    const mode = readEnum(syncRaw, "mode", SYNC_MODES, ["sync"], issues)
    if (mode != null) sync.mode = mode
    const maxAttempts = readInteger(syncRaw, "maxAttempts", 1, ["sync"], issues)
    if (maxAttempts != null) sync.maxAttempts = maxAttempts
    const backoffFactor = readNumberAtLeast(syncRaw, "backoffFactor", 1, ["sync"], issues)
    if (backoffFactor != null) sync.backoffFactor = backoffFactor
    const maxDelayMs = readInteger(syncRaw, "maxDelayMs", 0, ["sync"], issues)
    if (maxDelayMs != null) sync.maxDelayMs = maxDelayMs
    config.sync = sync
  }

  const pacingRaw = readRecord(root, "pacing", [], issues)
  if (pacingRaw) {
    detectUnknownKeys(pacingRaw, ["factor"], ["pacing"], issues, strict)
    const factor = readNumberAtLeast(pacingRaw, "factor", 0, ["pacing"], issues)
    config.pacing = factor != null ? { factor } : {}
  }

  const concurrencyRaw = readRecord(root, "concurrency", [], issues)
  if (concurrencyRaw) {
    detectUnknownKeys(concurrencyRaw, ["workers", "sessions"], ["concurrency"], issues, strict)
    const concurrency: NonNullable<HarnessConfigInput["concurrency"]> = {}
    const workers = readInteger(concurrencyRaw, "workers", 1, ["concurrency"], issues)
    if (workers != null) concurrency.workers = workers
    const sessions = readInteger(concurrencyRaw, "sessions", 1, ["concurrency"], issues)
    if (sessions != null) concurrency.sessions = sessions
    config.concurrency = concurrency
  }

  const quorumRaw = readRecord(root, "quorum", [], issues)
  if (quorumRaw) {
    detectUnknownKeys(quorumRaw, ["tolerance"], ["quorum"], issues, strict)
    const tolerance = readInteger(quorumRaw, "tolerance", 0, ["quorum"], issues)
    config.quorum = tolerance != null ? { tolerance } : {}
  }

  const cleanupRaw = readRecord(root, "cleanup", [], issues)
  if (cleanupRaw) {
    detectUnknownKeys(cleanupRaw, ["verify", "extraNames"], ["cleanup"], issues, strict)
    const cleanup: NonNullable<HarnessConfigInput["cleanup"]> = {}
    const verify = readBoolean(cleanupRaw, "verify", ["cleanup"], issues)
    if (verify != null) cleanup.verify = verify
    const extraNames = readStringList(cleanupRaw, "extraNames", ["cleanup"], issues)
    if (extraNames != null) cleanup.extraNames = extraNames
    config.cleanup = cleanup
  }

  const reportRaw = readRecord(root, "report", [], issues)
  if (reportRaw) {
    detectUnknownKeys(reportRaw, ["path"], ["report"], issues, strict)
    const reportPath = readString(reportRaw, "path", ["report"], issues)
    config.report = reportPath != null && reportPath.trim() ? { path: reportPath.trim() } : {}
  }

  return { config, issues }
}
