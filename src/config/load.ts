import dotenv from "dotenv"
import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { parse } from "yaml"
import { ConfigError, formatValidationIssues } from "./errors.js"
import { parseBooleanLike, validateHarnessConfigInput } from "./schema.js"
import type { HarnessConfig, HarnessConfigInput, ResolveHarnessConfigOptions, ResolvedHarnessConfig } from "./types.js"

dotenv.config()

export const DEFAULT_HARNESS_CONFIG: HarnessConfig = {
  binary: "tmux",
  commandTimeoutMs: 10_000,
  sessionPrefix: "mb_",
  settle: {
    shortMs: 300,
    longMs: 1_500,
  },
  sync: {
    mode: "fixed",
    maxAttempts: 8,
    backoffFactor: 2,
    maxDelayMs: 2_000,
  },
  pacing: {
    factor: 1,
  },
  concurrency: {
    workers: 5,
    sessions: 5,
  },
  quorum: {
    tolerance: 1,
  },
  cleanup: {
    verify: true,
    extraNames: [],
  },
  report: {
    path: null,
  },
  logLevel: "info",
}

const mergeConfigInput = (base: HarnessConfigInput, patch: HarnessConfigInput): HarnessConfigInput => ({
  ...base,
  ...patch,
  settle: { ...(base.settle ?? {}), ...(patch.settle ?? {}) },
  sync: { ...(base.sync ?? {}), ...(patch.sync ?? {}) },
  pacing: { ...(base.pacing ?? {}), ...(patch.pacing ?? {}) },
  concurrency: { ...(base.concurrency ?? {}), ...(patch.concurrency ?? {}) },
  quorum: { ...(base.quorum ?? {}), ...(patch.quorum ?? {}) },
  cleanup: { ...(base.cleanup ?? {}), ...(patch.cleanup ?? {}) },
  report: { ...(base.report ?? {}), ...(patch.report ?? {}) },
})

const readYamlInput = async (
  filePath: string,
  strictUnknownKeys: boolean,
): Promise<{ config: HarnessConfigInput; warnings: string[] } | null> => {
  let raw: string
  try {
    raw = await fs.readFile(filePath, "utf8")
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null
    }
    throw error
  }
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    throw new ConfigError(`Could not parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
  }
  if (parsed == null) return { config: {}, warnings: [] }
  const validated = validateHarnessConfigInput(parsed, { strictUnknownKeys })
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new ConfigError(`Invalid harness config at ${filePath}`, errors)
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings }
}

const resolveRepoConfigPath = async (workspace?: string | null): Promise<string | null> => {
  const root = workspace?.trim() || process.cwd()
  const candidates = [path.join(root, ".mux-battle.yaml"), path.join(root, "mux-battle.yaml")]
  for (const candidate of candidates) {
    try {
      // eslint-disable-next-line no-await-in-loop
      await fs.access(candidate)
      return candidate
    } catch {
      // Keep searching.
    }
  }
  return null
}

export const resolveUserConfigPath = (homeDir: string = os.homedir()): string =>
  path.join(homeDir, ".config", "mux-battle", "config.yaml")

const ENV_PREFIX = "MUX_BATTLE_"

/**
 * Environment overrides. Values are kept as raw strings and go through the same validation as file
 * layers, so a malformed variable is reported instead of silently ignored.
 */
export const envConfigLayer = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const read = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`]?.trim()
    return value ? value : undefined
  }
  const layer: Record<string, unknown> = {}
  const sections: Record<string, Record<string, string>> = {}
  const assign = (sectionKey: string | null, key: string, value: string | undefined) => {
    if (value === undefined) return
    if (sectionKey === null) {
      layer[key] = value
      return
    }
    sections[sectionKey] = { ...(sections[sectionKey] ?? {}), [key]: value }
  }

  assign(null, "binary", read("BINARY"))
  assign(null, "commandTimeoutMs", read("COMMAND_TIMEOUT_MS"))
  assign(null, "sessionPrefix", env[`${ENV_PREFIX}SESSION_PREFIX`])
  assign(null, "logLevel", read("LOG_LEVEL"))
  if (parseBooleanLike(read("DEBUG")) === true) layer.logLevel = "debug"
  assign("settle", "shortMs", read("SETTLE_SHORT_MS"))
  assign("settle", "longMs", read("SETTLE_LONG_MS"))
  assign("sync", "mode", read("SYNC_MODE"))
  assign("sync", "maxAttempts", read("SYNC_MAX_ATTEMPTS"))
  assign("sync", "backoffFactor", read("SYNC_BACKOFF_FACTOR"))
  assign("sync", "maxDelayMs", read("SYNC_MAX_DELAY_MS"))
  assign("pacing", "factor", read("PACING_FACTOR"))
  assign("concurrency", "workers", read("WORKERS"))
  assign("concurrency", "sessions", read("CONCURRENT_SESSIONS"))
  assign("quorum", "tolerance", read("QUORUM_TOLERANCE"))
  assign("cleanup", "verify", read("CLEANUP_VERIFY"))
  assign("report", "path", read("REPORT"))
  return { ...layer, ...sections }
}

const materialize = (input: HarnessConfigInput): HarnessConfig => ({
  binary: input.binary ?? DEFAULT_HARNESS_CONFIG.binary,
  commandTimeoutMs: input.commandTimeoutMs ?? DEFAULT_HARNESS_CONFIG.commandTimeoutMs,
  sessionPrefix: input.sessionPrefix ?? DEFAULT_HARNESS_CONFIG.sessionPrefix,
  settle: { ...DEFAULT_HARNESS_CONFIG.settle, ...input.settle },
  sync: { ...DEFAULT_HARNESS_CONFIG.sync, ...input.sync },
  pacing: { ...DEFAULT_HARNESS_CONFIG.pacing, ...input.pacing },
  concurrency: { ...DEFAULT_HARNESS_CONFIG.concurrency, ...input.concurrency },
  quorum: { ...DEFAULT_HARNESS_CONFIG.quorum, ...input.quorum },
  cleanup: {
    verify: input.cleanup?.verify ?? DEFAULT_HARNESS_CONFIG.cleanup.verify,
    extraNames: input.cleanup?.extraNames ?? DEFAULT_HARNESS_CONFIG.cleanup.extraNames,
  },
  report: { path: input.report?.path ?? DEFAULT_HARNESS_CONFIG.report.path },
  logLevel: input.logLevel ?? DEFAULT_HARNESS_CONFIG.logLevel,
})

export const resolveHarnessConfig = async (options: ResolveHarnessConfigOptions = {}): Promise<ResolvedHarnessConfig> => {
  const env = options.env ?? process.env
  const strict = options.cliStrict ?? parseBooleanLike(env[`${ENV_PREFIX}CONFIG_STRICT`]) ?? false
  const warnings: string[] = []
  const sources: string[] = ["defaults"]
  let merged: HarnessConfigInput = {}

  const applyFileLayer = async (filePath: string, source: string) => {
    const layer = await readYamlInput(filePath, strict)
    if (!layer) return
    warnings.push(...layer.warnings.map((line) => `${filePath}: ${line}`))
    merged = mergeConfigInput(merged, layer.config)
    sources.push(source)
  }

  const applyValidatedLayer = (raw: Record<string, unknown>, source: string) => {
    if (Object.keys(raw).length === 0) return
    const validated = validateHarnessConfigInput(raw, { strictUnknownKeys: strict })
    const errors = validated.issues.filter((issue) => issue.severity === "error")
    if (errors.length > 0) {
      throw new ConfigError(`Invalid ${source} configuration`, errors)
    }
    merged = mergeConfigInput(merged, validated.config)
    sources.push(source)
  }

  const repoConfigPath = await resolveRepoConfigPath(options.workspace)
  if (repoConfigPath) {
    await applyFileLayer(repoConfigPath, `repo:${repoConfigPath}`)
  }

  const userConfigPath = resolveUserConfigPath(options.homeDir)
  await applyFileLayer(userConfigPath, `user:${userConfigPath}`)

  const cliConfigPath = options.cliConfigPath?.trim()
  if (cliConfigPath) {
    const resolvedCliPath = path.isAbsolute(cliConfigPath) ? cliConfigPath : path.resolve(process.cwd(), cliConfigPath)
    const before = sources.length
    await applyFileLayer(resolvedCliPath, `cli-config:${resolvedCliPath}`)
    if (sources.length === before) {
      throw new ConfigError(`Config file not found: ${resolvedCliPath}`)
    }
  }

  applyValidatedLayer(envConfigLayer(env), "env")

  if (options.overrides) {
    applyValidatedLayer(options.overrides, "cli")
  }

  return {
    ...materialize(merged),
    meta: { strict, sources, warnings },
  }
}
