import chalk, { type ChalkInstance } from "chalk"

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"]

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  readonly level: LogLevel
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export interface LoggerOptions {
  readonly level: LogLevel
  readonly write?: (line: string) => void
  readonly colors?: ChalkInstance
  readonly tag?: string
}

export const parseLogLevel = (value: string | undefined | null): LogLevel | null => {
  const normalized = (value ?? "").trim().toLowerCase()
  return LOG_LEVELS.find((level) => level === normalized) ?? null
}

const defaultWrite = (line: string) => {
  process.stderr.write(`${line}\n`)
}

export const createLogger = (options: LoggerOptions): Logger => {
  const write = options.write ?? defaultWrite
  const colors = options.colors ?? chalk
  const tag = options.tag ?? "mux-battle"
  const threshold = LEVEL_RANK[options.level]
  const emit = (level: Exclude<LogLevel, "silent">, paint: (text: string) => string, message: string) => {
    if (LEVEL_RANK[level] < threshold) return
    write(paint(`[${tag}] ${level === "info" ? "" : `${level}: `}${message}`))
  }
  return {
    level: options.level,
    debug: (message) => emit("debug", colors.gray, message),
    info: (message) => emit("info", colors.cyan, message),
    warn: (message) => emit("warn", colors.yellow, message),
    error: (message) => emit("error", colors.red, message),
  }
}

export const SILENT_LOGGER: Logger = createLogger({ level: "silent", write: () => {} })
