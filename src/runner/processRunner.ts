import { spawn } from "node:child_process"
import { SILENT_LOGGER, type Logger } from "../logging/logger.js"
import { SpawnError } from "./errors.js"
import type { CommandRunner, Invocation, Outcome } from "./types.js"

export interface ProcessRunnerOptions {
  readonly binary: string
  readonly logger?: Logger
  readonly env?: NodeJS.ProcessEnv
}

export const createProcessRunner = (options: ProcessRunnerOptions): CommandRunner => {
  const { binary } = options
  const logger = options.logger ?? SILENT_LOGGER
  const env = options.env ?? process.env

  const run = (invocation: Invocation): Promise<Outcome> =>
    new Promise<Outcome>((resolve, reject) => {
      let settled = false
      let stdout = ""
      let stderr = ""
      const child = spawn(binary, [...invocation.args], {
        env,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      })
      // The child is abandoned after SIGKILL; its close event is ignored once settled.
      const timer = setTimeout(() => {
        if (settled) return
        settled = true
        child.kill("SIGKILL")
        logger.debug(`${invocation.args.join(" ")} timed out after ${invocation.timeoutMs}ms`)
        resolve({ kind: "timedOut", timeoutMs: invocation.timeoutMs })
      }, invocation.timeoutMs)
      child.stdout?.setEncoding("utf8")
      child.stderr?.setEncoding("utf8")
      child.stdout?.on("data", (chunk: string) => {
        stdout += chunk
      })
      child.stderr?.on("data", (chunk: string) => {
        stderr += chunk
      })
      child.once("error", (error) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        reject(new SpawnError(binary, error))
      })
      child.once("close", (code) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        resolve({ kind: "completed", exitCode: code ?? -1, stdout, stderr })
      })
    })

  const launch = (args: readonly string[]): void => {
    const child = spawn(binary, [...args], {
      env,
      detached: true,
      stdio: "ignore",
      windowsHide: true,
    })
    child.once("error", (error) => {
      logger.warn(new SpawnError(binary, error).message)
    })
    child.unref()
  }

  return { binary, run, launch }
}
