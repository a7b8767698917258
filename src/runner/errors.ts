export class SpawnError extends Error {
  readonly binary: string
  readonly code?: string

  constructor(binary: string, cause: Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined
    super(`Failed to launch ${binary}${code ? ` (${code})` : ""}: ${cause.message}`)
    this.name = "SpawnError"
    this.binary = binary
    this.code = code
  }
}
