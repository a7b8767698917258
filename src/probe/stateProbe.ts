import type { MuxClient } from "../runner/muxClient.js"
import { isSuccess } from "../runner/types.js"

/**
 * Existence and listing questions about target-side sessions. A negative answer covers both
 * "not there" and "the query itself failed"; callers accept that false-negative source.
 */
export const createStateProbe = (mux: MuxClient) => {
  const listing = async (): Promise<string | null> => {
    const outcome = await mux.listSessions()
    return outcome.kind === "completed" ? outcome.stdout : null
  }

  return {
    exists: async (name: string): Promise<boolean> => isSuccess(await mux.hasSession(name)),
    listContains: async (substring: string): Promise<boolean> => {
      const stdout = await listing()
      return stdout !== null && stdout.includes(substring)
    },
    /** Names found in one `ls` call, or null when the listing timed out. */
    countListed: async (names: readonly string[]): Promise<number | null> => {
      const stdout = await listing()
      if (stdout === null) return null
      return names.filter((name) => stdout.includes(name)).length
    },
  }
}

export type StateProbe = ReturnType<typeof createStateProbe>
