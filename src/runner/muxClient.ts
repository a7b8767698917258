import { createInvocation, type CommandRunner, type Outcome } from "./types.js"

export const LAYOUTS = ["even-horizontal", "even-vertical", "main-horizontal", "main-vertical", "tiled"] as const
export type LayoutName = (typeof LAYOUTS)[number]

export type Direction = "up" | "down" | "left" | "right"
export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"]

const DIRECTION_FLAGS: Record<Direction, string> = {
  up: "-U",
  down: "-D",
  left: "-L",
  right: "-R",
}

export type SplitOrientation = "vertical" | "horizontal"

export interface MuxClientConfig {
  readonly runner: CommandRunner
  readonly timeoutMs: number
}

export interface SendKeysOptions {
  readonly literal?: boolean
}

const splitArgs = (target: string, orientation?: SplitOrientation): string[] => {
  if (!orientation) return ["split-window", "-t", target]
  return ["split-window", orientation === "vertical" ? "-v" : "-h", "-t", target]
}

export const createMuxClient = (config: MuxClientConfig) => {
  const exec = (args: readonly string[], timeoutMs = config.timeoutMs): Promise<Outcome> =>
    config.runner.run(createInvocation(args, timeoutMs))

  return {
    binary: config.runner.binary,
    exec,
    hasSession: (name: string) => exec(["has-session", "-t", name]),
    launchSession: (name: string) => config.runner.launch(["new-session", "-s", name, "-d"]),
    killSession: (name: string) => exec(["kill-session", "-t", name]),
    listSessions: () => exec(["ls"]),
    newWindow: (name: string) => exec(["new-window", "-t", name]),
    killWindow: (name: string) => exec(["kill-window", "-t", name]),
    listWindows: (name: string) => exec(["list-windows", "-t", name]),
    nextWindow: (name: string) => exec(["next-window", "-t", name]),
    previousWindow: (name: string) => exec(["previous-window", "-t", name]),
    selectWindow: (name: string, index: number) => exec(["select-window", "-t", `${name}:${index}`]),
    splitWindow: (name: string, orientation?: SplitOrientation) => exec(splitArgs(name, orientation)),
    killPane: (name: string) => exec(["kill-pane", "-t", name]),
    listPanes: (name: string) => exec(["list-panes", "-t", name]),
    selectPane: (name: string, direction: Direction) => exec(["select-pane", DIRECTION_FLAGS[direction], "-t", name]),
    resizePane: (name: string, direction: Direction, amount: number) =>
      exec(["resize-pane", DIRECTION_FLAGS[direction], String(amount), "-t", name]),
    toggleZoom: (name: string) => exec(["resize-pane", "-Z", "-t", name]),
    sendKeys: (name: string, keys: readonly string[], options: SendKeysOptions = {}) =>
      exec(options.literal ? ["send-keys", "-l", "-t", name, ...keys] : ["send-keys", "-t", name, ...keys]),
    selectLayout: (name: string, layout: LayoutName) => exec(["select-layout", "-t", name, layout]),
    swapPane: (name: string, direction: "up" | "down") => exec(["swap-pane", DIRECTION_FLAGS[direction], "-t", name]),
    rotateWindow: (name: string) => exec(["rotate-window", "-t", name]),
    setBuffer: (name: string, text: string) => exec(["set-buffer", "-t", name, text]),
    listBuffers: (name: string) => exec(["list-buffers", "-t", name]),
    showBuffer: (name: string) => exec(["show-buffer", "-t", name]),
    capturePane: (name: string) => exec(["capture-pane", "-t", name, "-p"]),
    displayMessage: (name: string, format: string) => exec(["display-message", "-t", name, "-p", format]),
    listCommands: () => exec(["list-commands"]),
    listKeys: () => exec(["list-keys"]),
    help: () => exec(["--help"]),
    version: () => exec(["--version"]),
  }
}

export type MuxClient = ReturnType<typeof createMuxClient>
