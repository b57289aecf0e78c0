import { colors, createLogger, isLogLevel, type LogLevel } from "./log.js"
import { createMatcher, regexRule, type MatchRules } from "./matcher.js"
import { NiriProvider, resolveSocketPath } from "./niri-provider.js"
import { WindowFollowService, type Provider } from "./windowFollow.js"

export const VERSION = "0.1.0"

export const DEFAULT_TITLE_PATTERN = "^Picture-in-Picture$"
export const DEFAULT_APP_ID_PATTERN = "firefox$"

export const HELP_TEXT = `pip-follow - Keep a Picture-in-Picture window on the focused niri workspace

USAGE:
    pip-follow [OPTIONS]

OPTIONS:
    -l, --log-level <LEVEL>    Set the log level [default: info]
                               Possible values: trace, debug, info, warn, error
    -t, --title <REGEX>        Title the window must match [default: ${DEFAULT_TITLE_PATTERN}]
    -a, --app-id <REGEX>       App id the window must match [default: ${DEFAULT_APP_ID_PATTERN}]
    -s, --socket <PATH>        niri socket [default: $NIRI_SOCKET]
    -h, --help                 Print this help message
    -v, --version              Print version information
`

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UsageError"
  }
}

export type Flags = {
  logLevel: LogLevel
  title: string
  appId: string
  socket: string | null
  help: boolean
  version: boolean
}

const FLAG_NAMES = new Set([
  "-l",
  "--log-level",
  "-t",
  "--title",
  "-a",
  "--app-id",
  "-s",
  "--socket",
  "-h",
  "--help",
  "-v",
  "--version"
])

function isFlag(arg: string): boolean {
  const eq = arg.startsWith("--") ? arg.indexOf("=") : -1
  return FLAG_NAMES.has(eq === -1 ? arg : arg.slice(0, eq))
}

export type ConnectedProvider = Provider & { close(): void }

export function parseArgs(args: string[]): Flags {
  const flags: Flags = {
    logLevel: "info",
    title: DEFAULT_TITLE_PATTERN,
    appId: DEFAULT_APP_ID_PATTERN,
    socket: null,
    help: false,
    version: false
  }

  let i = 0
  while (i < args.length) {
    const arg = args[i]
    i++
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1
    const name = eq === -1 ? arg : arg.slice(0, eq)
    const inline = eq === -1 ? null : arg.slice(eq + 1)

    const takeValue = (long: string): string => {
      if (inline != null) return inline
      const next = args[i]
      // Values may start with "-" as long as they are not themselves flags.
      if (next === undefined || isFlag(next)) {
        throw new UsageError(`A value must be provided for ${long}`)
      }
      i++
      return next
    }

    if (name === "-l" || name === "--log-level") {
      const level = takeValue("log-level")
      if (!isLogLevel(level)) throw new UsageError(`Invalid log level: ${level}.`)
      flags.logLevel = level
    } else if (name === "-t" || name === "--title") {
      flags.title = takeValue("title")
    } else if (name === "-a" || name === "--app-id") {
      flags.appId = takeValue("app-id")
    } else if (name === "-s" || name === "--socket") {
      flags.socket = takeValue("socket")
    } else if (name === "-h" || name === "--help") {
      flags.help = true
    } else if (name === "-v" || name === "--version") {
      flags.version = true
    } else {
      throw new UsageError(`Unknown argument: ${arg}`)
    }
  }

  return flags
}

export function compileRules(flags: Pick<Flags, "title" | "appId">): MatchRules {
  const compile = (label: string, source: string) => {
    try {
      return regexRule(source)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new UsageError(`Invalid ${label} pattern: ${reason}`)
    }
  }
  return { title: compile("title", flags.title), appId: compile("app-id", flags.appId) }
}

function printError(message: string): void {
  console.error(`${colors.red}${colors.bold}Error: ${message}${colors.reset}`)
}

export async function main(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  connect: (path: string) => Promise<ConnectedProvider> = NiriProvider.connect
): Promise<number> {
  let flags: Flags
  let rules: MatchRules
  try {
    flags = parseArgs(args)
    rules = compileRules(flags)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    printError(err.message)
    return 1
  }

  if (flags.help) {
    process.stdout.write(HELP_TEXT)
    return 0
  }
  if (flags.version) {
    process.stdout.write(`pip-follow ${VERSION}\n`)
    return 0
  }

  const log = createLogger(flags.logLevel)
  const socketPath = resolveSocketPath(flags.socket, env)
  if (!socketPath) {
    printError("NIRI_SOCKET is not set; is niri running?")
    return 1
  }

  let provider: ConnectedProvider
  try {
    provider = await connect(socketPath)
  } catch (err) {
    printError(`Could not connect to ${socketPath}: ${err instanceof Error ? err.message : String(err)}`)
    return 1
  }

  let stopping = false
  const stop = () => {
    stopping = true
    provider.close()
  }
  process.once("SIGINT", stop)
  process.once("SIGTERM", stop)
  try {
    await new WindowFollowService(provider, createMatcher(rules), log).run()
    return 0
  } catch (err) {
    // Closing the sockets mid-request fails that request; that is a shutdown, not an error.
    if (!stopping) throw err
    log.debug(`Stopped during startup: ${err instanceof Error ? err.message : String(err)}`)
    return 0
  } finally {
    process.off("SIGINT", stop)
    process.off("SIGTERM", stop)
    provider.close()
  }
}
