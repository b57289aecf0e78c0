// ANSI color codes for terminal output
export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  dim: "\x1b[2m"
}

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type Logger = Record<LogLevel, (message: string) => void>

const tags: Record<LogLevel, string> = {
  trace: `${colors.dim}TRACE${colors.reset}`,
  debug: `${colors.blue}DEBUG${colors.reset}`,
  info: `${colors.cyan}INFO ${colors.reset}`,
  warn: `${colors.yellow}WARN ${colors.reset}`,
  error: `${colors.red}${colors.bold}ERROR${colors.reset}`
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const emit = (at: LogLevel) => (message: string) => {
    if (LOG_LEVELS.indexOf(at) < threshold) return
    const line = `${tags[at]} ${message}`
    if (at === "error") console.error(line)
    else console.log(line)
  }
  return {
    trace: emit("trace"),
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error")
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  trace: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
