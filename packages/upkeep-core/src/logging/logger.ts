/**
 * Leveled console logger shared by the engine and the CLI.
 */
export interface Logger {
  /** Diagnostic detail, printed only in verbose mode. */
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

/**
 * Minimal writable sink, satisfied by `process.stdout` and `process.stderr`.
 */
export interface LogStream {
  write(chunk: string): unknown
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /** Emits debug messages when true. */
  readonly verbose: boolean
  /** Stream for debug and info messages. */
  readonly stdout?: LogStream
  /** Stream for warnings and errors. */
  readonly stderr?: LogStream
  /** Disables ANSI colours when false. */
  readonly color?: boolean
}

type LogColor = 'red' | 'yellow' | 'dim'

/**
 * Creates a logger writing to the process streams.
 *
 * @param options Logger options.
 * @returns Logger instance.
 */
export const createConsoleLogger = (options: ConsoleLoggerOptions): Logger => {
  const stdout = options.stdout ?? process.stdout
  const stderr = options.stderr ?? process.stderr
  const color = options.color ?? true

  const paint = (text: string, tone: LogColor): string => {
    return color ? colorize(text, tone) : text
  }

  return {
    debug: (message: string): void => {
      if (options.verbose) {
        stdout.write(`${paint(message, 'dim')}\n`)
      }
    },
    info: (message: string): void => {
      stdout.write(`${message}\n`)
    },
    warn: (message: string): void => {
      stderr.write(`${paint(`warning: ${message}`, 'yellow')}\n`)
    },
    error: (message: string): void => {
      stderr.write(`${paint(`error: ${message}`, 'red')}\n`)
    },
  }
}

/**
 * Creates a logger that drops every message.
 *
 * @returns Logger instance.
 */
export const createSilentLogger = (): Logger => {
  const drop = (): void => undefined
  return { debug: drop, info: drop, warn: drop, error: drop }
}

const colorize = (text: string, tone: LogColor): string => {
  const colors: Record<LogColor, string> = {
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    dim: '\x1b[2m',
  }

  return `${colors[tone]}${text}\x1b[0m`
}
