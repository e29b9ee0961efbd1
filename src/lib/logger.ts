/**
 * Logger - TTY-aware diagnostics on stderr
 *
 * stdout is reserved for report data, so every level writes through
 * console.error.
 */

export interface Logger {
  info(message: string): void
  debug(message: string): void
  warn(message: string): void
  error(message: string): void
  success(message: string): void
}

export interface LoggerOptions {
  /** Show debug messages */
  verbose?: boolean
  /** Suppress everything except warnings and errors */
  quiet?: boolean
  /** Defaults to whether stderr is a terminal */
  tty?: boolean
}

const PREFIX = '[regula]'

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false } = options
  const tty = options.tty ?? process.stderr.isTTY ?? false

  return {
    info(message) {
      if (!quiet) console.error(message)
    },
    debug(message) {
      if (verbose && !quiet) console.error(`${PREFIX} ${message}`)
    },
    warn(message) {
      console.error(`Warning: ${message}`)
    },
    error(message) {
      console.error(`Error: ${message}`)
    },
    success(message) {
      // Decorative only; pipes get nothing
      if (tty && !quiet) console.error(`✓ ${message}`)
    }
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
  success: () => {}
}
