/**
 * logger.ts
 *
 * Pluggable logging sink. The engine never requires a logger for correctness;
 * every component accepts one and defaults to `silentLogger`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, unknown>

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Defaults to 'info'. */
  level?: LogLevel
  /** Prepended to every message. Defaults to '[query]'. */
  prefix?: string
  /** Output target; defaults to the global console. */
  sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>
}

/**
 * Logger writing through `console`, filtered by level.
 *
 * @example
 * const client = new QueryClient({ logger: createConsoleLogger({ level: 'debug' }) })
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info']
  const prefix = options.prefix ?? '[query]'
  const sink = options.sink ?? console

  const write = (level: LogLevel) => (message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[level] < threshold) return
    if (context === undefined) {
      sink[level](`${prefix} ${message}`)
    } else {
      sink[level](`${prefix} ${message}`, context)
    }
  }

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  }
}
