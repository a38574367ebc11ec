export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
}

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVELS, value)

export class Logger {
  constructor(private readonly level: LogLevel = 'info') {}

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level]
  }

  trace(message: string, ...details: unknown[]): void {
    this.write('trace', message, details)
  }

  debug(message: string, ...details: unknown[]): void {
    this.write('debug', message, details)
  }

  info(message: string, ...details: unknown[]): void {
    this.write('info', message, details)
  }

  warn(message: string, ...details: unknown[]): void {
    this.write('warn', message, details)
  }

  error(message: string, ...details: unknown[]): void {
    this.write('error', message, details)
  }

  /**
   * Write a bare mark with no line break, used for the verbose heartbeat
   */
  progress(mark: string): void {
    process.stdout.write(mark)
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (!this.isEnabled(level)) return

    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}`
    if (LEVELS[level] >= LEVELS.warn) {
      console.error(line, ...details)
    } else {
      console.log(line, ...details)
    }
  }
}

/**
 * Pick the log level from the environment.
 * POLLWATCH_DEBUG=true|1 wins over POLLWATCH_LOG.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.POLLWATCH_DEBUG === 'true' || env.POLLWATCH_DEBUG === '1') {
    return 'debug'
  }

  const requested = env.POLLWATCH_LOG?.trim().toLowerCase()
  if (requested && isLogLevel(requested)) {
    return requested
  }
  return 'info'
}

export function createLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  return new Logger(resolveLogLevel(env))
}
