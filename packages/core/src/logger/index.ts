import pino from 'pino'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error'

/**
 * LoggerProvider is a class that provides logging functionality.
 * It is a wrapper around the pino logger.
 * It is a singleton class.
 * @description Everything goes to stderr: stdout belongs to the running program's output.
 * Initialize it at the top of the entry point; until then messages fall back to the console.
 */
export class LoggerProvider {
  private pino = pino(
    {
      level: process.env['LOG_LEVEL'] || 'info',
    },
    pino.destination({ fd: 2, sync: true }),
  )
  private hasBeenInitialized = false

  get hasBeenInitializedValue() {
    return this.hasBeenInitialized
  }

  get level() {
    return this.pino.level
  }

  init(level?: LogLevel) {
    if (level) {
      this.pino.level = level
    }
    this.hasBeenInitialized = true
    this.pino.debug('LoggerProvider initialized')
  }

  setLevel(level: LogLevel) {
    this.pino.level = level
  }

  trace(message: string, ...args: unknown[]) {
    this._safeLog('trace', message, args)
  }

  info(message: string, ...args: unknown[]) {
    this._safeLog('info', message, args)
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this._safeLog('warn', message, args)
  }

  error(message: string, error?: unknown, ..._args: unknown[]) {
    this._safeLog('error', message, [error, ..._args])
  }

  private isLevelEnabled(level: LogLevel): boolean {
    const threshold = pino.levels.values[this.pino.level] ?? 30
    return pino.levels.values[level] >= threshold
  }

  /**
   * Routes to pino once initialized, to console.error before that
   */
  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.isLevelEnabled(level)) {
      return
    }

    if (!this.hasBeenInitialized) {
      const timestamp = new Date().toISOString()
      console.error(
        `[${timestamp}] [${level.toUpperCase()}] ${message}`,
        ...args,
      )
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino[level]({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()
