import pino from 'pino'

type LogLevel = 'debug' | 'error'

/**
 * Process-wide pino logger for the square packer.
 *
 * The level comes from `PINO_LEVEL` (default `info`). Errors go to stderr,
 * everything else to stdout. A process embedding the packer calls `init()`
 * at the top of its entry point; until then records at an enabled level are
 * printed through the console instead.
 */
export class LoggerProvider {
  private readonly pino: pino.Logger
  private hasBeenInitialized = false

  constructor(level: string = process.env['PINO_LEVEL'] || 'info') {
    this.pino = pino(
      { level },
      pino.multistream([
        { level: 'error', stream: process.stderr },
        { level: 'debug', stream: process.stdout },
      ]),
    )
  }

  get initialized(): boolean {
    return this.hasBeenInitialized
  }

  init() {
    this.pino.info('LoggerProvider initialized')
    this.hasBeenInitialized = true
  }

  debug(message: string, ...args: unknown[]) {
    this._safeLog('debug', message, args)
  }

  error(message: string, error?: unknown, ...args: unknown[]) {
    this._safeLog('error', message, [error, ...args])
  }

  private _safeLog(level: LogLevel, message: string, args: unknown[]) {
    if (!this.pino.isLevelEnabled(level)) return

    if (!this.hasBeenInitialized) {
      const logMessage = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`
      if (level === 'error') {
        console.error(logMessage, ...args)
      } else {
        console.debug(logMessage, ...args)
      }
      return
    }

    if (level === 'error') {
      this.pino.error({ err: args[0], args: args.slice(1) }, message)
    } else {
      this.pino.debug({ args }, message)
    }
  }
}

export const logger = new LoggerProvider()
