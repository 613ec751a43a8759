import pino, { type DestinationStream, type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/corpus-config.js'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  /** Write to this stream instead of stdout */
  destination?: DestinationStream
  /** Log to stderr, keeping stdout for command output or a stdio protocol */
  stderr?: boolean
}

export function createLogger(
  config: LoggingConfig,
  options?: CreateLoggerOptions,
): Logger {
  if (options?.destination) {
    return pino({ level: config.level }, options.destination)
  }

  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (options?.stderr) {
    return usePretty
      ? pino({
          level: config.level,
          transport: { target: 'pino-pretty', options: { destination: 2 } },
        })
      : pino({ level: config.level }, pino.destination(2))
  }

  return pino({
    level: config.level,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}

/** A logger that discards everything; used where no logger is injected. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
