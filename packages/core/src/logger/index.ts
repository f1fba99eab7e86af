import pino, { type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/settings.js'

export type { Logger } from 'pino'

/**
 * Logs go to stderr: stdout belongs to command output (the CLI prints its
 * JSON results there).
 */
export function createLogger(config: LoggingConfig): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  if (usePretty) {
    return pino({
      name: 'evs-bridge',
      level: config.level,
      transport: { target: 'pino-pretty', options: { destination: 2 } },
    })
  }

  return pino({ name: 'evs-bridge', level: config.level }, pino.destination(2))
}

/** Logger that discards everything, for tests and callers that want no output. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
