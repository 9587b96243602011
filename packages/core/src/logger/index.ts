import pino, { type DestinationStream, type Logger } from 'pino'
import type { LoggingConfig } from '../schemas/server-config.js'

export type { Logger } from 'pino'

// Drive bearer tokens must never reach the log
const REDACT_PATHS = [
  'token',
  '*.token',
  'authorization',
  'headers.authorization',
  '*.headers.authorization',
]

/**
 * Root logger. Pretty output outside production unless a destination is
 * given, in which case JSON lines go straight to it.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: DestinationStream,
): Logger {
  const options = {
    name: 'sheetshelf',
    level: config.level,
    redact: REDACT_PATHS,
  }

  if (destination) return pino(options, destination)

  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'

  return pino({
    ...options,
    ...(usePretty
      ? { transport: { target: 'pino-pretty' } }
      : {}),
  })
}

/** Child logger tagged with the component that owns it. */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component })
}
