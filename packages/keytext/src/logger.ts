/**
 * Logger construction for keytext.
 */

import { pino, type LevelWithSilent, type Logger } from 'pino'

/** Log levels accepted in configuration, including `'silent'`. */
export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

/** Type guard for a pino level name. */
export function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value)
}

/** Create a named keytext logger writing JSON lines to stdout. */
export function createLogger(level: LevelWithSilent): Logger {
  return pino({ name: 'keytext', level })
}

/** Shared logger used when the caller supplies none. */
export const silentLogger: Logger = createLogger('silent')
