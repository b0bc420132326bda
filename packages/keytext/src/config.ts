/**
 * Codec option validation, defaults, and environment loading.
 *
 * @packageDocumentation
 */

import { DEFAULT_PEM_LINE_LENGTH } from './constants.js'
import { InvalidOptionsError } from './errors.js'
import { isObject } from './guards.js'
import { createLogger, isLogLevel, silentLogger } from './logger.js'
import type { KeyCodecOptions, LineSeparator, ResolvedCodecOptions } from './types.js'

/** Environment variables read by {@link codecOptionsFromEnv}. */
export const ENV_PEM_LINE_LENGTH = 'KEYTEXT_PEM_LINE_LENGTH'
export const ENV_LINE_SEPARATOR = 'KEYTEXT_LINE_SEPARATOR'
export const ENV_LOG_LEVEL = 'KEYTEXT_LOG_LEVEL'

function isLineSeparator(value: unknown): value is LineSeparator {
  return value === '\n' || value === '\r\n'
}

function checkLineLength(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidOptionsError(
      `pemLineLength must be a positive integer, got ${String(value)}`,
      'pemLineLength',
    )
  }
  return value
}

/**
 * Validate an unknown value (for example parsed JSON) as `KeyCodecOptions`.
 * Loggers cannot come from untyped data, so a `logger` field is rejected.
 */
export function validateCodecOptions(value: unknown): KeyCodecOptions {
  if (!isObject(value)) {
    throw new InvalidOptionsError('Codec options must be an object', 'options')
  }

  const result: KeyCodecOptions = {}

  if (value.pemLineLength !== undefined) {
    result.pemLineLength = checkLineLength(value.pemLineLength)
  }

  if (value.lineSeparator !== undefined) {
    if (!isLineSeparator(value.lineSeparator)) {
      throw new InvalidOptionsError('lineSeparator must be "\\n" or "\\r\\n"', 'lineSeparator')
    }
    result.lineSeparator = value.lineSeparator
  }

  if (value.logger !== undefined) {
    throw new InvalidOptionsError('logger cannot be set from untyped options', 'logger')
  }

  return result
}

/**
 * Apply defaults to codec options and freeze the result.
 */
export function resolveCodecOptions(options: KeyCodecOptions = {}): ResolvedCodecOptions {
  const pemLineLength =
    options.pemLineLength === undefined
      ? DEFAULT_PEM_LINE_LENGTH
      : checkLineLength(options.pemLineLength)

  const lineSeparator = options.lineSeparator ?? '\n'
  if (!isLineSeparator(lineSeparator)) {
    throw new InvalidOptionsError('lineSeparator must be "\\n" or "\\r\\n"', 'lineSeparator')
  }

  return Object.freeze({
    pemLineLength,
    lineSeparator,
    logger: options.logger ?? silentLogger,
  })
}

/**
 * Build codec options from `KEYTEXT_*` environment variables. Unset variables
 * are left out so defaults apply.
 */
export function codecOptionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): KeyCodecOptions {
  const result: KeyCodecOptions = {}

  const lineLength = env[ENV_PEM_LINE_LENGTH]
  if (lineLength !== undefined && lineLength !== '') {
    if (!/^\d+$/.test(lineLength)) {
      throw new InvalidOptionsError(
        `${ENV_PEM_LINE_LENGTH} must be a positive integer, got "${lineLength}"`,
        'pemLineLength',
      )
    }
    result.pemLineLength = checkLineLength(Number(lineLength))
  }

  const separator = env[ENV_LINE_SEPARATOR]
  if (separator !== undefined && separator !== '') {
    switch (separator.toLowerCase()) {
      case 'lf':
        result.lineSeparator = '\n'
        break
      case 'crlf':
        result.lineSeparator = '\r\n'
        break
      default:
        throw new InvalidOptionsError(
          `${ENV_LINE_SEPARATOR} must be "lf" or "crlf", got "${separator}"`,
          'lineSeparator',
        )
    }
  }

  const level = env[ENV_LOG_LEVEL]
  if (level !== undefined && level !== '') {
    if (!isLogLevel(level)) {
      throw new InvalidOptionsError(`${ENV_LOG_LEVEL} "${level}" is not a log level`, 'logger')
    }
    result.logger = createLogger(level)
  }

  return result
}
