/**
 * Shared types for keytext.
 */

import type { Logger } from 'pino'

/** Line terminator written between PEM lines. */
export type LineSeparator = '\n' | '\r\n'

/** Options accepted by {@link armor}. */
export interface ArmorOptions {
  /** Width of each base64 line between header and footer. Defaults to 64. */
  pemLineLength?: number | undefined
  /** Separator written after every line. Defaults to `'\n'`. */
  lineSeparator?: LineSeparator | undefined
}

/** Options accepted by a `KeyCodec`. */
export interface KeyCodecOptions extends ArmorOptions {
  /**
   * Receives `debug` records for every decode. Defaults to a silent logger.
   */
  logger?: Logger | undefined
}

/** Codec options after defaults have been applied. */
export interface ResolvedCodecOptions {
  readonly pemLineLength: number
  readonly lineSeparator: LineSeparator
  readonly logger: Logger
}

/** An Ed25519 public key as a JSON Web Key (RFC 8037). */
export interface Ed25519Jwk {
  /** Key type; always `'OKP'` (octet key pair). */
  kty: 'OKP'
  /** Curve; always `'Ed25519'`. */
  crv: 'Ed25519'
  /** The 32-byte public point, base64url without padding. */
  x: string
}
