/**
 * keytext — Text encodings for Ed25519 public keys.
 *
 * Converts `node:crypto` `KeyObject`s to and from base64
 * SubjectPublicKeyInfo text, optionally PEM-armored, plus raw 32-byte points
 * and JSON Web Keys.
 *
 * @packageDocumentation
 */

export {
  KeyTextError,
  AlgorithmMismatchError,
  NotPublicKeyError,
  MalformedBase64Error,
  MalformedKeyEncodingError,
  InvalidOptionsError,
} from './errors.js'

export type {
  ArmorOptions,
  Ed25519Jwk,
  KeyCodecOptions,
  LineSeparator,
  ResolvedCodecOptions,
} from './types.js'

export {
  KeyCodec,
  defaultCodec,
  keyToString,
  stringToKey,
  keyToPem,
  keyToRaw,
  rawToKey,
} from './codec/index.js'

export { armor, hasArmor, stripArmor } from './armor/index.js'

export { encodeBase64, decodeBase64 } from './base64.js'

export { keyToJwk, jwkToKey, keyThumbprint } from './jwk/index.js'

export {
  validateCodecOptions,
  resolveCodecOptions,
  codecOptionsFromEnv,
  ENV_PEM_LINE_LENGTH,
  ENV_LINE_SEPARATOR,
  ENV_LOG_LEVEL,
} from './config.js'

export { createLogger } from './logger.js'

export {
  ED25519_KEY_TYPE,
  ED25519_PUBLIC_KEY_SIZE,
  ED25519_SPKI_PREFIX_SIZE,
  ed25519SpkiPrefix,
  ED25519_SPKI_SIZE,
  PEM_HEADER,
  PEM_FOOTER,
  DEFAULT_PEM_LINE_LENGTH,
} from './constants.js'
