/**
 * SubjectPublicKeyInfo checks and conversions on top of `node:crypto`.
 * @internal
 */

import * as crypto from 'node:crypto'
import {
  ED25519_KEY_TYPE,
  ED25519_PUBLIC_KEY_SIZE,
  ED25519_SPKI_PREFIX_SIZE,
  ed25519SpkiPrefix,
} from '../constants.js'
import {
  AlgorithmMismatchError,
  MalformedKeyEncodingError,
  NotPublicKeyError,
} from '../errors.js'

/**
 * Ensure `key` is an Ed25519 public key.
 *
 * The algorithm is checked first, so a symmetric or RSA key always reports
 * `AlgorithmMismatchError` whatever its `type`.
 *
 * @throws {AlgorithmMismatchError} If the key is not Ed25519.
 * @throws {NotPublicKeyError} If the key is an Ed25519 private key.
 * @internal
 */
export function assertEd25519PublicKey(key: crypto.KeyObject): void {
  const actual = key.asymmetricKeyType
  if (actual !== ED25519_KEY_TYPE) {
    throw new AlgorithmMismatchError(
      `Key type is ${actual ?? key.type}, should be ${ED25519_KEY_TYPE}`,
      actual,
    )
  }
  if (key.type !== 'public') {
    throw new NotPublicKeyError(`Expected a public key, got a ${key.type} key`, key.type)
  }
}

/**
 * Export an Ed25519 public key as SubjectPublicKeyInfo DER.
 * @internal
 */
export function exportSpki(key: crypto.KeyObject): Uint8Array {
  assertEd25519PublicKey(key)
  return new Uint8Array(key.export({ type: 'spki', format: 'der' }))
}

/**
 * Load SubjectPublicKeyInfo DER as an Ed25519 public key.
 *
 * Node.js accepts any algorithm here, so the algorithm is checked after
 * loading. The loaded key must export back to exactly `der`.
 *
 * @throws {MalformedKeyEncodingError} If `der` cannot be loaded or is not
 *   in canonical form.
 * @throws {AlgorithmMismatchError} If `der` holds a key of another algorithm.
 * @internal
 */
export function importSpki(der: Uint8Array): crypto.KeyObject {
  let key: crypto.KeyObject
  try {
    key = crypto.createPublicKey({ key: Buffer.from(der), format: 'der', type: 'spki' })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new MalformedKeyEncodingError(
      `Key encoding is not a valid SubjectPublicKeyInfo: ${message}`,
    )
  }

  assertEd25519PublicKey(key)

  const canonical = key.export({ type: 'spki', format: 'der' })
  if (!canonical.equals(der)) {
    throw new MalformedKeyEncodingError('Key encoding is not canonical DER')
  }

  return key
}

/**
 * Extract the 32-byte public point from an Ed25519 key.
 * @internal
 */
export function exportRaw(key: crypto.KeyObject): Uint8Array {
  return exportSpki(key).slice(ED25519_SPKI_PREFIX_SIZE)
}

/**
 * Load a bare 32-byte Ed25519 public point.
 *
 * @throws {MalformedKeyEncodingError} If `raw` is not 32 bytes long.
 * @internal
 */
export function importRaw(raw: Uint8Array): crypto.KeyObject {
  if (raw.length !== ED25519_PUBLIC_KEY_SIZE) {
    throw new MalformedKeyEncodingError(
      `Ed25519 public key must be ${String(ED25519_PUBLIC_KEY_SIZE)} bytes, got ${String(raw.length)}`,
    )
  }
  return importSpki(Buffer.concat([ed25519SpkiPrefix(), raw]))
}
