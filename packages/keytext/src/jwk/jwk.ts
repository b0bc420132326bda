/**
 * JSON Web Key interop for Ed25519 public keys using `jose`.
 */

import { KeyObject } from 'node:crypto'
import { calculateJwkThumbprint, exportJWK, importJWK, type KeyLike } from 'jose'
import { assertEd25519PublicKey } from '../codec/spki.js'
import { AlgorithmMismatchError, MalformedKeyEncodingError, NotPublicKeyError } from '../errors.js'
import { isObject } from '../guards.js'
import type { Ed25519Jwk } from '../types.js'

const JWS_ALGORITHM = 'EdDSA'

/**
 * Narrow an untyped JWK to the public Ed25519 members.
 */
function parseEd25519Jwk(raw: unknown): Ed25519Jwk {
  if (!isObject(raw)) {
    throw new MalformedKeyEncodingError('JWK must be an object')
  }

  const { kty, crv, x, d } = raw
  if (kty !== 'OKP' || crv !== 'Ed25519') {
    const actual = typeof crv === 'string' ? crv : typeof kty === 'string' ? kty : undefined
    throw new AlgorithmMismatchError(
      `JWK type is ${actual ?? 'unknown'}, should be OKP/Ed25519`,
      actual,
    )
  }
  if (d !== undefined) {
    throw new NotPublicKeyError('Expected a public JWK, got one with a private "d" member', 'private')
  }
  if (typeof x !== 'string' || x === '') {
    throw new MalformedKeyEncodingError('JWK "x" member must be a non-empty string')
  }

  return { kty, crv, x }
}

/**
 * Export an Ed25519 public key as a JSON Web Key (RFC 8037).
 *
 * @throws {AlgorithmMismatchError} If the key is not Ed25519.
 * @throws {NotPublicKeyError} If the key is private.
 */
export async function keyToJwk(key: KeyObject): Promise<Ed25519Jwk> {
  assertEd25519PublicKey(key)
  return parseEd25519Jwk(await exportJWK(key))
}

/**
 * Import an Ed25519 public JSON Web Key.
 *
 * Only `kty`, `crv` and `x` are passed on; `alg`, `kid`, `use` and other
 * metadata members are ignored.
 *
 * @throws {AlgorithmMismatchError} If the JWK is not OKP/Ed25519.
 * @throws {NotPublicKeyError} If the JWK carries a private `d` member.
 * @throws {MalformedKeyEncodingError} If `x` is missing or not a valid point.
 */
export async function jwkToKey(jwk: unknown): Promise<KeyObject> {
  const parsed = parseEd25519Jwk(jwk)

  let imported: KeyLike | Uint8Array
  try {
    imported = await importJWK({ ...parsed }, JWS_ALGORITHM)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new MalformedKeyEncodingError(`JWK is not a valid Ed25519 key: ${message}`)
  }

  if (!(imported instanceof KeyObject)) {
    throw new MalformedKeyEncodingError('JWK did not import as an asymmetric key')
  }
  assertEd25519PublicKey(imported)
  return imported
}

/**
 * Compute the RFC 7638 SHA-256 thumbprint of an Ed25519 public key,
 * base64url-encoded.
 */
export async function keyThumbprint(key: KeyObject): Promise<string> {
  return calculateJwkThumbprint(await keyToJwk(key), 'sha256')
}
