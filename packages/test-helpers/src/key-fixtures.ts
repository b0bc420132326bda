/**
 * Pre-generated keys for consumer tests.
 */

import * as crypto from 'node:crypto'
import type { KeyCodecOptions } from 'keytext'
import { KeyCodec } from 'keytext'

/**
 * Options for creating {@link KeyFixtures}.
 * @public
 */
export interface KeyFixturesOptions {
  /** Options for the fixture's codec. */
  codec?: KeyCodecOptions | undefined
  /** RSA modulus length for the rejection key. Defaults to 1024 for speed. */
  rsaModulusLength?: number | undefined
}

/**
 * A fresh Ed25519 key pair plus keys of other algorithms, for codec tests.
 *
 * @remarks
 * The non-Ed25519 public keys exist so consumers can assert that their code
 * surfaces `AlgorithmMismatchError` rather than accepting foreign keys.
 *
 * @example
 * ```ts
 * const fixtures = KeyFixtures.create()
 * const text = fixtures.codec.keyToString(fixtures.publicKey)
 * const sig = fixtures.sign('hello')
 * crypto.verify(null, Buffer.from('hello'), fixtures.codec.stringToKey(text), sig)
 * ```
 *
 * @public
 */
export class KeyFixtures {
  /** Ed25519 public key. */
  readonly publicKey: crypto.KeyObject

  /** Ed25519 private key matching {@link KeyFixtures.publicKey}. */
  readonly privateKey: crypto.KeyObject

  /** Public keys of other algorithms, keyed by `asymmetricKeyType`. */
  readonly foreign: {
    readonly rsa: crypto.KeyObject
    readonly ec: crypto.KeyObject
    readonly ed448: crypto.KeyObject
  }

  /** Codec configured from the creation options. */
  readonly codec: KeyCodec

  private constructor(
    pair: crypto.KeyPairKeyObjectResult,
    foreign: KeyFixtures['foreign'],
    codec: KeyCodec,
  ) {
    this.publicKey = pair.publicKey
    this.privateKey = pair.privateKey
    this.foreign = foreign
    this.codec = codec
  }

  /**
   * Generate a new set of fixtures.
   *
   * @throws {InvalidOptionsError} If the codec options are invalid.
   */
  static create(options: KeyFixturesOptions = {}): KeyFixtures {
    const codec = new KeyCodec(options.codec)
    const pair = crypto.generateKeyPairSync('ed25519')
    const foreign = {
      rsa: crypto.generateKeyPairSync('rsa', {
        modulusLength: options.rsaModulusLength ?? 1024,
      }).publicKey,
      ec: crypto.generateKeyPairSync('ec', { namedCurve: 'P-256' }).publicKey,
      ed448: crypto.generateKeyPairSync('ed448').publicKey,
    }
    return new KeyFixtures(pair, foreign, codec)
  }

  /** Base64 SubjectPublicKeyInfo text of the Ed25519 public key. */
  get text(): string {
    return this.codec.keyToString(this.publicKey)
  }

  /** Base64 SubjectPublicKeyInfo text of a foreign key, bypassing the codec checks. */
  foreignText(kind: keyof KeyFixtures['foreign']): string {
    return this.foreign[kind].export({ type: 'spki', format: 'der' }).toString('base64')
  }

  /** Sign `data` with the Ed25519 private key. */
  sign(data: string | Uint8Array): Buffer {
    return crypto.sign(null, typeof data === 'string' ? Buffer.from(data) : data, this.privateKey)
  }
}
