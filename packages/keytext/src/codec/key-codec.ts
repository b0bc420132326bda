/**
 * Conversion between Ed25519 `KeyObject`s and their text encodings.
 */

import type { KeyObject } from 'node:crypto'
import type { Logger } from 'pino'
import { armor, hasArmor, stripArmor } from '../armor/index.js'
import { decodeBase64, encodeBase64 } from '../base64.js'
import { resolveCodecOptions } from '../config.js'
import type { KeyCodecOptions, ResolvedCodecOptions } from '../types.js'
import { exportRaw, exportSpki, importRaw, importSpki } from './spki.js'

/**
 * Encode and decode Ed25519 public keys as base64 SubjectPublicKeyInfo text.
 *
 * @remarks
 * A codec holds nothing but its frozen options, so one instance can be
 * shared by any number of callers. The module-level `keyToString` and
 * `stringToKey` functions use a default instance.
 *
 * @example
 * ```ts
 * const codec = new KeyCodec({ pemLineLength: 76 })
 * const text = codec.keyToString(publicKey)
 * const again = codec.stringToKey(codec.keyToPem(publicKey))
 * ```
 *
 * @public
 */
export class KeyCodec {
  /** Options with defaults applied. */
  readonly options: ResolvedCodecOptions

  readonly #log: Logger

  /**
   * @throws {InvalidOptionsError} If an option fails validation.
   */
  constructor(options?: KeyCodecOptions) {
    this.options = resolveCodecOptions(options)
    this.#log = this.options.logger
  }

  /**
   * Render an Ed25519 public key as unarmored, unwrapped base64 of its
   * SubjectPublicKeyInfo DER encoding.
   *
   * @throws {AlgorithmMismatchError} If the key is not Ed25519.
   * @throws {NotPublicKeyError} If the key is private.
   */
  keyToString(key: KeyObject): string {
    return encodeBase64(exportSpki(key))
  }

  /**
   * Parse base64 SubjectPublicKeyInfo text, optionally PEM-armored, into an
   * Ed25519 public key.
   *
   * @throws {MalformedBase64Error} If the de-armored text is not base64.
   * @throws {MalformedKeyEncodingError} If the bytes are not a loadable,
   *   canonical SubjectPublicKeyInfo.
   * @throws {AlgorithmMismatchError} If the structure holds another algorithm.
   */
  stringToKey(text: string): KeyObject {
    const armored = hasArmor(text)
    try {
      const der = decodeBase64(stripArmor(text))
      const key = importSpki(der)
      this.#log.debug({ armored, bytes: der.length }, 'decoded public key')
      return key
    } catch (err) {
      this.#log.debug(
        { armored, reason: err instanceof Error ? err.name : String(err) },
        'rejected key text',
      )
      throw err
    }
  }

  /** Remove PEM armor. See {@link stripArmor}. */
  stripArmor(text: string): string {
    return stripArmor(text)
  }

  /**
   * Render an Ed25519 public key as a PEM block using this codec's line
   * length and separator.
   */
  keyToPem(key: KeyObject): string {
    return armor(this.keyToString(key), this.options)
  }

  /** Return the bare 32-byte public point of an Ed25519 key. */
  keyToRaw(key: KeyObject): Uint8Array {
    return exportRaw(key)
  }

  /**
   * Load a bare 32-byte Ed25519 public point.
   *
   * @throws {MalformedKeyEncodingError} If `raw` is not 32 bytes long.
   */
  rawToKey(raw: Uint8Array): KeyObject {
    return importRaw(raw)
  }
}
