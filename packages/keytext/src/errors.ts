/**
 * Error hierarchy for keytext.
 *
 * Every failure of the codec is one of the subclasses below, so callers can
 * branch with `instanceof` instead of matching on messages.
 *
 * @packageDocumentation
 */

/** Base error for all keytext errors. */
export class KeyTextError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'KeyTextError'
  }
}

// --- Key Identity Failures ---

/**
 * Thrown when a key, either supplied by the caller or decoded from text, is
 * not an Ed25519 key.
 */
export class AlgorithmMismatchError extends KeyTextError {
  /**
   * The algorithm the key actually reported (e.g. `'rsa'`, `'ec'`,
   * `'ed448'`), or `undefined` for symmetric keys that carry none.
   */
  readonly actual: string | undefined

  constructor(message: string, actual: string | undefined) {
    super(message)
    this.name = 'AlgorithmMismatchError'
    this.actual = actual
  }
}

/**
 * Thrown when an Ed25519 private key is passed where only public keys are
 * accepted.
 */
export class NotPublicKeyError extends KeyTextError {
  /** The `KeyObject.type` that was received. */
  readonly keyType: string

  constructor(message: string, keyType: string) {
    super(message)
    this.name = 'NotPublicKeyError'
    this.keyType = keyType
  }
}

// --- Encoding Failures ---

/**
 * Thrown when text is not valid standard-alphabet base64.
 */
export class MalformedBase64Error extends KeyTextError {
  /**
   * Index of the first character outside the base64 alphabet. `undefined`
   * when every character is legal but the length or padding is wrong.
   */
  readonly position: number | undefined

  constructor(message: string, position: number | undefined) {
    super(message)
    this.name = 'MalformedBase64Error'
    this.position = position
  }
}

/**
 * Thrown when decoded bytes are not a SubjectPublicKeyInfo structure that
 * Node.js can load, when an Ed25519 structure holds a point of the wrong
 * length, or when the DER is not in canonical form.
 */
export class MalformedKeyEncodingError extends KeyTextError {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedKeyEncodingError'
  }
}

// --- Configuration Failures ---

/**
 * Thrown when codec options fail validation.
 */
export class InvalidOptionsError extends KeyTextError {
  /** Name of the offending option (e.g. `'pemLineLength'`). */
  readonly option: string

  constructor(message: string, option: string) {
    super(message)
    this.name = 'InvalidOptionsError'
    this.option = option
  }
}
