/**
 * Strict standard-alphabet base64.
 *
 * `Buffer.from(text, 'base64')` silently skips characters it does not
 * recognise, so input is checked against the alphabet and quantum layout
 * before it is decoded. Padding is optional; when present it must complete
 * the final quantum.
 */

import { MalformedBase64Error } from './errors.js'

const ALPHABET = /^[A-Za-z0-9+/=]$/
const LAYOUT = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}(?:==)?|[A-Za-z0-9+/]{3}=?)?$/

/** Encode bytes as padded, unwrapped base64. */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64')
}

/**
 * Decode base64 text.
 *
 * @throws {MalformedBase64Error} If the text contains a character outside the
 *   alphabet, has a dangling single character, or misplaces `=` padding.
 */
export function decodeBase64(text: string): Uint8Array {
  for (let i = 0; i < text.length; i++) {
    if (!ALPHABET.test(text.charAt(i))) {
      throw new MalformedBase64Error(
        `Invalid base64 character ${JSON.stringify(text.charAt(i))} at position ${String(i)}`,
        i,
      )
    }
  }

  if (!LAYOUT.test(text)) {
    throw new MalformedBase64Error(
      `Invalid base64 length or padding (${String(text.length)} characters)`,
      undefined,
    )
  }

  return new Uint8Array(Buffer.from(text, 'base64'))
}
