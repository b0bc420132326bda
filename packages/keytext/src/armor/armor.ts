/**
 * PEM armor for SubjectPublicKeyInfo text.
 */

import { resolveCodecOptions } from '../config.js'
import { ARMOR_MARKER, PEM_FOOTER, PEM_HEADER } from '../constants.js'
import type { ArmorOptions } from '../types.js'

/** Any line break: CRLF, lone CR, or LF. */
const LINE_BREAKS = /\r\n|\r|\n/g

/** Return `true` if `text` carries a PEM `BEGIN` marker. */
export function hasArmor(text: string): boolean {
  return text.includes(ARMOR_MARKER)
}

/**
 * Remove PEM armor from `text`.
 *
 * When the `----BEGIN` marker is present, the exact public-key header and
 * footer are removed along with every CRLF, CR and LF, whatever the host
 * platform. Text without the marker is returned unchanged, so the function is
 * idempotent.
 */
export function stripArmor(text: string): string {
  if (!hasArmor(text)) {
    return text
  }
  return text.replaceAll(PEM_HEADER, '').replaceAll(PEM_FOOTER, '').replace(LINE_BREAKS, '')
}

/**
 * Wrap base64 text in a PEM public-key header and footer.
 *
 * The payload is folded at `pemLineLength` columns and every line, the footer
 * included, ends with `lineSeparator`. With the defaults the output matches
 * `KeyObject.export({ type: 'spki', format: 'pem' })`.
 *
 * @throws {InvalidOptionsError} If `pemLineLength` is not a positive integer.
 */
export function armor(base64: string, options: ArmorOptions = {}): string {
  const { pemLineLength, lineSeparator } = resolveCodecOptions(options)

  const lines = [PEM_HEADER]
  for (let offset = 0; offset < base64.length; offset += pemLineLength) {
    lines.push(base64.slice(offset, offset + pemLineLength))
  }
  lines.push(PEM_FOOTER)

  return lines.join(lineSeparator) + lineSeparator
}
