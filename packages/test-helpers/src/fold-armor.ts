/**
 * PEM folding at arbitrary columns for armor-insensitivity tests.
 */

import { PEM_FOOTER, PEM_HEADER } from 'keytext'

/**
 * Line separators accepted by {@link foldArmor}. Includes a lone CR, which
 * `keytext` never writes but does accept.
 * @public
 */
export type FoldSeparator = '\n' | '\r\n' | '\r'

/**
 * Wrap base64 text in a public-key PEM block, folding the payload every
 * `column` characters.
 *
 * @remarks
 * Unlike `armor()` from `keytext`, this helper accepts any separator
 * and leaves the trailing separator optional, so tests can produce the
 * shapes real-world PEM files come in.
 *
 * @public
 */
export function foldArmor(
  base64: string,
  column: number,
  separator: FoldSeparator = '\n',
  trailingSeparator = true,
): string {
  if (!Number.isInteger(column) || column <= 0) {
    throw new RangeError(`column must be a positive integer, got ${String(column)}`)
  }

  const lines = [PEM_HEADER]
  for (let i = 0; i < base64.length; i += column) {
    lines.push(base64.slice(i, i + column))
  }
  lines.push(PEM_FOOTER)

  const body = lines.join(separator)
  return trailingSeparator ? body + separator : body
}
