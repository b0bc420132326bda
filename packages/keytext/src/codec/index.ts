/**
 * Codec barrel export and the stateless module-level API.
 */

import type { KeyObject } from 'node:crypto'
import { KeyCodec } from './key-codec.js'

export { KeyCodec } from './key-codec.js'

/** Codec with default options, shared by the functions below. */
export const defaultCodec = new KeyCodec()

/** {@inheritDoc KeyCodec.keyToString} */
export function keyToString(key: KeyObject): string {
  return defaultCodec.keyToString(key)
}

/** {@inheritDoc KeyCodec.stringToKey} */
export function stringToKey(text: string): KeyObject {
  return defaultCodec.stringToKey(text)
}

/** {@inheritDoc KeyCodec.keyToPem} */
export function keyToPem(key: KeyObject): string {
  return defaultCodec.keyToPem(key)
}

/** {@inheritDoc KeyCodec.keyToRaw} */
export function keyToRaw(key: KeyObject): Uint8Array {
  return defaultCodec.keyToRaw(key)
}

/** {@inheritDoc KeyCodec.rawToKey} */
export function rawToKey(raw: Uint8Array): KeyObject {
  return defaultCodec.rawToKey(raw)
}
