/**
 * @keytext/test-helpers — Test utilities for keytext consumers.
 *
 * @packageDocumentation
 */

export { KeyFixtures } from './key-fixtures.js'
export type { KeyFixturesOptions } from './key-fixtures.js'
export { foldArmor } from './fold-armor.js'
export type { FoldSeparator } from './fold-armor.js'
