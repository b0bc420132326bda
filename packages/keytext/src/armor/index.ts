/**
 * PEM armor barrel export.
 */

export { armor, hasArmor, stripArmor } from './armor.js'
