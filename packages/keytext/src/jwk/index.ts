/**
 * JWK barrel export.
 */

export { keyToJwk, jwkToKey, keyThumbprint } from './jwk.js'
