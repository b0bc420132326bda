/**
 * Encoding constants for Ed25519 SubjectPublicKeyInfo and PEM armor.
 */

/** `KeyObject.asymmetricKeyType` reported by Node.js for Ed25519 keys. */
export const ED25519_KEY_TYPE = 'ed25519'

/** Ed25519 public key size in bytes. */
export const ED25519_PUBLIC_KEY_SIZE = 32

const SPKI_PREFIX = [0x30, 0x2a, 0x30, 0x05, 0x06, 0x03, 0x2b, 0x65, 0x70, 0x03, 0x21, 0x00] as const

/** Size of the Ed25519 SubjectPublicKeyInfo prefix in bytes. */
export const ED25519_SPKI_PREFIX_SIZE = SPKI_PREFIX.length

/** Total size of an Ed25519 SubjectPublicKeyInfo in bytes. */
export const ED25519_SPKI_SIZE = ED25519_SPKI_PREFIX_SIZE + ED25519_PUBLIC_KEY_SIZE

/**
 * DER prefix of an Ed25519 SubjectPublicKeyInfo (RFC 8410): SEQUENCE,
 * AlgorithmIdentifier with OID 1.3.101.112, then the BIT STRING header for a
 * 32-byte key. Returns a fresh copy on every call.
 */
export function ed25519SpkiPrefix(): Uint8Array {
  return new Uint8Array(SPKI_PREFIX)
}

/** Substring whose presence marks text as PEM-armored. */
export const ARMOR_MARKER = '----BEGIN'

/** PEM header line for a SubjectPublicKeyInfo. */
export const PEM_HEADER = '-----BEGIN PUBLIC KEY-----'

/** PEM footer line for a SubjectPublicKeyInfo. */
export const PEM_FOOTER = '-----END PUBLIC KEY-----'

/** Payload width used by OpenSSL and RFC 7468 for PEM bodies. */
export const DEFAULT_PEM_LINE_LENGTH = 64
