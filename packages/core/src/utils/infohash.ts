/**
 * Branded type for normalized (lowercase) info hash hex strings.
 * Use the factory functions to create instances - never cast directly.
 */
declare const InfoHashBrand: unique symbol
export type InfoHashHex = string & { readonly [InfoHashBrand]: true }

const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567'

/**
 * Convert a hex string to InfoHashHex, normalizing to lowercase.
 * @throws Error if not a valid 40-char hex string
 */
export function infoHashFromHex(hex: string): InfoHashHex {
  const normalized = hex.toLowerCase()
  if (!/^[0-9a-f]{40}$/.test(normalized)) {
    throw new Error(`Invalid info hash hex: ${hex}`)
  }
  return normalized as InfoHashHex
}

/**
 * Convert raw bytes to InfoHashHex. Always produces lowercase.
 * @throws Error if not exactly 20 bytes
 */
export function infoHashFromBytes(bytes: Uint8Array): InfoHashHex {
  if (bytes.length !== 20) {
    throw new Error(`Invalid info hash bytes: expected 20, got ${bytes.length}`)
  }
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('') as InfoHashHex
}

/**
 * Convert the 32-char base32 form (RFC 4648, as older magnet links carry it)
 * to InfoHashHex.
 * @throws Error if not 32 base32 characters
 */
export function infoHashFromBase32(base32: string): InfoHashHex {
  const normalized = base32.toUpperCase()
  if (!/^[A-Z2-7]{32}$/.test(normalized)) {
    throw new Error(`Invalid info hash base32: ${base32}`)
  }

  const bytes = new Uint8Array(20)
  let bits = 0
  let acc = 0
  let out = 0
  for (const char of normalized) {
    acc = (acc << 5) | BASE32_ALPHABET.indexOf(char)
    bits += 5
    if (bits >= 8) {
      bits -= 8
      bytes[out++] = (acc >> bits) & 0xff
    }
  }
  return infoHashFromBytes(bytes)
}

/**
 * Accept either the hex or the base32 form.
 * @throws Error if it is neither
 */
export function infoHashFromString(hash: string): InfoHashHex {
  return hash.length === 32 ? infoHashFromBase32(hash) : infoHashFromHex(hash)
}
