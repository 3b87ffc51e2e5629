/**
 * RFC 3986 character classes as 128-entry ASCII lookup tables.
 * Anything outside 0x00-0x7f is never a member.
 */

export type CharSet = Uint8Array

function charSet(...groups: string[]): CharSet {
  const table = new Uint8Array(128)
  for (const group of groups) {
    for (let i = 0; i < group.length; i++) {
      table[group.charCodeAt(i)] = 1
    }
  }
  return table
}

const ALPHA_CHARS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'
const DIGIT_CHARS = '0123456789'

export const ALPHA = charSet(ALPHA_CHARS)
export const HEXDIG = charSet(DIGIT_CHARS, 'abcdefABCDEF')

export const SCHEME_CHARS = charSet(ALPHA_CHARS, DIGIT_CHARS, '+-.')
export const USERINFO_CHARS = charSet(ALPHA_CHARS, DIGIT_CHARS, "-._~!$&'()*+,;=:")
export const REG_NAME_CHARS = charSet(ALPHA_CHARS, DIGIT_CHARS, "-._~!$&'()*+,;=")
export const PATH_CHARS = charSet(ALPHA_CHARS, DIGIT_CHARS, "-._~!$&'()*+,;=:@/")
export const QUERY_CHARS = charSet(ALPHA_CHARS, DIGIT_CHARS, "-._~!$&'()*+,;=:@/?")
export const FRAGMENT_CHARS = QUERY_CHARS

// Everything that may appear between "//" and the path, before validation.
export const AUTHORITY_CHARS = charSet(ALPHA_CHARS, DIGIT_CHARS, "-._~!$&'()*+,;=:@[]%")

export function inSet(set: CharSet, code: number): boolean {
  return code < 128 && set[code] === 1
}

export function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39
}

export function isHexDigit(code: number): boolean {
  return inSet(HEXDIG, code)
}

export function hexValue(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30
  if (code >= 0x61 && code <= 0x66) return code - 0x61 + 10
  if (code >= 0x41 && code <= 0x46) return code - 0x41 + 10
  return -1
}
