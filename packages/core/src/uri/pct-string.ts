import { hexValue, isHexDigit } from './char-sets'
import type { DecodeBuffer } from './decode-buffer'
import { PercentDecodeError } from './errors'
import { type Result, err, ok } from '../utils/result'

const PERCENT = 0x25
const PLUS = 0x2b
const SPACE = 0x20

const utf8Encoder = new TextEncoder()
const lossyDecoder = new TextDecoder('utf-8')
const strictDecoder = new TextDecoder('utf-8', { fatal: true })

export interface PctStringOptions {
  /** Decode "+" as a space (application/x-www-form-urlencoded query convention) */
  plusAsSpace?: boolean
}

/**
 * Index of the first "%" that does not start a valid "%XX" triplet, or -1.
 */
export function findBadEscape(encoded: string): number {
  for (let i = 0; i < encoded.length; i++) {
    if (encoded.charCodeAt(i) !== PERCENT) continue
    if (
      i + 2 >= encoded.length ||
      !isHexDigit(encoded.charCodeAt(i + 1)) ||
      !isHexDigit(encoded.charCodeAt(i + 2))
    ) {
      return i
    }
    i += 2
  }
  return -1
}

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1
  if (codePoint < 0x800) return 2
  if (codePoint < 0x10000) return 3
  return 4
}

/**
 * A read-only view of percent-encoded text.
 *
 * The encoded form is kept as-is; decoded bytes are produced on demand, so
 * comparisons against plain text never build a decoded copy.
 */
export class PctString {
  static readonly EMPTY = new PctString('')

  readonly encoded: string
  readonly plusAsSpace: boolean
  private cachedSize = -1

  /**
   * @throws PercentDecodeError if `encoded` holds a malformed escape
   */
  constructor(encoded: string, options: PctStringOptions = {}) {
    if (findBadEscape(encoded) !== -1) {
      throw new PercentDecodeError('bad-pct-encoding', encoded)
    }
    this.encoded = encoded
    this.plusAsSpace = options.plusAsSpace ?? false
  }

  static tryCreate(encoded: string, options: PctStringOptions = {}): Result<PctString, PercentDecodeError> {
    if (findBadEscape(encoded) !== -1) {
      return err(new PercentDecodeError('bad-pct-encoding', encoded))
    }
    return ok(new PctString(encoded, options))
  }

  get isEmpty(): boolean {
    return this.encoded.length === 0
  }

  /** Number of bytes after decoding */
  get decodedSize(): number {
    if (this.cachedSize === -1) {
      let size = 0
      for (let i = 0; i < this.encoded.length; i++) {
        const code = this.encoded.codePointAt(i) ?? 0
        if (code === PERCENT) {
          i += 2
          size += 1
        } else {
          size += utf8Length(code)
          if (code > 0xffff) i++
        }
      }
      this.cachedSize = size
    }
    return this.cachedSize
  }

  /** Decoded bytes, one at a time */
  *bytes(): Generator<number, void, undefined> {
    const s = this.encoded
    for (let i = 0; i < s.length; i++) {
      const code = s.charCodeAt(i)
      if (code === PERCENT) {
        yield (hexValue(s.charCodeAt(i + 1)) << 4) | hexValue(s.charCodeAt(i + 2))
        i += 2
      } else if (code === PLUS && this.plusAsSpace) {
        yield SPACE
      } else if (code < 0x80) {
        yield code
      } else {
        const codePoint = s.codePointAt(i) ?? code
        if (codePoint > 0xffff) i++
        yield* utf8Encoder.encode(String.fromCodePoint(codePoint))
      }
    }
  }

  /** Decoding-aware comparison against plain text */
  equals(plain: string): boolean {
    const expected = utf8Encoder.encode(plain)
    if (expected.length !== this.decodedSize) return false
    let i = 0
    for (const byte of this.bytes()) {
      if (byte !== expected[i++]) return false
    }
    return true
  }

  /** Compare two encoded views by their decoded bytes */
  equalsPct(other: PctString): boolean {
    if (this.decodedSize !== other.decodedSize) return false
    const theirs = other.bytes()
    for (const byte of this.bytes()) {
      if (theirs.next().value !== byte) return false
    }
    return true
  }

  /**
   * Split at a decoded byte offset without decoding.
   * Returns undefined when the offset is past the end or inside a multi-byte character.
   */
  splitAt(decodedIndex: number): [PctString, PctString] | undefined {
    const s = this.encoded
    const options = { plusAsSpace: this.plusAsSpace }
    let decoded = 0
    let i = 0
    while (decoded < decodedIndex && i < s.length) {
      const code = s.codePointAt(i) ?? 0
      if (code === PERCENT) {
        i += 3
        decoded += 1
      } else {
        i += code > 0xffff ? 2 : 1
        decoded += utf8Length(code)
      }
    }
    if (decoded !== decodedIndex) return undefined
    return [new PctString(s.slice(0, i), options), new PctString(s.slice(i), options)]
  }

  /** Decode to text, replacing invalid UTF-8 sequences with U+FFFD */
  decode(): string {
    return lossyDecoder.decode(Uint8Array.from(this.bytes()))
  }

  /** Decode to text, failing on invalid UTF-8 */
  tryDecode(): Result<string, PercentDecodeError> {
    try {
      return ok(strictDecoder.decode(Uint8Array.from(this.bytes())))
    } catch {
      return err(new PercentDecodeError('invalid-utf8', this.encoded))
    }
  }

  /**
   * Decode once into a caller-owned buffer, overwriting its previous contents.
   */
  decodeInto(buffer: DecodeBuffer): Result<string, PercentDecodeError> {
    return buffer.assign(this.bytes(), this.decodedSize, this.encoded)
  }

  toString(): string {
    return this.decode()
  }
}
