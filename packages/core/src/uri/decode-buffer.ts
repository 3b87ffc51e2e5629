import { PercentDecodeError } from './errors'
import { type Result, err, ok } from '../utils/result'

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Caller-owned scratch storage for decoding doubly percent-encoded values.
 *
 * Every decode into the buffer overwrites what the previous decode left, so one
 * buffer must not back two iterations that are advanced in turn. Give each
 * concurrent enumeration its own buffer.
 */
export class DecodeBuffer {
  private bytes: Uint8Array
  private length = 0
  private text = ''

  constructor(initialCapacity: number = 256) {
    this.bytes = new Uint8Array(Math.max(1, initialCapacity))
  }

  /** Number of decoded bytes currently held */
  get size(): number {
    return this.length
  }

  get capacity(): number {
    return this.bytes.length
  }

  clear(): void {
    this.length = 0
    this.text = ''
  }

  /**
   * Replace the contents with `source`, then validate them as UTF-8.
   * On failure the buffer is left empty.
   */
  assign(source: Iterable<number>, sizeHint: number, encoded: string): Result<string, PercentDecodeError> {
    this.clear()
    this.reserve(sizeHint)
    for (const byte of source) {
      if (this.length === this.bytes.length) this.reserve(this.length * 2)
      this.bytes[this.length++] = byte
    }

    try {
      this.text = utf8.decode(this.bytes.subarray(0, this.length))
    } catch {
      this.clear()
      return err(new PercentDecodeError('invalid-utf8', encoded))
    }
    return ok(this.text)
  }

  /** Decoded bytes of the last successful decode. Valid until the next write. */
  view(): Uint8Array {
    return this.bytes.subarray(0, this.length)
  }

  toString(): string {
    return this.text
  }

  private reserve(capacity: number): void {
    if (capacity <= this.bytes.length) return
    const grown = new Uint8Array(Math.max(capacity, this.bytes.length * 2))
    grown.set(this.bytes.subarray(0, this.length))
    this.bytes = grown
  }
}
