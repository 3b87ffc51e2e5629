import { describe, it, expect } from 'vitest'
import { PctString, findBadEscape } from '../../src/uri/pct-string'
import { DecodeBuffer } from '../../src/uri/decode-buffer'
import { PercentDecodeError } from '../../src/uri/errors'

describe('PctString', () => {
  it('should compare against plain text after decoding', () => {
    expect(new PctString('%78%74').equals('xt')).toBe(true)
    expect(new PctString('xt').equals('xt')).toBe(true)
    expect(new PctString('x%74').equals('xt')).toBe(true)
    expect(new PctString('%78%74').equals('xt.')).toBe(false)
    expect(new PctString('XT').equals('xt')).toBe(false)
  })

  it('should compare multi-byte text in encoded and literal form', () => {
    expect(new PctString('caf%C3%A9').equals('café')).toBe(true)
    expect(new PctString('café').equals('café')).toBe(true)
    expect(new PctString('café').decodedSize).toBe(5)
  })

  it('should compare two encoded views by their decoded bytes', () => {
    expect(new PctString('%41b').equalsPct(new PctString('Ab'))).toBe(true)
    expect(new PctString('%41b').equalsPct(new PctString('Ac'))).toBe(false)
  })

  it('should report the decoded size', () => {
    expect(new PctString('%78%74.1').decodedSize).toBe(4)
    expect(new PctString('').decodedSize).toBe(0)
  })

  it('should decode plus as space only when asked to', () => {
    expect(new PctString('Leaves+of+Grass', { plusAsSpace: true }).decode()).toBe('Leaves of Grass')
    expect(new PctString('Leaves+of+Grass').decode()).toBe('Leaves+of+Grass')
    expect(new PctString('a%2Bb', { plusAsSpace: true }).decode()).toBe('a+b')
    expect(new PctString('Leaves%20of%20Grass', { plusAsSpace: true }).toString()).toBe('Leaves of Grass')
  })

  it('should reject malformed escapes', () => {
    expect(() => new PctString('%zz')).toThrow(PercentDecodeError)
    expect(() => new PctString('abc%4')).toThrow(PercentDecodeError)

    const result = PctString.tryCreate('%G0')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('bad-pct-encoding')
  })

  it('should locate the first malformed escape', () => {
    expect(findBadEscape('ab%2')).toBe(2)
    expect(findBadEscape('%41%')).toBe(3)
    expect(findBadEscape('%41%42')).toBe(-1)
  })

  it('should split at a decoded offset without decoding', () => {
    const parts = new PctString('%78.custom').splitAt(2)
    expect(parts?.map((p) => p.encoded)).toEqual(['%78.', 'custom'])
    expect(new PctString('ab').splitAt(3)).toBeUndefined()
    expect(new PctString('%C3%A9').splitAt(1)?.map((p) => p.encoded)).toEqual(['%C3', '%A9'])
    expect(new PctString('é').splitAt(1)).toBeUndefined()
  })

  it('should replace invalid UTF-8 when decoding loosely', () => {
    expect(new PctString('%FF').decode()).toBe('�')

    const strict = new PctString('%FF').tryDecode()
    expect(strict.ok).toBe(false)
    if (!strict.ok) expect(strict.error.code).toBe('invalid-utf8')
  })
})

describe('DecodeBuffer', () => {
  it('should hold the text of the last decode', () => {
    const buffer = new DecodeBuffer()
    const result = new PctString('udp%3A%2F%2Fhost%3A80').decodeInto(buffer)

    expect(result).toEqual({ ok: true, value: 'udp://host:80' })
    expect(buffer.toString()).toBe('udp://host:80')
    expect(buffer.size).toBe(13)
  })

  it('should overwrite previous contents', () => {
    const buffer = new DecodeBuffer()
    new PctString('first%20value').decodeInto(buffer)
    new PctString('two').decodeInto(buffer)

    expect(buffer.toString()).toBe('two')
    expect(Array.from(buffer.view())).toEqual([0x74, 0x77, 0x6f])
  })

  it('should grow past its initial capacity', () => {
    const buffer = new DecodeBuffer(1)
    new PctString('abcdef').decodeInto(buffer)

    expect(buffer.toString()).toBe('abcdef')
    expect(buffer.capacity).toBeGreaterThanOrEqual(6)
  })

  it('should empty itself when the bytes are not UTF-8', () => {
    const buffer = new DecodeBuffer()
    new PctString('ok').decodeInto(buffer)
    const result = new PctString('%C3%28').decodeInto(buffer)

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('invalid-utf8')
    expect(buffer.size).toBe(0)
    expect(buffer.toString()).toBe('')
  })
})
