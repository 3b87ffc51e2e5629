import { describe, it, expect } from 'vitest'
import {
  isExactTopic,
  isExtensionParam,
  isUrlWithKey,
  toDecodedValue,
  toInfoHash,
  toProtocol,
  toUrl,
} from '../../src/magnet/fields'
import { DecodeBuffer } from '../../src/uri/decode-buffer'
import { type QueryParam, QueryParamsView } from '../../src/uri/query-params'

function param(text: string): QueryParam {
  const [first] = new QueryParamsView(text)
  return first
}

describe('isExactTopic', () => {
  it('should accept xt and numbered xt keys', () => {
    expect(isExactTopic(param('xt=urn:btih:abc'))).toBe(true)
    expect(isExactTopic(param('xt.1=urn:btih:abc'))).toBe(true)
    expect(isExactTopic(param('xt.42=urn:btih:abc'))).toBe(true)
  })

  it('should compare encoded keys after decoding', () => {
    expect(isExactTopic(param('%78%74=urn:btih:abc'))).toBe(true)
    expect(isExactTopic(param('xt.%31=urn:btih:abc'))).toBe(true)
  })

  it('should reject near misses', () => {
    for (const key of ['XT', 'xt.', 'xt.a', 'xta', 'xt.1a', 'x', '']) {
      expect(isExactTopic(param(`${key}=urn:btih:abc`)), key).toBe(false)
    }
  })
})

describe('isUrlWithKey', () => {
  it('should match a doubly encoded URL and leave it decoded in the buffer', () => {
    const buffer = new DecodeBuffer()
    const matches = isUrlWithKey('tr', buffer)

    expect(matches(param('tr=udp%3A%2F%2Fhost%3A80'))).toBe(true)
    expect(buffer.toString()).toBe('udp://host:80')
  })

  it('should skip other keys and params without a value', () => {
    const matches = isUrlWithKey('tr', new DecodeBuffer())

    expect(matches(param('ws=http%3A%2F%2Fhost%2F'))).toBe(false)
    expect(matches(param('tr'))).toBe(false)
  })

  it('should skip values that do not decode to a URL', () => {
    const matches = isUrlWithKey('tr', new DecodeBuffer())

    expect(matches(param('tr=not%20a%20url'))).toBe(false)
    expect(matches(param('tr=%FF'))).toBe(false)
  })
})

describe('isExtensionParam', () => {
  it('should match x.<name> with a value', () => {
    expect(isExtensionParam('pe')(param('x.pe=1.2.3.4:80'))).toBe(true)
    expect(isExtensionParam('pe')(param('%78.pe=1.2.3.4:80'))).toBe(true)
    expect(isExtensionParam('pe')(param('x%2Epe=1.2.3.4:80'))).toBe(true)
  })

  it('should reject other names and bare keys', () => {
    const isPe = isExtensionParam('pe')

    expect(isPe(param('x.pe'))).toBe(false)
    expect(isPe(param('x.pex=v'))).toBe(false)
    expect(isPe(param('y.pe=v'))).toBe(false)
    expect(isPe(param('x=v'))).toBe(false)
    expect(isPe(param('pe=v'))).toBe(false)
  })
})

describe('exact topic transforms', () => {
  it('should parse the value as a URI', () => {
    const uri = toUrl(param('xt=urn:btih:abc'))

    expect(uri.scheme).toBe('urn')
    expect(uri.encodedPath).toBe('btih:abc')
  })

  it('should split the path on its last colon', () => {
    expect(toInfoHash(param('xt=urn:btih:abc'))).toBe('abc')
    expect(toProtocol(param('xt=urn:btih:abc'))).toBe('btih')
    expect(toInfoHash(param('xt=urn:tree:tiger:ABC'))).toBe('ABC')
    expect(toProtocol(param('xt=urn:tree:tiger:ABC'))).toBe('tree:tiger')
  })

  it('should give the whole path as hash and no protocol without a colon', () => {
    expect(toInfoHash(param('xt=urn:ed2k'))).toBe('ed2k')
    expect(toProtocol(param('xt=urn:ed2k'))).toBe('')
  })

  it('should throw for a value that is not a URI', () => {
    expect(() => toUrl(param('xt=nope'))).toThrow('exact topic is not a URI')
  })
})

describe('toDecodedValue', () => {
  it('should read back what the buffer holds', () => {
    const buffer = new DecodeBuffer()
    const read = toDecodedValue(buffer)
    isUrlWithKey('ws', buffer)(param('ws=http%3A%2F%2Fseed.example%2Ff'))

    expect(read(param('ws=ignored'))).toBe('http://seed.example/f')
  })
})
