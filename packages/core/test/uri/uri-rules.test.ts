import { describe, it, expect } from 'vitest'
import { ParseCursor } from '../../src/uri/grammar'
import { UriSyntaxError } from '../../src/uri/errors'
import {
  isIPv4,
  isIPv6,
  parseAbsoluteUri,
  parseUri,
  uriRule,
} from '../../src/uri/uri-rules'

function expectSyntaxError(text: string, code: string): UriSyntaxError {
  const result = parseUri(text)
  if (result.ok) throw new Error(`expected ${text} to be rejected`)
  expect(result.error).toBeInstanceOf(UriSyntaxError)
  expect(result.error.code).toBe(code)
  return result.error
}

describe('URI grammar', () => {
  it('should split every component of a full URI', () => {
    const text = 'https://user:pw@example.com:8080/a/b?x=1&y#frag'
    const result = parseUri(text)
    if (!result.ok) throw result.error
    const u = result.value

    expect(u.scheme).toBe('https')
    expect(u.hasAuthority).toBe(true)
    expect(u.authority).toBe('user:pw@example.com:8080')
    expect(u.userinfo).toBe('user:pw')
    expect(u.host).toBe('example.com')
    expect(u.hostKind).toBe('name')
    expect(u.port).toBe('8080')
    expect(u.portNumber).toBe(8080)
    expect(u.encodedPath).toBe('/a/b')
    expect(u.encodedQuery).toBe('x=1&y')
    expect(u.encodedFragment).toBe('frag')
    expect(u.toString()).toBe(text)
  })

  it('should parse a tracker URL', () => {
    const result = parseUri('udp://tracker.example.com:80')
    if (!result.ok) throw result.error

    expect(result.value.host).toBe('tracker.example.com')
    expect(result.value.portNumber).toBe(80)
    expect(result.value.encodedPath).toBe('')
    expect(result.value.hasQuery).toBe(false)
    expect(result.value.hasFragment).toBe(false)
  })

  it('should parse a URN as a rootless path', () => {
    const result = parseUri('urn:btih:d2474e86c95b19b8bcfdb92bc12c9d44667cfa36')
    if (!result.ok) throw result.error

    expect(result.value.scheme).toBe('urn')
    expect(result.value.hasAuthority).toBe(false)
    expect(result.value.authority).toBeUndefined()
    expect(result.value.encodedPath).toBe('btih:d2474e86c95b19b8bcfdb92bc12c9d44667cfa36')
  })

  it('should parse a magnet link with an empty path and a query', () => {
    const result = parseUri('magnet:?xt=urn:btih:abc&dn=Leaves+of+Grass')
    if (!result.ok) throw result.error

    expect(result.value.scheme).toBe('magnet')
    expect(result.value.encodedPath).toBe('')
    expect(result.value.encodedQuery).toBe('xt=urn:btih:abc&dn=Leaves+of+Grass')
  })

  it('should classify hosts', () => {
    const kinds = ['http://192.168.0.1/', 'http://[::1]:8080/', 'http://[v1.fe]/', 'http://999.1.1.1/'].map(
      (text) => {
        const result = parseUri(text)
        return result.ok ? result.value.hostKind : undefined
      },
    )
    expect(kinds).toEqual(['ipv4', 'ipv6', 'ipvfuture', 'name'])
  })

  it('should keep an empty port', () => {
    const result = parseUri('http://example.com:/')
    if (!result.ok) throw result.error

    expect(result.value.port).toBe('')
    expect(result.value.portNumber).toBeUndefined()
  })

  it('should reject text without a scheme', () => {
    expectSyntaxError('not a uri', 'missing-scheme')
    expectSyntaxError('notauri', 'missing-scheme')
    expectSyntaxError('1abc:x', 'invalid-scheme')
    expectSyntaxError('', 'invalid-scheme')
  })

  it('should reject malformed percent-encoding', () => {
    const error = expectSyntaxError('http://example.com/%zz', 'bad-pct-encoding')
    expect(error.position).toBe(19)
    expectSyntaxError('magnet:?xt=%4', 'bad-pct-encoding')
  })

  it('should reject bad authorities', () => {
    expectSyntaxError('http://[::1/', 'invalid-host')
    expectSyntaxError('http://[zz]/', 'invalid-host')
    expectSyntaxError('http://a@b@c/', 'invalid-authority')
    expectSyntaxError('http://host:80a/', 'invalid-authority')
  })

  it('should reject characters outside the grammar as leftover input', () => {
    const error = expectSyntaxError('http://exa mple.com', 'leftover')
    expect(error.position).toBe(10)
  })

  it('should only accept a fragment in a full URI', () => {
    expect(parseUri('magnet:?xt=urn:a:b#f').ok).toBe(true)

    const absolute = parseAbsoluteUri('magnet:?xt=urn:a:b#f')
    expect(absolute.ok).toBe(false)
    if (!absolute.ok) expect(absolute.error.code).toBe('leftover')
  })

  it('should advance a cursor past what it consumed', () => {
    const cursor = new ParseCursor('magnet:?xt=a:b rest')
    const result = uriRule.parse(cursor)

    expect(result.ok).toBe(true)
    expect(cursor.pos).toBe(14)
  })

  it('should compare URIs component by component', () => {
    const a = parseUri('HTTP://example.com/x?y')
    const b = parseUri('http://example.com/x?y')
    const c = parseUri('http://example.com/x?z')
    if (!a.ok || !b.ok || !c.ok) throw new Error('expected all to parse')

    expect(a.value.equals(b.value)).toBe(true)
    expect(b.value.equals(c.value)).toBe(false)
  })
})

describe('IP address literals', () => {
  it('should accept IPv4 dotted quads', () => {
    expect(isIPv4('127.0.0.1')).toBe(true)
    expect(isIPv4('255.255.255.255')).toBe(true)
    expect(isIPv4('256.0.0.1')).toBe(false)
    expect(isIPv4('01.2.3.4')).toBe(false)
    expect(isIPv4('1.2.3')).toBe(false)
  })

  it('should accept IPv6 forms', () => {
    expect(isIPv6('2001:db8::1')).toBe(true)
    expect(isIPv6('1:2:3:4:5:6:7:8')).toBe(true)
    expect(isIPv6('::')).toBe(true)
    expect(isIPv6('::ffff:192.168.1.1')).toBe(true)
  })

  it('should reject malformed IPv6', () => {
    expect(isIPv6('1:2:3:4:5:6:7')).toBe(false)
    expect(isIPv6('1::2::3')).toBe(false)
    expect(isIPv6(':::')).toBe(false)
    expect(isIPv6('12345::')).toBe(false)
  })
})
