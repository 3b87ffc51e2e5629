/**
 * Predicates and transforms over query params that give magnet link fields
 * their meaning. They are the building blocks of the MagnetLinkView accessors.
 */

import { isDigit } from '../uri/char-sets'
import type { DecodeBuffer } from '../uri/decode-buffer'
import type { QueryParam } from '../uri/query-params'
import { uriRule } from '../uri/uri-rules'
import { parseWith } from '../uri/grammar'
import type { UriView } from '../uri/uri-view'
import type { Predicate, Transform } from '../views/filtered-view'

const X = 0x78
const T = 0x74
const DOT = 0x2e

/**
 * Whether a param is an exact topic: key "xt", or "xt." followed by one or more
 * digits ("xt.1", "xt.2", ...). The key is compared after decoding, so "%78%74"
 * counts as "xt". Matching is case-sensitive.
 */
export function isExactTopic(p: QueryParam): boolean {
  if (p.key.equals('xt')) return true
  if (p.key.decodedSize <= 3) return false

  let i = 0
  for (const byte of p.key.bytes()) {
    if (i === 0 && byte !== X) return false
    if (i === 1 && byte !== T) return false
    if (i === 2 && byte !== DOT) return false
    if (i >= 3 && !isDigit(byte)) return false
    i++
  }
  return true
}

/**
 * Params with the decoded key `key` whose value is a URI.
 *
 * Such values are percent-encoded twice, so each one is decoded once into
 * `buffer` before it is parsed. A value that fails to decode or parse does not
 * match.
 */
export function isUrlWithKey(key: string, buffer: DecodeBuffer): Predicate<QueryParam> {
  return (p) => {
    if (!p.hasValue || !p.key.equals(key)) return false
    const decoded = p.value.decodeInto(buffer)
    if (!decoded.ok) return false
    return parseWith(decoded.value, uriRule).ok
  }
}

/**
 * The `x.<name>` extension parameter. The key is split after its second
 * decoded byte, so an encoded prefix such as "%78." still matches.
 */
export function isExtensionParam(name: string): Predicate<QueryParam> {
  return (p) => {
    if (!p.hasValue || p.key.decodedSize < 2) return false
    const parts = p.key.splitAt(2)
    if (!parts) return false
    const [prefix, suffix] = parts
    return prefix.equals('x.') && suffix.equals(name)
  }
}

/**
 * Parse an exact topic's value. Exact topics are encoded only once, so the
 * encoded value is parsed as it stands.
 *
 * @throws Error if the value is not a URI, which a validated link rules out
 */
export function expectUri(p: QueryParam): UriView {
  const parsed = parseWith(p.value.encoded, uriRule)
  if (!parsed.ok) {
    throw new Error(`exact topic is not a URI: ${parsed.error.message}`)
  }
  return parsed.value
}

export const toUrl: Transform<QueryParam, UriView> = expectUri

/**
 * Text the predicate for the current element left in `buffer`.
 */
export function toDecodedValue(buffer: DecodeBuffer): Transform<QueryParam, string> {
  return () => buffer.toString()
}

/** Exact topic path split on its last colon; `namespace` is undefined without one */
function splitTopicPath(p: QueryParam): { namespace: string | undefined; hash: string } {
  const path = expectUri(p).encodedPath
  const colon = path.lastIndexOf(':')
  if (colon === -1) return { namespace: undefined, hash: path }
  return { namespace: path.slice(0, colon), hash: path.slice(colon + 1) }
}

/**
 * Hash part of an exact topic: its URI path after the last colon
 * ("urn:btih:<hash>" gives "<hash>"), or the whole path without a colon.
 */
export function toInfoHash(p: QueryParam): string {
  return splitTopicPath(p).hash
}

/**
 * Namespace of an exact topic: its URI path before the last colon
 * ("urn:btih:<hash>" gives "btih"), or "" without a colon.
 */
export function toProtocol(p: QueryParam): string {
  return splitTopicPath(p).namespace ?? ''
}
