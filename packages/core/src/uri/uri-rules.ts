import {
  ALPHA,
  AUTHORITY_CHARS,
  type CharSet,
  FRAGMENT_CHARS,
  PATH_CHARS,
  QUERY_CHARS,
  REG_NAME_CHARS,
  SCHEME_CHARS,
  USERINFO_CHARS,
  inSet,
  isDigit,
  isHexDigit,
} from './char-sets'
import { UriSyntaxError } from './errors'
import { type GrammarRule, ParseCursor, parseWith } from './grammar'
import { type AuthorityOffsets, type HostKind, UriView } from './uri-view'
import { type Result, err, ok } from '../utils/result'

const COLON = 0x3a
const SLASH = 0x2f
const QUESTION = 0x3f
const HASH = 0x23
const PERCENT = 0x25
const OPEN_BRACKET = 0x5b

const DEC_OCTET = '(25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)'
const IPV4_RE = new RegExp(`^${DEC_OCTET}(\\.${DEC_OCTET}){3}$`)
const H16_RE = /^[0-9a-fA-F]{1,4}$/
const IPVFUTURE_RE = /^[vV][0-9a-fA-F]+\.[A-Za-z0-9\-._~!$&'()*+,;=:]+$/

export function isIPv4(text: string): boolean {
  return IPV4_RE.test(text)
}

export function isIPv6(text: string): boolean {
  const halves = text.split('::')
  if (halves.length > 2) return false
  const groupsOf = (half: string) => (half === '' ? [] : half.split(':'))
  const groups = halves.length === 2 ? [...groupsOf(halves[0]), ...groupsOf(halves[1])] : groupsOf(text)

  let pieces = 0
  for (let i = 0; i < groups.length; i++) {
    const group = groups[i]
    if (i === groups.length - 1 && group.includes('.') && !text.endsWith(':')) {
      if (!isIPv4(group)) return false
      pieces += 2
    } else if (H16_RE.test(group)) {
      pieces += 1
    } else {
      return false
    }
  }
  return halves.length === 2 ? pieces <= 7 : pieces === 8
}

/** Consume characters of `set` and well-formed "%XX" escapes */
function scanRun(cursor: ParseCursor, set: CharSet): UriSyntaxError | undefined {
  while (!cursor.atEnd) {
    const code = cursor.peek()
    if (code === PERCENT) {
      if (!isHexDigit(cursor.peek(1)) || !isHexDigit(cursor.peek(2))) {
        return new UriSyntaxError('bad-pct-encoding', cursor.pos)
      }
      cursor.pos += 3
    } else if (inSet(set, code)) {
      cursor.pos++
    } else {
      break
    }
  }
  return undefined
}

/** Whether `input[start, end)` is made of `set` characters and "%XX" escapes */
function allIn(input: string, start: number, end: number, set: CharSet): boolean {
  const cursor = new ParseCursor(input, start, end)
  return scanRun(cursor, set) === undefined && cursor.atEnd
}

function allDigits(input: string, start: number, end: number): boolean {
  for (let i = start; i < end; i++) {
    if (!isDigit(input.charCodeAt(i))) return false
  }
  return true
}

function scanScheme(cursor: ParseCursor): Result<number, UriSyntaxError> {
  const start = cursor.pos
  if (!inSet(ALPHA, cursor.peek())) {
    return err(new UriSyntaxError('invalid-scheme', start, 'scheme must start with a letter'))
  }
  cursor.pos++
  while (inSet(SCHEME_CHARS, cursor.peek())) cursor.pos++
  if (cursor.peek() !== COLON) {
    return err(new UriSyntaxError('missing-scheme', cursor.pos, 'expected ":" after scheme'))
  }
  const schemeEnd = cursor.pos
  cursor.pos++
  return ok(schemeEnd)
}

function classifyLiteral(literal: string): HostKind | undefined {
  if (isIPv6(literal)) return 'ipv6'
  if (IPVFUTURE_RE.test(literal)) return 'ipvfuture'
  return undefined
}

function scanAuthority(cursor: ParseCursor): Result<AuthorityOffsets, UriSyntaxError> {
  const { input } = cursor
  const start = cursor.pos
  while (inSet(AUTHORITY_CHARS, cursor.peek())) cursor.pos++
  const end = cursor.pos

  const at = input.indexOf('@', start)
  const hasUserinfo = at !== -1 && at < end
  if (hasUserinfo) {
    const second = input.indexOf('@', at + 1)
    if (second !== -1 && second < end) {
      return err(new UriSyntaxError('invalid-authority', second, 'more than one "@"'))
    }
    if (!allIn(input, start, at, USERINFO_CHARS)) {
      return err(new UriSyntaxError('invalid-authority', start, 'bad userinfo'))
    }
  }

  const hostStart = hasUserinfo ? at + 1 : start
  let hostEnd: number
  let hostKind: HostKind

  if (input.charCodeAt(hostStart) === OPEN_BRACKET && hostStart < end) {
    const close = input.indexOf(']', hostStart)
    if (close === -1 || close >= end) {
      return err(new UriSyntaxError('invalid-host', hostStart, 'unterminated IP literal'))
    }
    const kind = classifyLiteral(input.slice(hostStart + 1, close))
    if (!kind) {
      return err(new UriSyntaxError('invalid-host', hostStart, 'bad IP literal'))
    }
    hostKind = kind
    hostEnd = close + 1
  } else {
    hostEnd = hostStart
    while (hostEnd < end && input.charCodeAt(hostEnd) !== COLON) hostEnd++
    if (!allIn(input, hostStart, hostEnd, REG_NAME_CHARS)) {
      const bad = scanRun(new ParseCursor(input, hostStart, hostEnd), REG_NAME_CHARS)
      return err(bad ?? new UriSyntaxError('invalid-host', hostStart))
    }
    hostKind = isIPv4(input.slice(hostStart, hostEnd)) ? 'ipv4' : 'name'
  }

  let portColon = -1
  if (hostEnd < end) {
    if (input.charCodeAt(hostEnd) !== COLON || !allDigits(input, hostEnd + 1, end)) {
      return err(new UriSyntaxError('invalid-authority', hostEnd, 'bad port'))
    }
    portColon = hostEnd
  }

  return ok({ start, end, at: hasUserinfo ? at : -1, hostStart, hostEnd, portColon, hostKind })
}

/**
 * `URI = scheme ":" hier-part [ "?" query ] [ "#" fragment ]` (RFC 3986 §3),
 * or `absolute-URI` when fragments are not allowed.
 */
export class UriRule implements GrammarRule<UriView> {
  constructor(private readonly allowFragment: boolean) {}

  parse(cursor: ParseCursor): Result<UriView, UriSyntaxError> {
    const start = cursor.pos
    const scheme = scanScheme(cursor)
    if (!scheme.ok) return scheme

    let authority: AuthorityOffsets | undefined
    if (cursor.peek() === SLASH && cursor.peek(1) === SLASH) {
      cursor.pos += 2
      const parsed = scanAuthority(cursor)
      if (!parsed.ok) return parsed
      authority = parsed.value
    }

    const pathStart = cursor.pos
    const pathError = scanRun(cursor, PATH_CHARS)
    if (pathError) return err(pathError)
    const pathEnd = cursor.pos

    let queryStart = -1
    let queryEnd = -1
    if (cursor.peek() === QUESTION) {
      cursor.pos++
      queryStart = cursor.pos
      const queryError = scanRun(cursor, QUERY_CHARS)
      if (queryError) return err(queryError)
      queryEnd = cursor.pos
    }

    let fragmentStart = -1
    let fragmentEnd = -1
    if (this.allowFragment && cursor.peek() === HASH) {
      cursor.pos++
      fragmentStart = cursor.pos
      const fragmentError = scanRun(cursor, FRAGMENT_CHARS)
      if (fragmentError) return err(fragmentError)
      fragmentEnd = cursor.pos
    }

    return ok(
      new UriView(cursor.input, {
        start,
        end: cursor.pos,
        schemeEnd: scheme.value,
        authority,
        pathStart,
        pathEnd,
        queryStart,
        queryEnd,
        fragmentStart,
        fragmentEnd,
      }),
    )
  }
}

export const uriRule = new UriRule(true)
export const absoluteUriRule = new UriRule(false)

export function parseUri(text: string): Result<UriView, UriSyntaxError> {
  return parseWith(text, uriRule)
}

export function parseAbsoluteUri(text: string): Result<UriView, UriSyntaxError> {
  return parseWith(text, absoluteUriRule)
}
