import { QueryParamsView } from './query-params'
import type { PctStringOptions } from './pct-string'

export type HostKind = 'ipv4' | 'ipv6' | 'ipvfuture' | 'name'

export interface AuthorityOffsets {
  start: number
  end: number
  /** Index of "@", or -1 without userinfo */
  at: number
  hostStart: number
  hostEnd: number
  /** Index of the port's ":" separator, or -1 */
  portColon: number
  hostKind: HostKind
}

/**
 * Where each component of a parsed URI lies in the source text.
 * Query and fragment starts point just past their "?" / "#" delimiters, -1 when absent.
 */
export interface UriOffsets {
  start: number
  end: number
  schemeEnd: number
  authority?: AuthorityOffsets
  pathStart: number
  pathEnd: number
  queryStart: number
  queryEnd: number
  fragmentStart: number
  fragmentEnd: number
}

/**
 * A parsed URI. Components are slices of the text it was parsed from and stay
 * percent-encoded.
 */
export class UriView {
  constructor(
    private readonly source: string,
    private readonly offsets: UriOffsets,
  ) {}

  get scheme(): string {
    return this.source.slice(this.offsets.start, this.offsets.schemeEnd)
  }

  get hasAuthority(): boolean {
    return this.offsets.authority !== undefined
  }

  /** Encoded authority without the leading "//" */
  get authority(): string | undefined {
    const a = this.offsets.authority
    return a && this.source.slice(a.start, a.end)
  }

  get userinfo(): string | undefined {
    const a = this.offsets.authority
    if (!a || a.at === -1) return undefined
    return this.source.slice(a.start, a.at)
  }

  get host(): string | undefined {
    const a = this.offsets.authority
    return a && this.source.slice(a.hostStart, a.hostEnd)
  }

  get hostKind(): HostKind | undefined {
    return this.offsets.authority?.hostKind
  }

  /** Port digits; empty when the authority ends in a bare ":" */
  get port(): string | undefined {
    const a = this.offsets.authority
    if (!a || a.portColon === -1) return undefined
    return this.source.slice(a.portColon + 1, a.end)
  }

  get portNumber(): number | undefined {
    const port = this.port
    return port ? parseInt(port, 10) : undefined
  }

  get encodedPath(): string {
    return this.source.slice(this.offsets.pathStart, this.offsets.pathEnd)
  }

  get hasQuery(): boolean {
    return this.offsets.queryStart !== -1
  }

  get encodedQuery(): string | undefined {
    const { queryStart, queryEnd } = this.offsets
    return queryStart === -1 ? undefined : this.source.slice(queryStart, queryEnd)
  }

  get hasFragment(): boolean {
    return this.offsets.fragmentStart !== -1
  }

  get encodedFragment(): string | undefined {
    const { fragmentStart, fragmentEnd } = this.offsets
    return fragmentStart === -1 ? undefined : this.source.slice(fragmentStart, fragmentEnd)
  }

  /** Query params, decoding "+" as space unless told otherwise */
  params(options: PctStringOptions = { plusAsSpace: true }): QueryParamsView {
    return new QueryParamsView(this.encodedQuery, options)
  }

  /** Component-wise equality; the scheme compares case-insensitively */
  equals(other: UriView): boolean {
    return (
      this.scheme.toLowerCase() === other.scheme.toLowerCase() &&
      this.authority === other.authority &&
      this.encodedPath === other.encodedPath &&
      this.encodedQuery === other.encodedQuery &&
      this.encodedFragment === other.encodedFragment
    )
  }

  toString(): string {
    return this.source.slice(this.offsets.start, this.offsets.end)
  }
}
