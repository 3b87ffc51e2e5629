import { PctString, type PctStringOptions } from './pct-string'

/**
 * One `key[=value]` pair of a query string.
 * `value` is empty when `hasValue` is false.
 */
export interface QueryParam {
  readonly key: PctString
  readonly value: PctString
  readonly hasValue: boolean
}

/**
 * Lazy sequence of the params in an encoded query, in original order and
 * without deduplication. Each iteration re-scans the query from its start.
 *
 * An absent query has no params. An empty query ("?" alone) has a single
 * param with an empty key and no value. The query text must already have passed
 * the URI grammar, which guarantees its escapes are well formed.
 */
export class QueryParamsView implements Iterable<QueryParam> {
  constructor(
    private readonly query: string | undefined,
    private readonly options: PctStringOptions = { plusAsSpace: true },
  ) {}

  get encoded(): string | undefined {
    return this.query
  }

  get size(): number {
    if (this.query === undefined) return 0
    let n = 1
    for (let i = 0; i < this.query.length; i++) {
      if (this.query.charCodeAt(i) === 0x26) n++
    }
    return n
  }

  isEmpty(): boolean {
    return this.query === undefined
  }

  *[Symbol.iterator](): Iterator<QueryParam> {
    const q = this.query
    if (q === undefined) return

    let start = 0
    for (;;) {
      let end = q.indexOf('&', start)
      if (end === -1) end = q.length
      yield this.makeParam(q.slice(start, end))
      if (end === q.length) return
      start = end + 1
    }
  }

  /** First param whose decoded key equals `key` */
  find(key: string): QueryParam | undefined {
    for (const p of this) {
      if (p.key.equals(key)) return p
    }
    return undefined
  }

  /** Whether any param has the decoded key `key` */
  contains(key: string): boolean {
    return this.find(key) !== undefined
  }

  private makeParam(part: string): QueryParam {
    const eq = part.indexOf('=')
    if (eq === -1) {
      return { key: new PctString(part, this.options), value: PctString.EMPTY, hasValue: false }
    }
    return {
      key: new PctString(part.slice(0, eq), this.options),
      value: new PctString(part.slice(eq + 1), this.options),
      hasValue: true,
    }
  }
}
