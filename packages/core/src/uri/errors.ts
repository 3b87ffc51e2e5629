export type UriSyntaxErrorCode =
  | 'missing-scheme'
  | 'invalid-scheme'
  | 'bad-pct-encoding'
  | 'invalid-authority'
  | 'invalid-host'
  | 'leftover'

export class UriSyntaxError extends Error {
  constructor(
    public readonly code: UriSyntaxErrorCode,
    public readonly position: number,
    detail?: string,
  ) {
    super(`Invalid URI syntax (${code}) at ${position}${detail ? `: ${detail}` : ''}`)
    this.name = 'UriSyntaxError'
  }
}

export type PercentDecodeErrorCode = 'bad-pct-encoding' | 'invalid-utf8'

export class PercentDecodeError extends Error {
  constructor(
    public readonly code: PercentDecodeErrorCode,
    public readonly encoded: string,
  ) {
    super(`Cannot percent-decode "${encoded}" (${code})`)
    this.name = 'PercentDecodeError'
  }
}
