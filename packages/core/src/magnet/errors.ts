import type { UriSyntaxError } from '../uri/errors'

export type MagnetValidationErrorCode = 'unexpected-scheme' | 'missing-exact-topic' | 'invalid-exact-topic'

const MESSAGES: Record<MagnetValidationErrorCode, string> = {
  'unexpected-scheme': 'scheme is not "magnet"',
  'missing-exact-topic': 'missing mandatory exact topic',
  'invalid-exact-topic': 'exact topic value is not a valid URI',
}

/**
 * The link is a valid URI but breaks a magnet-specific rule.
 */
export class MagnetValidationError extends Error {
  constructor(
    public readonly code: MagnetValidationErrorCode,
    public readonly paramIndex?: number,
  ) {
    super(
      `Invalid magnet link: ${MESSAGES[code]}${paramIndex !== undefined ? ` (param ${paramIndex})` : ''}`,
    )
    this.name = 'MagnetValidationError'
  }
}

export type MagnetLinkError = UriSyntaxError | MagnetValidationError

/**
 * Thrown by the `parseMagnet` convenience when a link cannot be summarized.
 */
export class MagnetParseError extends Error {
  constructor(
    message: string,
    public readonly rejection?: MagnetLinkError,
  ) {
    super(message)
    this.name = 'MagnetParseError'
  }
}
