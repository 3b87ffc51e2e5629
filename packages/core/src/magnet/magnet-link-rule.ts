import { type ParserConfig, resolveParserConfig } from '../config/parser-config'
import { type Logger, defaultLogger, withScopeAndLevel } from '../logging/logger'
import { type GrammarRule, type ParseCursor, parseWith } from '../uri/grammar'
import { absoluteUriRule, uriRule } from '../uri/uri-rules'
import { FilteredView } from '../views/filtered-view'
import { type Result, err, ok } from '../utils/result'
import { type MagnetLinkError, MagnetValidationError } from './errors'
import { isExactTopic } from './fields'
import { type MagnetLinkView, createMagnetLinkView } from './magnet-link-view'

/**
 * Stage a link was rejected at: before the generic URI parsed, after it parsed,
 * or after the first exact topic was found.
 */
export type MagnetRuleStage = 'start' | 'generic-uri-parsed' | 'exact-topic-located'

export interface MagnetLinkRuleOptions extends Partial<ParserConfig> {
  logger?: Logger
}

/**
 * Grammar rule for magnet links.
 *
 * Runs the generic absolute-URI grammar first, then checks what the magnet
 * scheme adds on top: at least one exact topic ("xt" or "xt.N"), and every
 * exact topic's value parses as a URI. All other fields are optional and are
 * only checked when they are read.
 */
export class MagnetLinkRule implements GrammarRule<MagnetLinkView, MagnetLinkError> {
  readonly config: ParserConfig
  private readonly logger: Logger

  constructor(options: MagnetLinkRuleOptions = {}) {
    const { logger, ...config } = options
    this.config = resolveParserConfig(config)
    this.logger = withScopeAndLevel(logger ?? defaultLogger(), 'MagnetLinkRule', this.config.logLevel)
  }

  parse(cursor: ParseCursor): Result<MagnetLinkView, MagnetLinkError> {
    const start = cursor.pos

    const generic = absoluteUriRule.parse(cursor)
    if (!generic.ok) return this.reject('start', generic.error)
    const uri = generic.value

    if (this.config.requireMagnetScheme && uri.scheme.toLowerCase() !== 'magnet') {
      return this.reject('generic-uri-parsed', new MagnetValidationError('unexpected-scheme'))
    }

    const topics = new FilteredView(uri.params({ plusAsSpace: this.config.plusAsSpace }), isExactTopic, (p) => p)
    const first = topics.begin()
    if (first.done) {
      return this.reject('generic-uri-parsed', new MagnetValidationError('missing-exact-topic'))
    }

    for (let c = first; !c.done; c.advance()) {
      if (!parseWith(c.current.value.encoded, uriRule).ok) {
        return this.reject('exact-topic-located', new MagnetValidationError('invalid-exact-topic', c.sourcePosition))
      }
    }

    this.logger.debug(`accepted magnet link (${cursor.pos - start} chars)`)
    return ok(createMagnetLinkView(uri, this.config.plusAsSpace))
  }

  private reject(stage: MagnetRuleStage, error: MagnetLinkError): Result<MagnetLinkView, MagnetLinkError> {
    this.logger.debug(`rejected at ${stage}: ${error.message}`)
    return err(error)
  }
}

export const magnetLinkRule = new MagnetLinkRule()

/**
 * Parse a complete magnet link. Never throws: malformed input comes back as
 * a `UriSyntaxError` or a `MagnetValidationError`.
 */
export function parseMagnetLink(
  text: string,
  options?: MagnetLinkRuleOptions,
): Result<MagnetLinkView, MagnetLinkError> {
  return parseWith(text, options ? new MagnetLinkRule(options) : magnetLinkRule)
}
