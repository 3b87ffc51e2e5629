// Magnet links
export { MagnetLinkView } from './magnet/magnet-link-view'
export type { TopicsView, InfoHashesView, ProtocolsView, KeysView } from './magnet/magnet-link-view'
export { MagnetLinkRule, magnetLinkRule, parseMagnetLink } from './magnet/magnet-link-rule'
export type { MagnetLinkRuleOptions, MagnetRuleStage } from './magnet/magnet-link-rule'
export { MagnetValidationError, MagnetParseError } from './magnet/errors'
export type { MagnetLinkError, MagnetValidationErrorCode } from './magnet/errors'
export {
  isExactTopic,
  isUrlWithKey,
  isExtensionParam,
  toUrl,
  toDecodedValue,
  toInfoHash,
  toProtocol,
} from './magnet/fields'
export { parseMagnet, generateMagnet } from './magnet/magnet'
export type { ParsedMagnet, GenerateMagnetOptions } from './magnet/magnet'
export { parseAddressKey, parsePeerHint } from './magnet/peer-hint'
export type { PeerAddress, AddressFamily } from './magnet/peer-hint'

// Views
export { FilteredView, FilteredCursor } from './views/filtered-view'
export type { Predicate, Transform } from './views/filtered-view'

// URI
export { ParseCursor, parseWith } from './uri/grammar'
export type { GrammarRule } from './uri/grammar'
export { UriRule, uriRule, absoluteUriRule, parseUri, parseAbsoluteUri, isIPv4, isIPv6 } from './uri/uri-rules'
export { UriView } from './uri/uri-view'
export type { HostKind } from './uri/uri-view'
export { PctString, findBadEscape } from './uri/pct-string'
export type { PctStringOptions } from './uri/pct-string'
export { DecodeBuffer } from './uri/decode-buffer'
export { QueryParamsView } from './uri/query-params'
export type { QueryParam } from './uri/query-params'
export { UriSyntaxError, PercentDecodeError } from './uri/errors'
export type { UriSyntaxErrorCode, PercentDecodeErrorCode } from './uri/errors'

// Config
export {
  parserConfigSchema,
  getParserConfigType,
  getParserConfigDefault,
  getParserConfigDefaults,
  validateParserConfigValue,
  resolveParserConfig,
} from './config/parser-config'
export type { ParserConfig, ParserConfigKey, ParserConfigSchema } from './config/parser-config'

// Logging
export type { Logger, LogLevel, LogFn } from './logging/logger'
export { basicLogger, nullLogger, defaultLogger, passesLevel, withScopeAndLevel, LOG_LEVELS } from './logging/logger'

// Utils
export { ok, err } from './utils/result'
export type { Result } from './utils/result'
export type { InfoHashHex } from './utils/infohash'
export { infoHashFromHex, infoHashFromBytes, infoHashFromBase32, infoHashFromString } from './utils/infohash'
