import { getParserConfigDefault } from '../config/parser-config'
import { DecodeBuffer } from '../uri/decode-buffer'
import { type InfoHashHex, infoHashFromString } from '../utils/infohash'
import { type MagnetLinkError, MagnetParseError } from './errors'
import { parseMagnetLink } from './magnet-link-rule'
import type { MagnetLinkView } from './magnet-link-view'
import type { PeerAddress } from './peer-hint'

export interface ParsedMagnet {
  infoHash: InfoHashHex
  name?: string
  announce?: string[]
  urlList?: string[]
  peers?: PeerAddress[]
  exactLength?: number
  keywords?: string[]
}

export interface GenerateMagnetOptions {
  infoHash: InfoHashHex
  name?: string
  announce?: string[]
  webSeeds?: string[]
}

// encodeURIComponent leaves !'()* alone; they are sub-delims, so escape them too
function encodeQueryValue(text: string): string {
  return encodeURIComponent(text).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  )
}

/**
 * Build a magnet link that `parseMagnetLink` accepts. Tracker and web seed
 * URLs are escaped as query values, so they come back out after one decode.
 */
export function generateMagnet(options: GenerateMagnetOptions): string {
  const { infoHash, name, announce, webSeeds } = options
  const parts = [`xt=urn:btih:${infoHash}`]
  if (name) {
    parts.push(`dn=${encodeQueryValue(name).replace(/%20/g, '+')}`)
  }
  for (const tracker of announce ?? []) {
    parts.push(`tr=${encodeQueryValue(tracker)}`)
  }
  for (const seed of webSeeds ?? []) {
    parts.push(`ws=${encodeQueryValue(seed)}`)
  }
  return `magnet:?${parts.join('&')}`
}

function describeRejection(error: MagnetLinkError): string {
  switch (error.code) {
    case 'unexpected-scheme':
      return 'Invalid magnet URI'
    case 'missing-exact-topic':
      return 'Invalid magnet URI: missing xt'
    case 'invalid-exact-topic':
      return 'Invalid magnet URI: xt is not a URN'
    default:
      return `Invalid magnet URI: ${error.message}`
  }
}

function findBtihHash(view: MagnetLinkView): string | undefined {
  for (const topic of view.exactTopics()) {
    const path = topic.encodedPath
    if (topic.scheme.toLowerCase() === 'urn' && path.toLowerCase().startsWith('btih:')) {
      return path.slice('btih:'.length)
    }
  }
  return undefined
}

/**
 * Summarize a BitTorrent magnet link.
 * @throws MagnetParseError if the link is rejected or has no urn:btih exact topic
 */
export function parseMagnet(uri: string): ParsedMagnet {
  const result = parseMagnetLink(uri)
  if (!result.ok) {
    throw new MagnetParseError(describeRejection(result.error), result.error)
  }
  const view = result.value

  const hash = findBtihHash(view)
  if (hash === undefined) {
    throw new MagnetParseError('Invalid magnet URI: missing xt (urn:btih)')
  }
  let infoHash: InfoHashHex
  try {
    infoHash = infoHashFromString(hash)
  } catch (e) {
    throw new MagnetParseError(`Invalid magnet URI: ${e instanceof Error ? e.message : String(e)}`)
  }

  const buffer = new DecodeBuffer(getParserConfigDefault('decodeBufferCapacity'))
  const name = view.displayName()?.decode() || undefined
  const announce = view.addressTrackers(buffer).toArray()
  const urlList = view.webSeed(buffer).toArray()
  const peers = view.peerHints()
  const keywords = (view.keywordTopic()?.decode() ?? '').split(/\s+/).filter((k) => k.length > 0)

  return {
    infoHash,
    name,
    announce: announce.length > 0 ? announce : undefined,
    urlList: urlList.length > 0 ? urlList : undefined,
    peers: peers.length > 0 ? peers : undefined,
    exactLength: view.exactLength(),
    keywords: keywords.length > 0 ? keywords : undefined,
  }
}
