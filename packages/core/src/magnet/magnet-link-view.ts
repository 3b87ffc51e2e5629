import type { DecodeBuffer } from '../uri/decode-buffer'
import type { PctString } from '../uri/pct-string'
import type { QueryParam, QueryParamsView } from '../uri/query-params'
import type { UriView } from '../uri/uri-view'
import { FilteredView } from '../views/filtered-view'
import {
  isExactTopic,
  isExtensionParam,
  isUrlWithKey,
  toDecodedValue,
  toInfoHash,
  toProtocol,
  toUrl,
} from './fields'
import { type PeerAddress, parsePeerHint } from './peer-hint'

/** Exact topics as parsed URIs */
export type TopicsView = FilteredView<QueryParam, UriView>
/** Info hashes of the exact topics */
export type InfoHashesView = FilteredView<QueryParam, string>
/** Hash namespaces ("btih", "sha1", ...) of the exact topics */
export type ProtocolsView = FilteredView<QueryParam, string>
/** Decoded URIs of every param with a given key */
export type KeysView = FilteredView<QueryParam, string>

const construct: unique symbol = Symbol('MagnetLinkView')

/**
 * A magnet link, seen through the fields that matter to the scheme.
 *
 * Wraps a URI that has passed the magnet link rule: it has a query holding at
 * least one exact topic, and every exact topic is itself a URI. Accessors are
 * recomputed on each call and never change the view.
 *
 * Each accessor call builds a view over a fresh query params sequence, so
 * cursors compare equal only when they come from the same accessor result.
 *
 * Accessors taking a `buffer` decode into it while they are iterated. Two of
 * them must not be advanced in turn over one buffer, since each element
 * overwrites the text of the previous one.
 *
 * See:
 * - BEP 9, Extension for Peers to Send Metadata Files (bittorrent.org/beps/bep_0009.html)
 * - BEP 53, Magnet URI extension (bittorrent.org/beps/bep_0053.html)
 */
export class MagnetLinkView {
  constructor(
    token: typeof construct,
    private readonly u: UriView,
    private readonly plusAsSpace: boolean,
  ) {
    if (token !== construct) {
      throw new Error('MagnetLinkView is created by the magnet link rule')
    }
  }

  /** The underlying generic URI */
  get uri(): UriView {
    return this.u
  }

  /**
   * URNs naming the content. A link has one or more exact topics under the
   * key "xt" or "xt.1", "xt.2", ...
   */
  exactTopics(): TopicsView {
    return new FilteredView(this.params(), isExactTopic, toUrl)
  }

  infoHashes(): InfoHashesView {
    return new FilteredView(this.params(), isExactTopic, toInfoHash)
  }

  protocols(): ProtocolsView {
    return new FilteredView(this.params(), isExactTopic, toProtocol)
  }

  /** Tracker URLs ("tr") */
  addressTrackers(buffer: DecodeBuffer): KeysView {
    return this.keys('tr', buffer)
  }

  /** Direct download links ("xs") */
  exactSources(buffer: DecodeBuffer): KeysView {
    return this.keys('xs', buffer)
  }

  /** Fallback download links ("as") */
  acceptableSources(buffer: DecodeBuffer): KeysView {
    return this.keys('as', buffer)
  }

  /** Links to MAGMA manifests listing further magnet links ("mt") */
  manifestTopics(buffer: DecodeBuffer): KeysView {
    return this.keys('mt', buffer)
  }

  /** Payload served over HTTP(S) ("ws") */
  webSeed(buffer: DecodeBuffer): KeysView {
    return this.keys('ws', buffer)
  }

  /** Search keywords ("kt"), e.g. `kt=martin+luther+king+mp3` */
  keywordTopic(): PctString | undefined {
    return this.decodedParam('kt')
  }

  /** File name to show the user ("dn") */
  displayName(): PctString | undefined {
    return this.decodedParam('dn')
  }

  /**
   * Size in bytes ("xl"), when present and a plain decimal number.
   * Sizes past Number.MAX_SAFE_INTEGER are undefined, since they would not round-trip.
   */
  exactLength(): number | undefined {
    const xl = this.decodedParam('xl')?.decode()
    if (xl === undefined || !/^\d+$/.test(xl)) return undefined
    const length = Number(xl)
    return Number.isSafeInteger(length) ? length : undefined
  }

  /**
   * Informal parameter `x.<key>`. Names under the "x." prefix are never
   * standardized, so applications use them for their own data.
   */
  param(key: string): PctString | undefined {
    const matches = isExtensionParam(key)
    for (const p of this.params()) {
      if (matches(p)) return p.value
    }
    return undefined
  }

  /** Peer addresses from "x.pe" hints; unparseable hints are left out */
  peerHints(): PeerAddress[] {
    const hints = new FilteredView(this.params(), isExtensionParam('pe'), (p) => parsePeerHint(p.value.decode()))
    const peers: PeerAddress[] = []
    for (const peer of hints) {
      if (peer) peers.push(peer)
    }
    return peers
  }

  toString(): string {
    return this.u.toString()
  }

  private params(): QueryParamsView {
    return this.u.params({ plusAsSpace: this.plusAsSpace })
  }

  private keys(key: string, buffer: DecodeBuffer): KeysView {
    return new FilteredView(this.params(), isUrlWithKey(key, buffer), toDecodedValue(buffer))
  }

  // Value of the first param named `key`, if that param has one
  private decodedParam(key: string): PctString | undefined {
    const p = this.params().find(key)
    return p?.hasValue ? p.value : undefined
  }
}

/** @internal Used by the magnet link rule, which alone vouches for the URI. */
export function createMagnetLinkView(uri: UriView, plusAsSpace: boolean): MagnetLinkView {
  return new MagnetLinkView(construct, uri, plusAsSpace)
}
