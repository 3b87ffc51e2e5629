import { isIPv4, isIPv6 } from '../uri/uri-rules'

export type AddressFamily = 'ipv4' | 'ipv6'

export interface PeerAddress {
  /** "1.2.3.4" or "2001:db8::1", without brackets */
  ip: string
  port: number
  family: AddressFamily
}

const BRACKETED = /^\[([^\]]+)\]:(\d+)$/
const UNBRACKETED = /^([^:]+):(\d+)$/

/**
 * Parse "a.b.c.d:port" or "[ipv6]:port". Host names are not addresses.
 * @throws Error if the key is neither form
 */
export function parseAddressKey(key: string): PeerAddress {
  const v6 = BRACKETED.exec(key)
  if (v6 && isIPv6(v6[1])) {
    return { ip: v6[1], port: parseInt(v6[2], 10), family: 'ipv6' }
  }
  const v4 = UNBRACKETED.exec(key)
  if (v4 && isIPv4(v4[1])) {
    return { ip: v4[1], port: parseInt(v4[2], 10), family: 'ipv4' }
  }
  throw new Error(`Invalid address key: ${key}`)
}

/**
 * Parse a peer hint (x.pe value).
 * Returns null for invalid addresses and ports outside 1-65535.
 */
export function parsePeerHint(address: string): PeerAddress | null {
  try {
    const parsed = parseAddressKey(address)
    return parsed.port >= 1 && parsed.port <= 65535 ? parsed : null
  } catch {
    return null
  }
}
