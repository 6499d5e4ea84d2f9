import { Network } from './types'

/**
 * Finds the network a `--network` selector refers to.
 * - Numeric selectors (e.g., "1") are matched against chain IDs
 * - Other selectors are matched against Network.name case-insensitively
 * - When several networks match, the first in `networks` wins
 *
 * Throws if the selector matches no network.
 */
export function selectNetwork(selector: string, networks: Network[]): Network {
  const token = selector.trim()
  if (token.length === 0) {
    throw new Error('Network selector must not be empty')
  }

  const match = /^\d+$/.test(token)
    ? networks.find(n => n.chainId === Number(token))
    : networks.find(n => n.name.toLowerCase() === token.toLowerCase())

  if (!match) {
    const available = Array.from(new Set(networks.map(n => n.name))).sort()
    throw new Error(
      `Unknown network selector "${token}". Use a chain ID (e.g., 1) or a network name. Available names: ${available.length > 0 ? available.join(', ') : '(none)'}`
    )
  }
  return match
}

/**
 * True if `url` is an http(s) or ws(s) URL with a host.
 */
export function isValidRpcUrl(url: string): boolean {
  try {
    const urlObj = new URL(url)
    const isValidProtocol = ['http:', 'https:', 'ws:', 'wss:'].includes(urlObj.protocol)
    return isValidProtocol && urlObj.hostname.length > 0
  } catch {
    return false
  }
}
