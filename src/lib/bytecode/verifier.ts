import { cleanHexPrefix } from '../utils/hex'

/**
 * Prefixes of the CBOR metadata section solc appends to runtime code.
 */
export const METADATA_HASH_INDICATORS = [
  'a165627a7a72305820', // Swarm legacy (bzzr0)
  'a265627a7a72315820', // Swarm (bzzr1)
  'a2646970667358221220', // IPFS
  'a164736f6c634300080a000a' // solc (None)
] as const

/**
 * Removes the hex prefix and everything from the earliest metadata indicator on.
 */
export function stripMetadata(code: string): string {
  const hex = cleanHexPrefix(code).toLowerCase()
  let cut = -1
  for (const indicator of METADATA_HASH_INDICATORS) {
    const index = hex.indexOf(indicator)
    if (index !== -1 && (cut === -1 || index < cut)) {
      cut = index
    }
  }
  return cut === -1 ? hex : hex.substring(0, cut)
}

/**
 * True when the on-chain code, minus metadata, occurs somewhere in `binary`.
 * A subset match is required because one compiled binary may hold several contracts.
 */
export function matchesBinary(onChainCode: string, binary: string): boolean {
  const code = stripMetadata(onChainCode)
  return code.length > 0 && binary.toLowerCase().includes(code)
}
