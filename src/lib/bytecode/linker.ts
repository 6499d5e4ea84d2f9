import { ethers } from 'ethers'
import { cleanHexPrefix } from '../utils/hex'

/**
 * A deployed library that creation code refers to by placeholder.
 */
export interface LinkReference {
  /** Source unit the library is declared in, e.g. `contracts/Math.sol` */
  source: string
  libraryName: string
  address: string
}

const PLACEHOLDER_LENGTH = 40

function replaceAll(binary: string, placeholder: string, replacement: string): string {
  return binary.split(placeholder).join(replacement)
}

/**
 * `__` + name, right-padded with underscores to the 40 characters an address occupies.
 * Names too long to fit have no placeholder of this form.
 */
function paddedPlaceholder(name: string): string | undefined {
  const padding = PLACEHOLDER_LENGTH - name.length - 2
  return padding < 0 ? undefined : '__' + name + '_'.repeat(padding)
}

/**
 * Current solc / hardhat form: `__$` + 34 hex chars of keccak256("<source>:<library>") + `$__`.
 */
export function libraryPlaceholder(source: string, libraryName: string): string {
  return '__$' + ethers.id(`${source}:${libraryName}`).substring(2, 36) + '$__'
}

/**
 * Substitutes library addresses into creation code. Every reference is tried
 * against all three placeholder conventions; references the binary does not
 * use are ignored.
 */
export function linkBinaryWithReferences(binary: string, links: readonly LinkReference[]): string {
  let linked = binary
  for (const link of links) {
    const replacement = cleanHexPrefix(ethers.getAddress(link.address)).toLowerCase()
    const qualifiedName = `${link.source}:${link.libraryName}`

    linked = replaceAll(linked, libraryPlaceholder(link.source, link.libraryName), replacement)

    // Compilers before 0.5 embedded the qualified name
    const legacySolc = paddedPlaceholder(qualifiedName)
    if (legacySolc) {
      linked = replaceAll(linked, legacySolc, replacement)
    }

    // Older toolchains embedded the bare library name
    const legacyToolchain = paddedPlaceholder(link.libraryName)
    if (legacyToolchain) {
      linked = replaceAll(linked, legacyToolchain, replacement)
    }
  }
  return linked
}
