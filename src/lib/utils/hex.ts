export function cleanHexPrefix(value: string): string {
  return value.startsWith('0x') || value.startsWith('0X') ? value.slice(2) : value
}

export function prependHexPrefix(value: string): string {
  return value.startsWith('0x') || value.startsWith('0X') ? value : `0x${value}`
}

/**
 * True for `undefined`, `''` and `'0x'`: the node returned no data.
 */
export function isEmptyHex(value: string | undefined): boolean {
  return value === undefined || cleanHexPrefix(value).length === 0
}
