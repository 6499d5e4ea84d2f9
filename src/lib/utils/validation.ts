/**
 * Validation utilities for values that arrive as text (command line flags,
 * configuration files) before they reach the contract layer.
 */

/**
 * Validates an Ethereum address (0x followed by 40 hex characters).
 */
export function validateAddress(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new Error(`Invalid '${fieldName}' address: expected string, got ${typeof value}`)
  }

  if (!/^0x[a-fA-F0-9]{40}$/.test(value)) {
    throw new Error(`Invalid '${fieldName}' address format: ${value}`)
  }

  return value
}

/**
 * Validates hex data, trimming whitespace and adding a missing 0x prefix.
 */
export function validateHexData(value: unknown, fieldName: string): string {
  if (value === null || value === undefined) {
    return '0x'
  }

  if (typeof value !== 'string') {
    throw new Error(`Invalid '${fieldName}': expected string, got ${typeof value}`)
  }

  const trimmed = value.trim()
  const withoutPrefix = trimmed.startsWith('0x') ? trimmed.slice(2) : trimmed

  if (!/^[a-fA-F0-9]*$/.test(withoutPrefix)) {
    // Pinpoint first invalid character for easier debugging
    const idx = withoutPrefix.search(/[^a-fA-F0-9]/)
    throw new Error(`Invalid '${fieldName}' format: contains non-hex characters at index ${idx} ('${withoutPrefix[idx]}')`)
  }

  return '0x' + withoutPrefix
}

/**
 * Parses a non-negative integer amount (decimal or 0x-hex string, number or bigint).
 */
export function validateAmount(value: unknown, fieldName: string): bigint {
  if (value === null || value === undefined) {
    return 0n
  }

  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Invalid '${fieldName}': must be a non-negative integer, got ${value}`)
    }
    return BigInt(value)
  }

  if (typeof value === 'string') {
    if (value.startsWith('0x')) {
      if (!/^0x[a-fA-F0-9]+$/.test(value)) {
        throw new Error(`Invalid '${fieldName}' hex format: ${value}`)
      }
      return BigInt(value)
    }

    if (!/^\d+$/.test(value)) {
      throw new Error(`Invalid '${fieldName}' format: must be a number or hex string, got ${value}`)
    }
    return BigInt(value)
  }

  if (typeof value === 'bigint') {
    if (value < 0n) {
      throw new Error(`Invalid '${fieldName}': must be non-negative, got ${value}`)
    }
    return value
  }

  throw new Error(`Invalid '${fieldName}' type: expected number, string, or bigint, got ${typeof value}`)
}
