import { decodeRevertString } from '../abi/codec'
import { ConversionError, rpcDataText } from '../errors'
import { CallResponse } from '../types'

/** Selector of `Error(string)`, the compiler's revert-with-reason encoding. */
export const ERROR_METHOD_ID = '0x08c379a0'

/** Selector of the EIP-3668 `OffchainLookup(address,string[],bytes,bytes4,bytes)` error. */
export const OFFCHAIN_LOOKUP_SELECTOR = '0x556f1830'

/** Reason reported when a failed transaction's replay yields none. */
export const MISSING_REASON = 'N/A'

const EXECUTION_REVERTED_CODE = 3

export type RevertKind = 'none' | 'rpc-error' | 'abi-revert' | 'offchain-lookup'

export interface RevertOutcome {
  kind: RevertKind
  reverted: boolean
  reason?: string
  encodedData?: string
}

/**
 * An off-chain lookup asks the client to fetch data and retry; it is not a failure.
 */
export function isOffchainLookup(data: unknown): boolean {
  return typeof data === 'string' && data.toLowerCase().startsWith(OFFCHAIN_LOOKUP_SELECTOR)
}

function isErrorInResult(response: CallResponse): boolean {
  return response.result !== undefined && response.result.toLowerCase().startsWith(ERROR_METHOD_ID)
}

export function isReverted(response: CallResponse): boolean {
  const { error } = response
  if (error && error.code === EXECUTION_REVERTED_CODE && error.data !== undefined) {
    return !isOffchainLookup(error.data)
  }
  return error !== undefined || isErrorInResult(response)
}

/**
 * Human-readable reason: the decoded `Error(string)` payload when the result
 * carries one, otherwise the node's error message.
 */
export function getRevertReason(response: CallResponse): string | undefined {
  if (response.result !== undefined && isErrorInResult(response)) {
    const encoded = '0x' + response.result.slice(ERROR_METHOD_ID.length)
    try {
      return decodeRevertString(encoded)
    } catch (error) {
      throw new ConversionError(`Unable to decode Error(string) revert payload: ${error instanceof Error ? error.message : String(error)}`)
    }
  }
  return response.error?.message
}

/**
 * The raw error payload for programmatic consumers, whether or not it decodes.
 */
export function getRevertReasonEncodedData(response: CallResponse): string | undefined {
  const data = response.error?.data
  return data === undefined ? undefined : rpcDataText(data)
}

export function decodeRevert(response: CallResponse): RevertOutcome {
  const reason = getRevertReason(response)
  const encodedData = getRevertReasonEncodedData(response)

  let kind: RevertKind = 'none'
  if (response.error && response.error.code === EXECUTION_REVERTED_CODE && isOffchainLookup(response.error.data)) {
    kind = 'offchain-lookup'
  } else if (isErrorInResult(response)) {
    kind = 'abi-revert'
  } else if (response.error) {
    kind = 'rpc-error'
  }

  return { kind, reverted: isReverted(response), reason, encodedData }
}
