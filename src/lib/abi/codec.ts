import { ethers } from 'ethers'
import { isEmptyHex } from '../utils/hex'

const abiCoder = ethers.AbiCoder.defaultAbiCoder()

/**
 * A decoded value together with the ABI type it was decoded as.
 */
export interface AbiValue {
  readonly type: ethers.ParamType
  readonly value: unknown
}

/**
 * A function together with the arguments to invoke it with.
 */
export interface FunctionCall {
  readonly fragment: ethers.FunctionFragment
  readonly args: readonly unknown[]
}

/**
 * Builds a call from a human-readable signature such as
 * `function balanceOf(address owner) view returns (uint256)`.
 */
export function functionCall(signature: string | ethers.FunctionFragment, args: readonly unknown[] = []): FunctionCall {
  const fragment = typeof signature === 'string' ? ethers.FunctionFragment.from(signature) : signature
  if (fragment.inputs.length !== args.length) {
    throw new Error(`Function "${fragment.name}" expects ${fragment.inputs.length} arguments, got ${args.length}`)
  }
  return { fragment, args }
}

export function eventFragment(signature: string | ethers.EventFragment): ethers.EventFragment {
  return typeof signature === 'string' ? ethers.EventFragment.from(signature) : signature
}

/**
 * Selector followed by the ABI-encoded arguments.
 */
export function encodeFunctionCall(call: FunctionCall): string {
  return ethers.concat([call.fragment.selector, abiCoder.encode(call.fragment.inputs, call.args)])
}

/**
 * Encodes constructor arguments (no selector) for appending to creation code.
 */
export function encodeConstructorArgs(types: readonly (string | ethers.ParamType)[], args: readonly unknown[]): string {
  return abiCoder.encode(types, args)
}

/**
 * Decodes return data against the declared output types. No data yields no values.
 */
export function decodeReturn(data: string | undefined, outputs: readonly ethers.ParamType[]): AbiValue[] {
  if (data === undefined || isEmptyHex(data) || outputs.length === 0) {
    return []
  }
  const decoded = abiCoder.decode(outputs, data)
  return outputs.map((type, index) => ({ type, value: decoded[index] }))
}

/**
 * Dynamic values (strings, bytes, arrays, tuples) are stored in topics as
 * their keccak hash, so only the hash can be returned for them.
 */
export function isHashedWhenIndexed(type: ethers.ParamType): boolean {
  return type.isArray() || type.isTuple() || type.baseType === 'string' || type.baseType === 'bytes'
}

export function decodeIndexedValue(topic: string, type: ethers.ParamType): AbiValue {
  if (isHashedWhenIndexed(type)) {
    return { type: ethers.ParamType.from('bytes32'), value: topic }
  }
  return { type, value: abiCoder.decode([type], topic)[0] }
}

export function eventSignatureHash(event: ethers.EventFragment): string {
  return event.topicHash
}

/**
 * Canonical (checksummed) text form of an address.
 */
export function addressToString(value: string): string {
  return ethers.getAddress(value)
}

/**
 * Decodes the payload of an `Error(string)` revert (the bytes after the selector).
 */
export function decodeRevertString(encoded: string): string {
  const [reason] = abiCoder.decode(['string'], encoded)
  if (typeof reason !== 'string') {
    throw new Error('Revert payload did not decode to a string')
  }
  return reason
}

export function toNativeValues(values: readonly AbiValue[]): unknown[] {
  return values.map(v => v.value)
}
