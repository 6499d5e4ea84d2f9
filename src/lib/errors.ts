import { RpcErrorPayload, TransactionReceipt } from './types'

/**
 * The node could not be reached, or answered with something that is not a
 * JSON-RPC response.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/**
 * The node answered with a well-formed JSON-RPC error.
 */
export class RpcProtocolError extends Error {
  public readonly code: number
  public readonly rpcMessage: string
  public readonly data?: unknown

  constructor(payload: RpcErrorPayload, options?: { cause?: unknown }) {
    super(`${payload.code}: ${payload.message}`, options)
    this.name = 'RpcProtocolError'
    this.code = payload.code
    this.rpcMessage = payload.message
    this.data = payload.data
  }

  get payload(): RpcErrorPayload {
    return this.data === undefined
      ? { code: this.code, message: this.rpcMessage }
      : { code: this.code, message: this.rpcMessage, data: this.data }
  }
}

/**
 * A read-only call was reverted by the EVM.
 */
export class CallRevertedError extends Error {
  public readonly reason?: string
  public readonly encodedData?: string

  constructor(reason: string | undefined, encodedData?: string) {
    super(`Contract Call has been reverted by the EVM with the reason: '${reason ?? 'N/A'}'.`)
    this.name = 'CallRevertedError'
    this.reason = reason
    this.encodedData = encodedData
  }
}

/**
 * A transaction could not be submitted, was never mined while waiting, or
 * failed on chain.
 */
export class TransactionError extends Error {
  public readonly receipt?: TransactionReceipt

  constructor(message: string, receipt?: TransactionReceipt, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransactionError'
    this.receipt = receipt
  }

  get transactionHash(): string | undefined {
    return this.receipt?.transactionHash
  }
}

/**
 * A transaction was mined with a failing status.
 */
export class RevertedTransactionError extends TransactionError {
  public readonly status: string
  public readonly gasUsed: string
  public readonly reason: string
  public readonly encodedData?: string

  constructor(receipt: TransactionReceipt, reason: string, encodedData?: string) {
    const status = receipt.status ?? 'unknown'
    const gasUsed = receipt.gasUsed !== undefined ? receipt.gasUsed.toString() : 'unknown'
    super(
      `Transaction ${receipt.transactionHash} has failed with status: ${status}. ` +
        `Gas used: ${gasUsed}. Revert reason: '${reason}'.`,
      receipt
    )
    this.name = 'RevertedTransactionError'
    this.status = status
    this.gasUsed = gasUsed
    this.reason = reason
    this.encodedData = encodedData
  }
}

/**
 * A decoded value cannot be adapted to the shape the caller asked for.
 */
export class ConversionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConversionError'
  }
}

export class DeploymentError extends Error {
  public readonly transactionHash?: string

  constructor(message: string, transactionHash?: string) {
    super(message)
    this.name = 'DeploymentError'
    this.transactionHash = transactionHash
  }
}

/**
 * The handle lacks the binary or address an operation needs.
 */
export class UnsupportedOperationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UnsupportedOperationError'
  }
}

export class NameResolutionError extends Error {
  constructor(name: string) {
    super(`Unable to resolve "${name}" to an address`)
    this.name = 'NameResolutionError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function asRpcErrorPayload(value: unknown): RpcErrorPayload | undefined {
  if (!isRecord(value)) {
    return undefined
  }
  const code = value.code
  if (typeof code !== 'number') {
    return undefined
  }
  const message = typeof value.message === 'string' ? value.message : ''
  const data = value.data
  return data === undefined || data === null ? { code, message } : { code, message, data }
}

/**
 * Digs the raw JSON-RPC error out of an error thrown by ethers, which keeps
 * it under `info.error` (call and send failures) or `error` (uncoalesced).
 */
export function toRpcErrorPayload(error: unknown): RpcErrorPayload | undefined {
  if (error instanceof RpcProtocolError) {
    return error.payload
  }
  if (!isRecord(error)) {
    return undefined
  }
  const info = error.info
  return (isRecord(info) ? asRpcErrorPayload(info.error) : undefined) ?? asRpcErrorPayload(error.error)
}

/**
 * Text form of a JSON-RPC error's `data` member.
 */
export function rpcDataText(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data)
}

/**
 * The message surfaced for a failed submission: the error data verbatim when
 * the node supplied any, otherwise `<code>: <message>`.
 */
export function describeRpcError(payload: RpcErrorPayload): string {
  if (payload.data !== undefined) {
    return rpcDataText(payload.data)
  }
  return `${payload.code}: ${payload.message}`
}
