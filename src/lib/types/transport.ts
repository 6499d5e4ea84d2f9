import { TransactionReceipt } from './receipts'

/**
 * Historical state selector for reads: a named tag or a block number.
 */
export type BlockTag = 'latest' | 'earliest' | 'pending' | 'safe' | 'finalized' | bigint | number

/**
 * The `error` member of a JSON-RPC response.
 */
export interface RpcErrorPayload {
  code: number
  message: string
  data?: unknown
}

/**
 * A fully assembled transaction before pricing is attached.
 * `to` is absent for contract creation.
 */
export interface TransactionIntent {
  readonly from: string
  readonly to?: string
  readonly value: bigint
  readonly data: string
}

export interface CallRequest {
  from?: string
  to?: string
  data: string
  value?: bigint
}

/**
 * Outcome of `eth_call`. Exactly one of `result` or `error` is normally set;
 * a node answering an off-chain lookup may set neither.
 */
export interface CallResponse {
  result?: string
  error?: RpcErrorPayload
}

export interface CodeResponse {
  code?: string
  error?: RpcErrorPayload
}

export interface LegacyTransactionRequest {
  to?: string
  data: string
  value: bigint
  gasPrice: bigint
  gasLimit: bigint
}

export interface FeeMarketTransactionRequest {
  chainId: bigint
  to?: string
  data: string
  value: bigint
  gasLimit: bigint
  maxPriorityFeePerGas: bigint
  maxFeePerGas: bigint
}

/**
 * Read access to a node. Error responses come back inside the response
 * objects; only transport failures reject.
 */
export interface RpcClient {
  call(request: CallRequest, blockTag: BlockTag): Promise<CallResponse>
  getCode(address: string, blockTag: BlockTag): Promise<CodeResponse>
  estimateGas(intent: TransactionIntent): Promise<bigint>
  /** Resolves a name to an address; addresses pass through unchanged. */
  resolveName(nameOrAddress: string): Promise<string>
  getNetworkId(): Promise<string>
}

/**
 * Signs and submits transactions for one sender.
 */
export interface TransactionManager {
  getFromAddress(): Promise<string>
  sendLegacy(request: LegacyTransactionRequest): Promise<string>
  /**
   * Returns the transaction hash, or `undefined` when this manager cannot
   * submit fee-market transactions.
   */
  sendFeeMarket(request: FeeMarketTransactionRequest): Promise<string | undefined>
}

export interface ReceiptProcessor {
  waitForReceipt(transactionHash: string): Promise<TransactionReceipt>
}
