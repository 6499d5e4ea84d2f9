/**
 * A log entry attached to a mined transaction.
 */
export interface Log {
  address: string
  topics: string[]
  data: string
  blockNumber?: bigint
  transactionHash?: string
  logIndex?: number
}

/**
 * Settlement record of a transaction as reported by the node.
 *
 * `synthetic` is true only for the placeholder receipt produced when the
 * caller chose not to wait for mining; it carries nothing but the hash.
 */
export interface TransactionReceipt {
  transactionHash: string
  synthetic: boolean
  /** Hex quantity, e.g. `0x1` for success. Absent on pre-Byzantium chains. */
  status?: string
  blockNumber?: bigint
  from?: string
  to?: string
  contractAddress?: string
  gasUsed?: bigint
  logs: Log[]
}

export function emptyTransactionReceipt(transactionHash: string): TransactionReceipt {
  return { transactionHash, synthetic: true, logs: [] }
}

/**
 * A receipt without a status field predates status codes and is treated as OK.
 */
export function isStatusOk(receipt: TransactionReceipt): boolean {
  if (receipt.status === undefined) {
    return true
  }
  return BigInt(receipt.status) === 1n
}
