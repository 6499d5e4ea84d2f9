import { ContractEventEmitter, contractEvents } from '../events'
import { TransactionError } from '../errors'
import { Log, ReceiptProcessor, TransactionReceipt, emptyTransactionReceipt } from '../types'

/**
 * Structural subset of `ethers.TransactionReceipt`.
 */
export interface ReceiptLike {
  hash: string
  blockNumber: number
  from: string
  to: string | null
  contractAddress: string | null
  status: number | null
  gasUsed: bigint
  logs: ReadonlyArray<{
    address: string
    topics: ReadonlyArray<string>
    data: string
    blockNumber: number
    transactionHash: string
    index: number
  }>
}

export interface ReceiptSource {
  getTransactionReceipt(hash: string): Promise<ReceiptLike | null>
}

export function fromEthersReceipt(receipt: ReceiptLike): TransactionReceipt {
  const logs: Log[] = receipt.logs.map(log => ({
    address: log.address,
    topics: [...log.topics],
    data: log.data,
    blockNumber: BigInt(log.blockNumber),
    transactionHash: log.transactionHash,
    logIndex: log.index
  }))
  return {
    transactionHash: receipt.hash,
    synthetic: false,
    status: receipt.status === null ? undefined : `0x${receipt.status.toString(16)}`,
    blockNumber: BigInt(receipt.blockNumber),
    from: receipt.from,
    to: receipt.to ?? undefined,
    contractAddress: receipt.contractAddress ?? undefined,
    gasUsed: receipt.gasUsed,
    logs
  }
}

export interface PollingOptions {
  /** Delay between polls. Defaults to 15 seconds. */
  intervalMs?: number
  /** Polls before giving up. Defaults to 40. */
  attempts?: number
  eventEmitter?: ContractEventEmitter
}

/**
 * Polls for the receipt at a fixed interval and gives up with a
 * TransactionError after the configured number of attempts.
 */
export class PollingReceiptProcessor implements ReceiptProcessor {
  private readonly intervalMs: number
  private readonly attempts: number
  private readonly events: ContractEventEmitter

  constructor(private readonly source: ReceiptSource, options?: PollingOptions) {
    this.intervalMs = options?.intervalMs ?? 15_000
    this.attempts = options?.attempts ?? 40
    this.events = options?.eventEmitter || contractEvents
  }

  async waitForReceipt(transactionHash: string): Promise<TransactionReceipt> {
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      const receipt = await this.source.getTransactionReceipt(transactionHash)
      if (receipt) {
        return fromEthersReceipt(receipt)
      }
      this.events.emitEvent({
        type: 'receipt_polling',
        level: 'debug',
        data: {
          txHash: transactionHash,
          attempt,
          maxAttempts: this.attempts
        }
      })
      if (attempt < this.attempts) {
        await new Promise(resolve => setTimeout(resolve, this.intervalMs))
      }
    }
    const seconds = (this.intervalMs * this.attempts) / 1000
    throw new TransactionError(
      `Transaction receipt was not generated after ${seconds} seconds for transaction: ${transactionHash}`
    )
  }
}

/**
 * Returns immediately with a synthetic receipt; for callers that track
 * mining themselves.
 */
export class NoOpReceiptProcessor implements ReceiptProcessor {
  async waitForReceipt(transactionHash: string): Promise<TransactionReceipt> {
    return emptyTransactionReceipt(transactionHash)
  }
}
