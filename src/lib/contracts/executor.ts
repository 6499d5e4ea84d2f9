import { ContractEventEmitter, contractEvents } from '../events'
import { RevertedTransactionError, RpcProtocolError, TransactionError, describeRpcError } from '../errors'
import { GasStrategy, gasPriceOf, resolveGasLimit } from '../gas/strategy'
import { MISSING_REASON, getRevertReason, getRevertReasonEncodedData } from '../revert/decoder'
import {
  PricingMode,
  ReceiptProcessor,
  RpcClient,
  TransactionIntent,
  TransactionManager,
  TransactionReceipt,
  isStatusOk
} from '../types'

export interface TransactionExecutorOptions {
  rpc: RpcClient
  transactionManager: TransactionManager
  receiptProcessor: ReceiptProcessor
  eventEmitter?: ContractEventEmitter
}

export interface ExecutionRequest {
  /** Contract address; ignored for creation. */
  to: string
  data: string
  value: bigint
  functionName: string
  /** True for contract creation: the transaction carries no destination. */
  isConstructor: boolean
  gasStrategy: GasStrategy
}

/**
 * Submits one transaction, waits for it, and turns every failure into a
 * TransactionError. Nothing is retried.
 */
export class TransactionExecutor {
  private readonly rpc: RpcClient
  private readonly transactionManager: TransactionManager
  private readonly receiptProcessor: ReceiptProcessor
  private readonly events: ContractEventEmitter

  constructor(options: TransactionExecutorOptions) {
    this.rpc = options.rpc
    this.transactionManager = options.transactionManager
    this.receiptProcessor = options.receiptProcessor
    this.events = options.eventEmitter || contractEvents
  }

  async execute(request: ExecutionRequest): Promise<TransactionReceipt> {
    const intent = await this.buildIntent(request)

    let receipt: TransactionReceipt
    try {
      const { hash, pricing } = await this.submit(request, intent)

      this.events.emitEvent({
        type: 'transaction_sent',
        level: 'info',
        data: {
          to: intent.to ?? '(contract creation)',
          value: intent.value.toString(),
          functionName: request.functionName,
          pricing,
          dataPreview: intent.data.substring(0, 42),
          txHash: hash
        }
      })

      receipt = await this.receiptProcessor.waitForReceipt(hash)
    } catch (error) {
      if (error instanceof RpcProtocolError) {
        throw new TransactionError(describeRpcError(error.payload), undefined, { cause: error })
      }
      throw error
    }

    if (!receipt.synthetic && !isStatusOk(receipt)) {
      throw await this.revertedTransaction(request, intent, receipt)
    }

    this.events.emitEvent({
      type: 'transaction_confirmed',
      level: 'info',
      data: {
        txHash: receipt.transactionHash,
        blockNumber: receipt.blockNumber?.toString(),
        gasUsed: receipt.gasUsed?.toString(),
        synthetic: receipt.synthetic
      }
    })
    return receipt
  }

  private async buildIntent(request: ExecutionRequest): Promise<TransactionIntent> {
    const from = await this.transactionManager.getFromAddress()
    return Object.freeze(
      request.isConstructor
        ? { from, value: request.value, data: request.data }
        : { from, to: request.to, value: request.value, data: request.data }
    )
  }

  /**
   * Fee-market first when the strategy supports it; legacy when it does not
   * or when the manager declines the fee-market transaction.
   */
  private async submit(request: ExecutionRequest, intent: TransactionIntent): Promise<{ hash: string; pricing: PricingMode }> {
    const strategy = request.gasStrategy

    if (strategy.kind === 'fee-market') {
      const hash = await this.transactionManager.sendFeeMarket({
        chainId: strategy.chainId,
        to: intent.to,
        data: intent.data,
        value: intent.value,
        gasLimit: await resolveGasLimit(strategy, intent),
        maxPriorityFeePerGas: strategy.maxPriorityFeePerGas,
        maxFeePerGas: strategy.maxFeePerGas
      })
      if (hash !== undefined) {
        return { hash, pricing: 'fee-market' }
      }
      this.events.emitEvent({
        type: 'fee_market_fallback',
        level: 'warn',
        data: {
          functionName: request.functionName,
          chainId: strategy.chainId.toString()
        }
      })
    }

    const hash = await this.transactionManager.sendLegacy({
      to: intent.to,
      data: intent.data,
      value: intent.value,
      gasPrice: gasPriceOf(strategy),
      gasLimit: await resolveGasLimit(strategy, intent)
    })
    return { hash, pricing: 'legacy' }
  }

  /**
   * Receipts carry no revert data, so the reason comes from replaying the
   * same call against the state of the block it was mined in.
   */
  private async revertedTransaction(
    request: ExecutionRequest,
    intent: TransactionIntent,
    receipt: TransactionReceipt
  ): Promise<RevertedTransactionError> {
    const replay = await this.rpc.call(
      { from: intent.from, to: intent.to, data: intent.data, value: intent.value },
      receipt.blockNumber ?? 'latest'
    )
    const error = new RevertedTransactionError(
      receipt,
      getRevertReason(replay) ?? MISSING_REASON,
      getRevertReasonEncodedData(replay)
    )

    this.events.emitEvent({
      type: 'transaction_reverted',
      level: 'error',
      data: {
        txHash: receipt.transactionHash,
        functionName: request.functionName,
        status: error.status,
        gasUsed: error.gasUsed,
        reason: error.reason
      }
    })
    return error
  }
}
