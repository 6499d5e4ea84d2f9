import { ethers } from 'ethers'
import { RpcProtocolError, TransportError, toRpcErrorPayload } from '../errors'
import { FeeMarketTransactionRequest, LegacyTransactionRequest, TransactionManager } from '../types'

export type SignerLike = Pick<ethers.Signer, 'getAddress' | 'sendTransaction'>

/**
 * TransactionManager that signs with an ethers signer (a `Wallet` for a
 * local key, or a `JsonRpcSigner` for a node-managed account). Nonces are
 * left to the signer.
 */
export class SignerTransactionManager implements TransactionManager {
  private fromAddress?: string

  constructor(private readonly signer: SignerLike) {}

  async getFromAddress(): Promise<string> {
    if (this.fromAddress === undefined) {
      this.fromAddress = await this.signer.getAddress()
    }
    return this.fromAddress
  }

  async sendLegacy(request: LegacyTransactionRequest): Promise<string> {
    const hash = await this.submit({
      type: 0,
      to: request.to,
      data: request.data,
      value: request.value,
      gasPrice: request.gasPrice,
      gasLimit: request.gasLimit
    })
    if (hash === undefined) {
      throw new TransportError('Signer refused a legacy transaction')
    }
    return hash
  }

  async sendFeeMarket(request: FeeMarketTransactionRequest): Promise<string | undefined> {
    return this.submit({
      type: 2,
      chainId: request.chainId,
      to: request.to,
      data: request.data,
      value: request.value,
      gasLimit: request.gasLimit,
      maxPriorityFeePerGas: request.maxPriorityFeePerGas,
      maxFeePerGas: request.maxFeePerGas
    })
  }

  /**
   * Returns undefined when the signer or node cannot handle a fee-market
   * transaction, so the caller can retry with legacy pricing.
   */
  private async submit(tx: ethers.TransactionRequest): Promise<string | undefined> {
    try {
      const response = await this.signer.sendTransaction(tx)
      return response.hash
    } catch (error) {
      if (tx.type === 2 && ethers.isError(error, 'UNSUPPORTED_OPERATION')) {
        return undefined
      }
      const payload = toRpcErrorPayload(error)
      if (payload) {
        throw new RpcProtocolError(payload, { cause: error })
      }
      throw new TransportError(`Failed to submit transaction: ${error instanceof Error ? error.message : String(error)}`, { cause: error })
    }
  }
}
