import { ethers } from 'ethers'
import { NameResolutionError, RpcProtocolError, TransportError, toRpcErrorPayload } from '../errors'
import {
  BlockTag,
  CallRequest,
  CallResponse,
  CodeResponse,
  RpcClient,
  RpcErrorPayload,
  TransactionIntent
} from '../types'

/**
 * The parts of `ethers.JsonRpcProvider` the client relies on.
 */
export type JsonRpcProviderLike = Pick<ethers.JsonRpcProvider, 'send' | 'resolveName' | 'getNetwork' | 'estimateGas'>

export function toRpcBlockTag(tag: BlockTag): string {
  return typeof tag === 'string' ? tag : ethers.toQuantity(tag)
}

export function toRpcCallObject(request: CallRequest): Record<string, string> {
  const tx: Record<string, string> = { data: request.data }
  if (request.from) tx.from = request.from
  if (request.to) tx.to = request.to
  if (request.value !== undefined && request.value > 0n) tx.value = ethers.toQuantity(request.value)
  return tx
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * RpcClient over an ethers JSON-RPC provider. Raw `eth_call` / `eth_getCode`
 * requests are used so that error responses can be handed back intact
 * instead of being reinterpreted by ethers.
 */
export class JsonRpcClient implements RpcClient {
  constructor(private readonly provider: JsonRpcProviderLike) {}

  async call(request: CallRequest, blockTag: BlockTag): Promise<CallResponse> {
    try {
      const result: unknown = await this.provider.send('eth_call', [toRpcCallObject(request), toRpcBlockTag(blockTag)])
      return typeof result === 'string' ? { result } : {}
    } catch (error) {
      return { error: this.rpcErrorOrThrow(error, 'eth_call') }
    }
  }

  async getCode(address: string, blockTag: BlockTag): Promise<CodeResponse> {
    try {
      const code: unknown = await this.provider.send('eth_getCode', [address, toRpcBlockTag(blockTag)])
      return typeof code === 'string' ? { code } : {}
    } catch (error) {
      return { error: this.rpcErrorOrThrow(error, 'eth_getCode') }
    }
  }

  async estimateGas(intent: TransactionIntent): Promise<bigint> {
    try {
      return await this.provider.estimateGas({
        from: intent.from,
        to: intent.to,
        value: intent.value,
        data: intent.data
      })
    } catch (error) {
      throw new RpcProtocolError(this.rpcErrorOrThrow(error, 'eth_estimateGas'), { cause: error })
    }
  }

  async resolveName(nameOrAddress: string): Promise<string> {
    if (ethers.isAddress(nameOrAddress)) {
      return ethers.getAddress(nameOrAddress)
    }
    let address: string | null
    try {
      address = await this.provider.resolveName(nameOrAddress)
    } catch (error) {
      throw new TransportError(`Failed to resolve "${nameOrAddress}": ${errorMessage(error)}`, { cause: error })
    }
    if (address === null) {
      throw new NameResolutionError(nameOrAddress)
    }
    return address
  }

  async getNetworkId(): Promise<string> {
    try {
      const network = await this.provider.getNetwork()
      return network.chainId.toString()
    } catch (error) {
      throw new TransportError(`Failed to detect network: ${errorMessage(error)}`, { cause: error })
    }
  }

  private rpcErrorOrThrow(error: unknown, method: string): RpcErrorPayload {
    const payload = toRpcErrorPayload(error)
    if (!payload) {
      throw new TransportError(`${method} failed: ${errorMessage(error)}`, { cause: error })
    }
    return payload
  }
}
