/**
 * Represents a blockchain network configuration
 */
export interface Network {
  /** The human-readable name of the network */
  name: string

  /** The chain ID of the network */
  chainId: number

  /** The RPC URL endpoint for the network */
  rpcUrl: string

  /** Optional gas limit to use for all transactions on this network */
  gasLimit?: number

  /** Legacy gas price in wei, as a decimal string */
  gasPrice?: string

  /**
   * Fee-market caps in wei, as decimal strings. Both must be present for
   * transactions on this network to be priced with the fee market.
   */
  maxFeePerGas?: string
  maxPriorityFeePerGas?: string

  /** Whether this is a test network */
  testnet?: boolean
}
