import { RpcClient, TransactionIntent } from '../types'

/** 4.1 gwei */
export const DEFAULT_GAS_PRICE = 4_100_000_000n
export const DEFAULT_GAS_LIMIT = 9_000_000n

/**
 * A constant limit, or one computed from the pending transaction.
 */
export type GasLimitPolicy = bigint | ((intent: TransactionIntent) => bigint | Promise<bigint>)

export interface LegacyGasStrategy {
  readonly kind: 'legacy'
  readonly supportsFeeMarket: false
  readonly gasPrice: bigint
  readonly gasLimit: GasLimitPolicy
}

export interface FeeMarketGasStrategy {
  readonly kind: 'fee-market'
  readonly supportsFeeMarket: true
  readonly chainId: bigint
  readonly maxPriorityFeePerGas: bigint
  /** Not checked against `maxPriorityFeePerGas`; the node rejects inconsistent caps. */
  readonly maxFeePerGas: bigint
  readonly gasLimit: GasLimitPolicy
  /** Price used if the transaction has to fall back to legacy submission. */
  readonly gasPrice?: bigint
}

export type GasStrategy = LegacyGasStrategy | FeeMarketGasStrategy

export function staticGasStrategy(gasPrice: bigint, gasLimit: GasLimitPolicy): LegacyGasStrategy {
  return { kind: 'legacy', supportsFeeMarket: false, gasPrice, gasLimit }
}

export function defaultGasStrategy(): LegacyGasStrategy {
  return staticGasStrategy(DEFAULT_GAS_PRICE, DEFAULT_GAS_LIMIT)
}

export interface FeeMarketOptions {
  chainId: bigint | number
  maxPriorityFeePerGas: bigint
  maxFeePerGas: bigint
  gasLimit: GasLimitPolicy
  gasPrice?: bigint
}

export function feeMarketGasStrategy(options: FeeMarketOptions): FeeMarketGasStrategy {
  return {
    kind: 'fee-market',
    supportsFeeMarket: true,
    chainId: BigInt(options.chainId),
    maxPriorityFeePerGas: options.maxPriorityFeePerGas,
    maxFeePerGas: options.maxFeePerGas,
    gasLimit: options.gasLimit,
    gasPrice: options.gasPrice
  }
}

export async function resolveGasLimit(strategy: GasStrategy, intent: TransactionIntent): Promise<bigint> {
  const { gasLimit } = strategy
  return typeof gasLimit === 'bigint' ? gasLimit : gasLimit(intent)
}

/**
 * Legacy price for a strategy. A fee-market strategy without an explicit
 * fallback price pays its fee cap.
 */
export function gasPriceOf(strategy: GasStrategy): bigint {
  switch (strategy.kind) {
    case 'legacy':
      return strategy.gasPrice
    case 'fee-market':
      return strategy.gasPrice ?? strategy.maxFeePerGas
  }
}

/**
 * Limit policy that asks the node to estimate each transaction, optionally
 * scaled by `multiplier` (e.g. 1.2 for 20% headroom).
 */
export function estimatedGasLimit(rpc: Pick<RpcClient, 'estimateGas'>, multiplier?: number): GasLimitPolicy {
  if (multiplier !== undefined && (!Number.isFinite(multiplier) || multiplier <= 0)) {
    throw new Error(`gasMultiplier must be a positive number, got: ${multiplier}`)
  }
  return async (intent: TransactionIntent) => {
    const estimate = await rpc.estimateGas(intent)
    if (multiplier === undefined) {
      return estimate
    }
    return BigInt(Math.floor(Number(estimate) * multiplier))
  }
}
