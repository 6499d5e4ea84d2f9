import * as fs from 'fs/promises'
import * as path from 'path'
import { parse as parseYaml } from 'yaml'
import { DEFAULT_GAS_LIMIT, DEFAULT_GAS_PRICE, GasStrategy, feeMarketGasStrategy, staticGasStrategy } from './gas/strategy'
import { Network } from './types'

const DECIMAL = /^\d+$/

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isOptional(obj: Record<string, unknown>, key: string, check: (value: unknown) => boolean): boolean {
  return !(key in obj) || check(obj[key])
}

const isDecimalString = (value: unknown): boolean => typeof value === 'string' && DECIMAL.test(value)

/**
 * Wei amounts may be written as YAML integers; they are kept as decimal strings.
 */
function normalizeWei(value: unknown): unknown {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 ? value.toString() : value
}

function toNetwork(item: unknown): Network | undefined {
  if (!isRecord(item)) return undefined

  const obj: Record<string, unknown> = {
    ...item,
    ...('gasPrice' in item ? { gasPrice: normalizeWei(item.gasPrice) } : {}),
    ...('maxFeePerGas' in item ? { maxFeePerGas: normalizeWei(item.maxFeePerGas) } : {}),
    ...('maxPriorityFeePerGas' in item ? { maxPriorityFeePerGas: normalizeWei(item.maxPriorityFeePerGas) } : {})
  }

  const { name, chainId, rpcUrl } = obj
  if (typeof name !== 'string' || typeof chainId !== 'number' || typeof rpcUrl !== 'string') {
    return undefined
  }
  const valid =
    isOptional(obj, 'gasLimit', value => typeof value === 'number' && Number.isSafeInteger(value) && value > 0) &&
    isOptional(obj, 'gasPrice', isDecimalString) &&
    isOptional(obj, 'maxFeePerGas', isDecimalString) &&
    isOptional(obj, 'maxPriorityFeePerGas', isDecimalString) &&
    isOptional(obj, 'testnet', value => typeof value === 'boolean')
  if (!valid) return undefined

  const network: Network = { name, chainId, rpcUrl }
  if (typeof obj.gasLimit === 'number') network.gasLimit = obj.gasLimit
  if (typeof obj.gasPrice === 'string') network.gasPrice = obj.gasPrice
  if (typeof obj.maxFeePerGas === 'string') network.maxFeePerGas = obj.maxFeePerGas
  if (typeof obj.maxPriorityFeePerGas === 'string') network.maxPriorityFeePerGas = obj.maxPriorityFeePerGas
  if (typeof obj.testnet === 'boolean') network.testnet = obj.testnet
  return network
}

function resolveRpcUrlTokens(rpcUrl: string): string {
  // Replace placeholders like {{RPC_SOMETHING}} with process.env.RPC_SOMETHING
  // Only tokens starting with "RPC" are considered. Others are left as-is.
  const TOKEN_REGEX = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g
  return rpcUrl.replace(TOKEN_REGEX, (match: string, varName: string) => {
    if (!varName.startsWith('RPC')) {
      return match
    }
    return process.env[varName] ?? ''
  })
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

/**
 * Loads and validates network configurations from a `networks.yaml` file in the project root.
 * A missing file yields an empty list.
 * @throws An error if the file exists but is malformed or contains invalid network data.
 */
export async function loadNetworks(projectRoot: string): Promise<Network[]> {
  const filePath = path.join(projectRoot, 'networks.yaml')
  try {
    const content = await fs.readFile(filePath, 'utf-8')
    const parsed: unknown = parseYaml(content)

    if (!Array.isArray(parsed)) {
      throw new Error('networks.yaml must contain an array of network configurations.')
    }

    const networks: Network[] = []
    for (const item of parsed) {
      const network = toNetwork(item)
      if (!network) {
        throw new Error(`Invalid network configuration found in networks.yaml: ${JSON.stringify(item)}`)
      }
      networks.push({ ...network, rpcUrl: resolveRpcUrlTokens(network.rpcUrl) })
    }
    return networks
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return []
    }
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to load or parse networks.yaml: ${message}`)
  }
}

/**
 * Pricing for transactions on `network`: fee-market when both fee caps are
 * configured, legacy otherwise. Unset values fall back to the defaults.
 */
export function gasStrategyForNetwork(network: Network): GasStrategy {
  const gasLimit = network.gasLimit !== undefined ? BigInt(network.gasLimit) : DEFAULT_GAS_LIMIT
  const gasPrice = network.gasPrice !== undefined ? BigInt(network.gasPrice) : undefined

  if (network.maxFeePerGas !== undefined && network.maxPriorityFeePerGas !== undefined) {
    return feeMarketGasStrategy({
      chainId: network.chainId,
      maxFeePerGas: BigInt(network.maxFeePerGas),
      maxPriorityFeePerGas: BigInt(network.maxPriorityFeePerGas),
      gasLimit,
      gasPrice
    })
  }
  return staticGasStrategy(gasPrice ?? DEFAULT_GAS_PRICE, gasLimit)
}
