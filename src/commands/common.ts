import { Command } from 'commander'
import * as dotenv from 'dotenv'
import * as fs from 'fs/promises'
import * as path from 'path'
import { ethers } from 'ethers'
import { CLIEventAdapter, VerbosityLevel, contractEvents } from '../lib/events'
import { GasStrategy, estimatedGasLimit, staticGasStrategy } from '../lib/gas/strategy'
import { gasStrategyForNetwork, loadNetworks } from '../lib/network-loader'
import { isValidRpcUrl, selectNetwork } from '../lib/network-selection'
import { JsonRpcClient } from '../lib/transport/json-rpc'
import { ReadonlyTransactionManager } from '../lib/transport/readonly-manager'
import { NoOpReceiptProcessor, PollingReceiptProcessor } from '../lib/transport/receipt-processor'
import { SignerTransactionManager } from '../lib/transport/signer-manager'
import { Network, ReceiptProcessor, TransactionManager } from '../lib/types'
import { validateAddress, validateAmount, validateHexData } from '../lib/utils/validation'

const VERBOSITY_LEVELS: readonly VerbosityLevel[] = [0, 1, 2, 3]

let cliAdapter: CLIEventAdapter | undefined

/**
 * Renders contract events on the console at the given verbosity. The adapter
 * is created on first use.
 */
export function setVerbosity(verbose: number): void {
  const level = VERBOSITY_LEVELS[Math.max(0, Math.min(3, Math.floor(verbose)))] ?? 0
  if (cliAdapter) {
    cliAdapter.setVerbosity(level)
  } else {
    cliAdapter = new CLIEventAdapter(contractEvents, level)
  }
}

/**
 * Adds the --project option to a command.
 */
export const projectOption = (cmd: Command): Command =>
  cmd.option('-p, --project <path>', 'Project root directory (where networks.yaml lives)', process.cwd())

/**
 * Adds the --dotenv option to a command.
 */
export const dotenvOption = (cmd: Command): Command =>
  cmd.option('--dotenv <path>', 'Path to a custom .env file')

/**
 * Adds verbosity options to a command.
 */
export const verbosityOption = (cmd: Command): Command =>
  cmd.option('-v, --verbose', 'Enable verbose logging (use -vv or -vvv for more detail)', (_, previous: number) => previous + 1, 0)

/**
 * Adds the options that select the node to talk to.
 */
export const networkOptions = (cmd: Command): Command =>
  cmd
    .option('-n, --network <network>', 'Network name or chain ID from networks.yaml')
    .option('--rpc-url <url>', 'RPC URL to use instead of networks.yaml. The chain ID is detected from the node.')

/**
 * Adds the --private-key option to a command.
 */
export const signerOption = (cmd: Command): Command =>
  cmd.option('-k, --private-key <key>', 'Signer private key. Can also be set via PRIVATE_KEY env var.')

/**
 * Adds transaction pricing and receipt options to a command.
 */
export const transactionOptions = (cmd: Command): Command =>
  cmd
    .option('--gas-price <wei>', 'Legacy gas price in wei. Overrides the network configuration.')
    .option('--gas-limit <gas>', 'Gas limit. Overrides the network configuration.')
    .option('--estimate-gas', 'Ask the node to estimate the gas limit of each transaction', false)
    .option('--poll-interval <ms>', 'Delay between receipt polls in milliseconds')
    .option('--no-wait', 'Return after submission without waiting for the receipt')

export interface ConnectionOptions {
  project: string
  network?: string
  rpcUrl?: string
  privateKey?: string
  gasPrice?: string
  gasLimit?: string
  estimateGas?: boolean
  pollInterval?: string
  wait?: boolean
}

export interface Connection {
  network: Network
  provider: ethers.JsonRpcProvider
  rpc: JsonRpcClient
  transactionManager: TransactionManager
  receiptProcessor: ReceiptProcessor
  gasStrategy: GasStrategy
}

/**
 * Loads environment variables from the specified .env file path.
 */
export function loadDotenv(options: { dotenv?: string }): void {
  const dotenvPath = options.dotenv ? path.resolve(options.dotenv) : path.resolve(process.cwd(), '.env')
  dotenv.config({ path: dotenvPath })
}

async function resolveConnectionNetwork(options: ConnectionOptions): Promise<{ network: Network; provider: ethers.JsonRpcProvider }> {
  const networks = await loadNetworks(options.project)

  if (options.rpcUrl) {
    if (!isValidRpcUrl(options.rpcUrl)) {
      throw new Error(`Invalid RPC URL format: ${options.rpcUrl}`)
    }
    const provider = new ethers.JsonRpcProvider(options.rpcUrl)
    let chainId: number
    try {
      chainId = Number((await provider.getNetwork()).chainId)
    } catch (error) {
      provider.destroy()
      throw new Error(`Failed to detect network from RPC URL "${options.rpcUrl}": ${error instanceof Error ? error.message : String(error)}`)
    }
    // Gas settings of a configured network with the same chain ID still apply
    const configured = networks.find(n => n.chainId === chainId)
    const network: Network = configured
      ? { ...configured, rpcUrl: options.rpcUrl }
      : { name: `custom-${chainId}`, chainId, rpcUrl: options.rpcUrl }
    contractEvents.emitEvent({
      type: 'debug_info',
      level: 'debug',
      data: { message: `Detected chain ${chainId} (${network.name}) at ${options.rpcUrl}` }
    })
    return { network, provider }
  }

  if (!options.network) {
    throw new Error('No network selected. Use --network <name|chainId> or --rpc-url <url>.')
  }
  const network = selectNetwork(options.network, networks)
  if (!network.rpcUrl) {
    throw new Error(`Network "${network.name}" has an empty rpcUrl. Check the RPC_* variables it references.`)
  }
  return { network, provider: new ethers.JsonRpcProvider(network.rpcUrl, network.chainId, { staticNetwork: true }) }
}

/**
 * Builds the collaborators a ContractHandle needs from command line options.
 * Without a private key the connection can only read, unless `requireSigner`
 * is set, in which case that is an error.
 */
export async function connect(options: ConnectionOptions, requireSigner: boolean): Promise<Connection> {
  const { network, provider } = await resolveConnectionNetwork(options)
  const rpc = new JsonRpcClient(provider)

  const privateKey = options.privateKey || process.env.PRIVATE_KEY
  let transactionManager: TransactionManager
  if (privateKey) {
    transactionManager = new SignerTransactionManager(new ethers.Wallet(privateKey, provider))
  } else if (requireSigner) {
    throw new Error('A private key must be provided via the --private-key option or the PRIVATE_KEY environment variable.')
  } else {
    transactionManager = new ReadonlyTransactionManager()
  }

  const receiptProcessor: ReceiptProcessor = options.wait === false
    ? new NoOpReceiptProcessor()
    : new PollingReceiptProcessor(provider, {
      intervalMs: options.pollInterval !== undefined ? Number(validateAmount(options.pollInterval, 'poll-interval')) : undefined
    })

  let gasStrategy = gasStrategyForNetwork(network)
  if (options.gasPrice !== undefined || options.gasLimit !== undefined || options.estimateGas) {
    const gasLimit = options.estimateGas
      ? estimatedGasLimit(rpc)
      : options.gasLimit !== undefined ? validateAmount(options.gasLimit, 'gas-limit') : gasStrategy.gasLimit
    gasStrategy = options.gasPrice !== undefined
      ? staticGasStrategy(validateAmount(options.gasPrice, 'gas-price'), gasLimit)
      : { ...gasStrategy, gasLimit }
  }

  return { network, provider, rpc, transactionManager, receiptProcessor, gasStrategy }
}

/**
 * Converts a command line argument to the value ethers expects for `type`.
 * Booleans take `true`/`false`; arrays and tuples take JSON; everything else
 * is passed through as text (decimal or hex integers, addresses, hex bytes).
 */
export function parseArgument(type: ethers.ParamType, raw: string): unknown {
  if (type.isArray() || type.isTuple()) {
    try {
      const parsed: unknown = JSON.parse(raw)
      return parsed
    } catch (error) {
      throw new Error(`Invalid JSON for ${type.format()} argument "${type.name}": ${error instanceof Error ? error.message : String(error)}`)
    }
  }
  switch (type.baseType) {
    case 'bool':
      if (raw === 'true') return true
      if (raw === 'false') return false
      throw new Error(`Invalid bool argument "${type.name}": expected true or false, got ${raw}`)
    case 'address':
      return validateAddress(raw, type.name || 'address')
    default:
      if (type.baseType.startsWith('bytes')) {
        return validateHexData(raw, type.name || type.baseType)
      }
      return raw
  }
}

export function parseArguments(inputs: readonly ethers.ParamType[], raw: readonly string[]): unknown[] {
  if (inputs.length !== raw.length) {
    throw new Error(`Expected ${inputs.length} arguments, got ${raw.length}`)
  }
  return inputs.map((type, index) => parseArgument(type, raw[index]))
}

/**
 * Text form of a decoded value; integers are printed in decimal.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value
  if (typeof value === 'bigint') return value.toString()
  return JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))
}

/**
 * Reads contract creation code from hex text, a `.bin` file, or a compiler
 * artifact JSON with a `bytecode` (or `bytecode.object`) field.
 */
export async function readBinary(source: string): Promise<string> {
  let content: string
  try {
    content = (await fs.readFile(path.resolve(source), 'utf-8')).trim()
  } catch (error) {
    if (source.startsWith('0x')) {
      return source
    }
    throw new Error(`Cannot read binary from ${source}: ${error instanceof Error ? error.message : String(error)}`)
  }

  if (!content.startsWith('{')) {
    return content.startsWith('0x') ? content : `0x${content}`
  }

  const artifact: unknown = JSON.parse(content)
  if (typeof artifact === 'object' && artifact !== null && 'bytecode' in artifact) {
    const { bytecode } = artifact
    if (typeof bytecode === 'string') {
      return bytecode.startsWith('0x') ? bytecode : `0x${bytecode}`
    }
    if (typeof bytecode === 'object' && bytecode !== null && 'object' in bytecode && typeof bytecode.object === 'string') {
      return bytecode.object.startsWith('0x') ? bytecode.object : `0x${bytecode.object}`
    }
  }
  throw new Error(`No bytecode found in ${source}`)
}

/**
 * Reports a failed command and exits with status 1.
 */
export function failCommand(error: unknown): never {
  contractEvents.emitEvent({
    type: 'cli_error',
    level: 'error',
    data: {
      message: error instanceof Error ? error.message : String(error)
    }
  })
  process.exit(1)
}
