import { ethers } from 'ethers'
import { AbiValue, FunctionCall, addressToString, decodeReturn, encodeFunctionCall } from '../abi/codec'
import { LinkReference, linkBinaryWithReferences } from '../bytecode/linker'
import { matchesBinary } from '../bytecode/verifier'
import { ContractEventEmitter, contractEvents } from '../events'
import { CallRevertedError, ConversionError, DeploymentError, UnsupportedOperationError } from '../errors'
import { GasStrategy } from '../gas/strategy'
import {
  EventValues,
  EventValuesWithLog,
  extractEventParametersFromReceipt,
  extractEventParametersWithLogFromReceipt,
  staticExtractEventParameters,
  staticExtractEventParametersWithLog
} from '../logs/extractor'
import { getRevertReason, getRevertReasonEncodedData, isReverted } from '../revert/decoder'
import {
  BlockTag,
  Log,
  ReceiptProcessor,
  RpcClient,
  TransactionManager,
  TransactionReceipt
} from '../types'
import { cleanHexPrefix, prependHexPrefix } from '../utils/hex'
import { TransactionExecutor } from './executor'
import { RemoteCall, RemoteFunctionCall } from './remote-call'

export const BINARY_NOT_PROVIDED = 'Bin file was not provided'
export const FUNC_DEPLOY = 'deploy'

export interface ContractHandleInit {
  /** Resolved address, or `''` for a handle that is about to deploy. */
  address: string
  binary?: string
  rpc: RpcClient
  transactionManager: TransactionManager
  receiptProcessor: ReceiptProcessor
  gasStrategy: GasStrategy
  eventEmitter?: ContractEventEmitter
  /** Known deployments by network id, as shipped with a generated wrapper. */
  staticDeployedAddresses?: Readonly<Record<string, string>>
}

/**
 * Builds a handle (or a generated subclass) from its init. Passed to
 * `load` and `deploy` so that they can return the caller's wrapper type.
 */
export type ContractFactory<T extends ContractHandle> = (init: ContractHandleInit) => T

export interface LoadOptions extends Omit<ContractHandleInit, 'address'> {
  /** Address or name. When absent, the known deployment for the connected network is used. */
  address?: string
}

export interface DeployOptions extends Omit<ContractHandleInit, 'address' | 'binary'> {
  binary: string
  /** ABI-encoded constructor arguments, appended to the creation code. */
  encodedConstructor?: string
  value?: bigint
  /** Libraries to link into `binary` before deploying. */
  links?: readonly LinkReference[]
}

/**
 * Representations a single return value can be adapted to.
 */
export interface ReturnShapes {
  typed: AbiValue
  value: unknown
  bigint: bigint
  number: number
  string: string
  boolean: boolean
}

export type ReturnShape = keyof ReturnShapes

function conversionError(value: AbiValue, shape: ReturnShape): ConversionError {
  return new ConversionError(`Unable to convert response: ${String(value.value)} (${value.type.format()}) to expected type: ${shape}`)
}

const converters: { [K in ReturnShape]: (value: AbiValue) => ReturnShapes[K] } = {
  typed: value => value,
  value: value => value.value,
  bigint: value => {
    if (typeof value.value === 'bigint') return value.value
    throw conversionError(value, 'bigint')
  },
  number: value => {
    if (typeof value.value === 'bigint' && value.value <= BigInt(Number.MAX_SAFE_INTEGER) && value.value >= BigInt(Number.MIN_SAFE_INTEGER)) {
      return Number(value.value)
    }
    throw conversionError(value, 'number')
  },
  string: value => {
    if (typeof value.value !== 'string') throw conversionError(value, 'string')
    switch (value.type.baseType) {
      case 'address':
        return addressToString(value.value)
      case 'string':
        return value.value
      default:
        throw conversionError(value, 'string')
    }
  },
  boolean: value => {
    if (typeof value.value === 'boolean') return value.value
    throw conversionError(value, 'boolean')
  }
}

function isReceipt(source: Log | TransactionReceipt): source is TransactionReceipt {
  return 'synthetic' in source
}

/**
 * A deployed (or about to be deployed) contract: read calls, transactions,
 * deployment, bytecode verification and event extraction.
 *
 * Instances come from `ContractHandle.load` (existing contract, no receipt)
 * or `ContractHandle.deploy` (fresh deployment, receipt kept). Both resolve
 * the address before the instance exists, so every operation sees a final
 * address. Callers must not change the address or gas strategy while an
 * operation on the same handle is in flight.
 */
export class ContractHandle {
  static readonly create: ContractFactory<ContractHandle> = init => new ContractHandle(init)

  static readonly linkBinaryWithReferences = linkBinaryWithReferences
  static readonly staticExtractEventParameters = staticExtractEventParameters
  static readonly staticExtractEventParametersWithLog = staticExtractEventParametersWithLog
  static readonly extractEventParametersFromReceipt = extractEventParametersFromReceipt
  static readonly extractEventParametersWithLogFromReceipt = extractEventParametersWithLogFromReceipt

  protected readonly contractBinary: string
  protected contractAddress: string
  protected gasStrategy: GasStrategy
  protected defaultBlockTag: BlockTag = 'latest'
  protected readonly rpc: RpcClient
  protected readonly transactionManager: TransactionManager
  protected readonly events: ContractEventEmitter
  private readonly executor: TransactionExecutor
  private transactionReceipt?: TransactionReceipt
  private readonly deployedAddresses = new Map<string, string>()
  private readonly staticDeployedAddresses: Readonly<Record<string, string>>

  constructor(init: ContractHandleInit) {
    this.contractAddress = init.address
    this.contractBinary = init.binary ? init.binary : BINARY_NOT_PROVIDED
    this.gasStrategy = init.gasStrategy
    this.rpc = init.rpc
    this.transactionManager = init.transactionManager
    this.events = init.eventEmitter || contractEvents
    this.staticDeployedAddresses = init.staticDeployedAddresses ?? {}
    this.executor = new TransactionExecutor({
      rpc: init.rpc,
      transactionManager: init.transactionManager,
      receiptProcessor: init.receiptProcessor,
      eventEmitter: this.events
    })
  }

  /**
   * Binds to an existing contract, resolving `options.address` once.
   */
  static async load<T extends ContractHandle>(factory: ContractFactory<T>, options: LoadOptions): Promise<T> {
    const { address, ...init } = options
    let resolved: string
    if (address !== undefined) {
      resolved = await init.rpc.resolveName(address)
    } else {
      const networkId = await init.rpc.getNetworkId()
      const known = init.staticDeployedAddresses?.[networkId]
      if (known === undefined) {
        throw new UnsupportedOperationError(`No address given and no known deployment on network ${networkId}`)
      }
      resolved = known
    }
    return factory({ ...init, address: resolved })
  }

  /**
   * Deploys `binary` (linked and followed by the constructor arguments) and
   * returns a handle bound to the created contract.
   */
  static async deploy<T extends ContractHandle>(factory: ContractFactory<T>, options: DeployOptions): Promise<T> {
    const { binary, encodedConstructor, value, links, ...init } = options
    const linked = links ? linkBinaryWithReferences(binary, links) : binary
    const contract = factory({ ...init, address: '', binary: linked })
    await contract.create(encodedConstructor ?? '', value ?? 0n)
    return contract
  }

  static deployRemoteCall<T extends ContractHandle>(factory: ContractFactory<T>, options: DeployOptions): RemoteCall<T> {
    return new RemoteCall(() => ContractHandle.deploy(factory, options))
  }

  private async create(encodedConstructor: string, value: bigint): Promise<void> {
    const receipt = await this.executor.execute({
      to: '',
      data: prependHexPrefix(this.contractBinary) + cleanHexPrefix(encodedConstructor),
      value,
      functionName: FUNC_DEPLOY,
      isConstructor: true,
      gasStrategy: this.gasStrategy
    })

    if (!receipt.contractAddress) {
      throw new DeploymentError(`Empty contract address returned. Hash: ${receipt.transactionHash}`, receipt.transactionHash)
    }
    this.contractAddress = receipt.contractAddress
    this.transactionReceipt = receipt

    this.events.emitEvent({
      type: 'contract_deployed',
      level: 'info',
      data: {
        contractAddress: receipt.contractAddress,
        txHash: receipt.transactionHash,
        blockNumber: receipt.blockNumber?.toString()
      }
    })
  }

  getContractAddress(): string {
    return this.contractAddress
  }

  setContractAddress(address: string): void {
    this.contractAddress = address
  }

  getContractBinary(): string {
    return this.contractBinary
  }

  getGasStrategy(): GasStrategy {
    return this.gasStrategy
  }

  /**
   * Applies to transactions submitted after the call.
   */
  setGasStrategy(gasStrategy: GasStrategy): void {
    this.gasStrategy = gasStrategy
  }

  /**
   * Block used for read calls, e.g. to query historical state.
   */
  setDefaultBlockTag(blockTag: BlockTag): void {
    this.defaultBlockTag = blockTag
  }

  /**
   * The receipt of the deployment this handle performed; undefined for loaded handles.
   */
  getTransactionReceipt(): TransactionReceipt | undefined {
    return this.transactionReceipt
  }

  setDeployedAddress(networkId: string, address: string): void {
    this.deployedAddresses.set(networkId, address)
  }

  getDeployedAddress(networkId: string): string | undefined {
    return this.deployedAddresses.get(networkId) ?? this.staticDeployedAddresses[networkId]
  }

  /**
   * Checks that the code at the handle's address is the code of this
   * handle's binary, ignoring the compiler metadata hash.
   */
  async isValid(): Promise<boolean> {
    if (this.contractBinary === BINARY_NOT_PROVIDED) {
      throw new UnsupportedOperationError('Contract binary not present in contract wrapper, regenerate the wrapper with its binary')
    }
    if (this.contractAddress === '') {
      throw new UnsupportedOperationError('Contract address not set, deploy the contract or load it at an address')
    }

    const response = await this.rpc.getCode(this.contractAddress, 'latest')
    const valid = response.error === undefined && matchesBinary(response.code ?? '', this.contractBinary)

    this.events.emitEvent({
      type: 'bytecode_verified',
      level: valid ? 'info' : 'warn',
      data: {
        address: this.contractAddress,
        valid,
        reason: response.error ? `eth_getCode failed: ${response.error.message}` : undefined
      }
    })
    return valid
  }

  async executeCallWithoutDecoding(call: FunctionCall): Promise<string | undefined> {
    return this.call(call)
  }

  /**
   * All return values of a read-only call, in declared order. No data yields no values.
   */
  async executeCallMultipleValueReturn(call: FunctionCall): Promise<AbiValue[]> {
    const result = await this.call(call)
    return decodeReturn(result, call.fragment.outputs)
  }

  /**
   * The first return value of a read-only call, optionally adapted to `shape`.
   * Without a shape an empty result yields undefined; with one it is a ConversionError.
   */
  async executeCallSingleValueReturn(call: FunctionCall): Promise<AbiValue | undefined>
  async executeCallSingleValueReturn<K extends ReturnShape>(call: FunctionCall, shape: K): Promise<ReturnShapes[K]>
  async executeCallSingleValueReturn(call: FunctionCall, shape?: ReturnShape): Promise<unknown> {
    const [first] = await this.executeCallMultipleValueReturn(call)
    if (shape === undefined) {
      return first
    }
    if (first === undefined) {
      throw new ConversionError('Empty value (0x) returned from contract')
    }
    return converters[shape](first)
  }

  async executeTransaction(call: FunctionCall, value: bigint = 0n): Promise<TransactionReceipt> {
    this.requireAddress(call.fragment.name)
    return this.executor.execute({
      to: this.contractAddress,
      data: encodeFunctionCall(call),
      value,
      functionName: call.fragment.name,
      isConstructor: false,
      gasStrategy: this.gasStrategy
    })
  }

  executeRemoteCallSingleValueReturn<K extends ReturnShape>(call: FunctionCall, shape: K): RemoteFunctionCall<ReturnShapes[K]> {
    return new RemoteFunctionCall(call, () => this.executeCallSingleValueReturn(call, shape))
  }

  executeRemoteCallMultipleValueReturn(call: FunctionCall): RemoteFunctionCall<AbiValue[]> {
    return new RemoteFunctionCall(call, () => this.executeCallMultipleValueReturn(call))
  }

  executeRemoteCallTransaction(call: FunctionCall, value: bigint = 0n): RemoteFunctionCall<TransactionReceipt> {
    return new RemoteFunctionCall(call, () => this.executeTransaction(call, value))
  }

  extractEventParameters(event: ethers.EventFragment, log: Log): EventValues | undefined
  extractEventParameters(event: ethers.EventFragment, receipt: TransactionReceipt): EventValues[]
  extractEventParameters(event: ethers.EventFragment, source: Log | TransactionReceipt): EventValues | EventValues[] | undefined {
    return isReceipt(source)
      ? extractEventParametersFromReceipt(event, source)
      : staticExtractEventParameters(event, source)
  }

  extractEventParametersWithLog(event: ethers.EventFragment, log: Log): EventValuesWithLog | undefined
  extractEventParametersWithLog(event: ethers.EventFragment, receipt: TransactionReceipt): EventValuesWithLog[]
  extractEventParametersWithLog(event: ethers.EventFragment, source: Log | TransactionReceipt): EventValuesWithLog | EventValuesWithLog[] | undefined {
    return isReceipt(source)
      ? extractEventParametersWithLogFromReceipt(event, source)
      : staticExtractEventParametersWithLog(event, source)
  }

  private async call(call: FunctionCall): Promise<string | undefined> {
    const functionName = call.fragment.name
    this.requireAddress(functionName)

    const response = await this.rpc.call(
      {
        from: await this.transactionManager.getFromAddress(),
        to: this.contractAddress,
        data: encodeFunctionCall(call)
      },
      this.defaultBlockTag
    )

    if (isReverted(response)) {
      const reason = getRevertReason(response)
      this.events.emitEvent({
        type: 'call_reverted',
        level: 'warn',
        data: { to: this.contractAddress, functionName, reason: reason ?? 'N/A' }
      })
      throw new CallRevertedError(reason, getRevertReasonEncodedData(response))
    }

    this.events.emitEvent({
      type: 'call_executed',
      level: 'debug',
      data: {
        to: this.contractAddress,
        functionName,
        blockTag: this.defaultBlockTag.toString(),
        resultPreview: (response.result ?? '0x').substring(0, 66)
      }
    })
    return response.result
  }

  private requireAddress(operation: string): void {
    if (this.contractAddress === '') {
      throw new UnsupportedOperationError(`Cannot execute "${operation}": contract address not set`)
    }
  }
}
