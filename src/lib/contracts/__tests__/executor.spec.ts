import { ContractEventEmitter } from '../../events'
import { RevertedTransactionError, RpcProtocolError, TransactionError } from '../../errors'
import { DEFAULT_GAS_LIMIT, DEFAULT_GAS_PRICE, defaultGasStrategy, feeMarketGasStrategy, staticGasStrategy } from '../../gas/strategy'
import { ContractEvent, TransactionIntent, emptyTransactionReceipt } from '../../types'
import { ExecutionRequest, TransactionExecutor } from '../executor'
import {
  CONTRACT,
  SENDER,
  TX_HASH,
  errorString,
  fakeReceiptProcessor,
  fakeRpc,
  fakeTransactionManager
} from './fakes'

describe('TransactionExecutor', () => {
  let rpc: ReturnType<typeof fakeRpc>
  let transactionManager: ReturnType<typeof fakeTransactionManager>
  let receiptProcessor: ReturnType<typeof fakeReceiptProcessor>
  let eventEmitter: ContractEventEmitter
  let events: ContractEvent[]

  const request = (overrides: Partial<ExecutionRequest> = {}): ExecutionRequest => ({
    to: CONTRACT,
    data: '0xa9059cbb',
    value: 0n,
    functionName: 'transfer',
    isConstructor: false,
    gasStrategy: defaultGasStrategy(),
    ...overrides
  })

  const executor = () => new TransactionExecutor({ rpc, transactionManager, receiptProcessor, eventEmitter })

  const feeMarket = feeMarketGasStrategy({
    chainId: 5,
    maxPriorityFeePerGas: 2n,
    maxFeePerGas: 100n,
    gasLimit: 50_000n
  })

  beforeEach(() => {
    rpc = fakeRpc()
    transactionManager = fakeTransactionManager()
    receiptProcessor = fakeReceiptProcessor()
    eventEmitter = new ContractEventEmitter()
    events = []
    eventEmitter.onAnyEvent(event => events.push(event))
  })

  it('submits legacy transactions with the strategy price and limit', async () => {
    const receipt = await executor().execute(request())

    expect(transactionManager.sendFeeMarket).not.toHaveBeenCalled()
    expect(transactionManager.sendLegacy).toHaveBeenCalledWith({
      to: CONTRACT,
      data: '0xa9059cbb',
      value: 0n,
      gasPrice: DEFAULT_GAS_PRICE,
      gasLimit: DEFAULT_GAS_LIMIT
    })
    expect(receiptProcessor.waitForReceipt).toHaveBeenCalledWith(TX_HASH)
    expect(receipt.transactionHash).toBe(TX_HASH)
    expect(receipt.status).toBe('0x1')
  })

  it('prefers fee-market submission when the strategy supports it', async () => {
    await executor().execute(request({ gasStrategy: feeMarket, value: 7n }))

    expect(transactionManager.sendFeeMarket).toHaveBeenCalledWith({
      chainId: 5n,
      to: CONTRACT,
      data: '0xa9059cbb',
      value: 7n,
      gasLimit: 50_000n,
      maxPriorityFeePerGas: 2n,
      maxFeePerGas: 100n
    })
    expect(transactionManager.sendLegacy).not.toHaveBeenCalled()
    expect(events.find(e => e.type === 'transaction_sent')).toMatchObject({ data: { pricing: 'fee-market', txHash: TX_HASH } })
  })

  it('falls back to legacy pricing when fee-market submission is declined', async () => {
    transactionManager.sendFeeMarket.mockResolvedValueOnce(undefined)

    await executor().execute(request({ gasStrategy: feeMarket }))

    expect(transactionManager.sendFeeMarket).toHaveBeenCalledTimes(1)
    expect(transactionManager.sendLegacy).toHaveBeenCalledWith({
      to: CONTRACT,
      data: '0xa9059cbb',
      value: 0n,
      gasPrice: 100n,
      gasLimit: 50_000n
    })
    expect(events.map(e => e.type)).toEqual(['fee_market_fallback', 'transaction_sent', 'transaction_confirmed'])
  })

  it('omits the destination for contract creation', async () => {
    await executor().execute(request({ isConstructor: true, data: '0x6080', functionName: 'deploy' }))

    expect(transactionManager.sendLegacy).toHaveBeenCalledWith(expect.objectContaining({ to: undefined, data: '0x6080' }))
  })

  it('computes the gas limit from the pending transaction', async () => {
    const limit = jest.fn((intent: TransactionIntent) => (intent.to === CONTRACT ? 60_000n : 0n))

    await executor().execute(request({ gasStrategy: staticGasStrategy(1n, limit) }))

    expect(limit).toHaveBeenCalledWith({ from: SENDER, to: CONTRACT, value: 0n, data: '0xa9059cbb' })
    expect(transactionManager.sendLegacy).toHaveBeenCalledWith(expect.objectContaining({ gasPrice: 1n, gasLimit: 60_000n }))
  })

  it('replays failed transactions at their block to explain the revert', async () => {
    receiptProcessor = fakeReceiptProcessor({ status: '0x0', blockNumber: 42n, gasUsed: 30_000n })
    rpc.call.mockResolvedValueOnce({ result: errorString('Out of funds') })

    const failure = executor().execute(request({ value: 3n }))

    await expect(failure).rejects.toThrow(RevertedTransactionError)
    await expect(failure).rejects.toMatchObject({
      transactionHash: TX_HASH,
      status: '0x0',
      gasUsed: '30000',
      reason: 'Out of funds',
      message: `Transaction ${TX_HASH} has failed with status: 0x0. Gas used: 30000. Revert reason: 'Out of funds'.`
    })
    expect(rpc.call).toHaveBeenCalledWith({ from: SENDER, to: CONTRACT, data: '0xa9059cbb', value: 3n }, 42n)
    expect(events.find(e => e.type === 'transaction_reverted')).toMatchObject({
      level: 'error',
      data: { txHash: TX_HASH, functionName: 'transfer', reason: 'Out of funds' }
    })
  })

  it('reports N/A when the replay yields no reason', async () => {
    receiptProcessor = fakeReceiptProcessor({ status: '0x0' })
    rpc.call.mockResolvedValueOnce({ result: '0x' })

    await expect(executor().execute(request())).rejects.toMatchObject({ reason: 'N/A' })
  })

  it('replays at the latest block when the receipt has no block number', async () => {
    receiptProcessor = fakeReceiptProcessor({ status: '0x0', blockNumber: undefined })

    await expect(executor().execute(request())).rejects.toThrow(RevertedTransactionError)
    expect(rpc.call).toHaveBeenCalledWith(expect.anything(), 'latest')
  })

  it('does not check the status of synthetic receipts', async () => {
    receiptProcessor.waitForReceipt.mockImplementation(async hash => emptyTransactionReceipt(hash))

    const receipt = await executor().execute(request())

    expect(receipt.synthetic).toBe(true)
    expect(rpc.call).not.toHaveBeenCalled()
    expect(events.find(e => e.type === 'transaction_confirmed')).toMatchObject({ data: { synthetic: true } })
  })

  it('turns RPC errors during submission into transaction errors', async () => {
    transactionManager.sendLegacy.mockRejectedValueOnce(new RpcProtocolError({ code: -32000, message: 'insufficient funds' }))

    const failure = executor().execute(request())

    await expect(failure).rejects.toThrow(TransactionError)
    await expect(failure).rejects.toThrow('-32000: insufficient funds')
    expect(receiptProcessor.waitForReceipt).not.toHaveBeenCalled()
  })

  it('uses the RPC error data as the message when present', async () => {
    transactionManager.sendLegacy.mockRejectedValueOnce(new RpcProtocolError({ code: -32000, message: 'failed', data: 'nonce too low' }))

    await expect(executor().execute(request())).rejects.toThrow('nonce too low')
  })

  it('propagates receipt timeouts unchanged', async () => {
    const timeout = new TransactionError(`Transaction receipt was not generated after 600 seconds for transaction: ${TX_HASH}`)
    receiptProcessor.waitForReceipt.mockRejectedValueOnce(timeout)

    await expect(executor().execute(request())).rejects.toBe(timeout)
  })
})
