import {
  CallRevertedError,
  RevertedTransactionError,
  RpcProtocolError,
  TransactionError,
  describeRpcError,
  toRpcErrorPayload
} from '../errors'

describe('errors', () => {
  it('formats call reverts with a placeholder for missing reasons', () => {
    expect(new CallRevertedError('Out of funds').message).toBe(
      "Contract Call has been reverted by the EVM with the reason: 'Out of funds'."
    )
    expect(new CallRevertedError(undefined).message).toBe(
      "Contract Call has been reverted by the EVM with the reason: 'N/A'."
    )
  })

  it('reports status, gas and reason of reverted transactions', () => {
    const error = new RevertedTransactionError(
      { transactionHash: '0xabc', synthetic: false, status: '0x0', gasUsed: 21_000n, logs: [] },
      'Out of funds'
    )

    expect(error).toBeInstanceOf(TransactionError)
    expect(error.name).toBe('RevertedTransactionError')
    expect(error.message).toBe("Transaction 0xabc has failed with status: 0x0. Gas used: 21000. Revert reason: 'Out of funds'.")
    expect(error.transactionHash).toBe('0xabc')
  })

  it('reports unknown status and gas when the receipt lacks them', () => {
    const error = new RevertedTransactionError({ transactionHash: '0xabc', synthetic: false, logs: [] }, 'N/A')

    expect(error.status).toBe('unknown')
    expect(error.gasUsed).toBe('unknown')
  })

  it('prefixes RPC protocol errors with their code', () => {
    const error = new RpcProtocolError({ code: -32000, message: 'nonce too low' })

    expect(error.message).toBe('-32000: nonce too low')
    expect(error.payload).toEqual({ code: -32000, message: 'nonce too low' })
  })

  describe('toRpcErrorPayload', () => {
    it('reads the payload ethers keeps under info.error', () => {
      const error = { code: 'CALL_EXCEPTION', info: { error: { code: 3, message: 'execution reverted', data: '0x08c379a0' } } }

      expect(toRpcErrorPayload(error)).toEqual({ code: 3, message: 'execution reverted', data: '0x08c379a0' })
    })

    it('reads a payload under error', () => {
      expect(toRpcErrorPayload({ error: { code: -32000, message: 'failed', data: null } })).toEqual({ code: -32000, message: 'failed' })
    })

    it('passes RpcProtocolError payloads through', () => {
      expect(toRpcErrorPayload(new RpcProtocolError({ code: -32601, message: 'method not found' }))).toEqual({
        code: -32601,
        message: 'method not found'
      })
    })

    it('returns undefined for errors without a JSON-RPC payload', () => {
      expect(toRpcErrorPayload(new Error('socket hang up'))).toBeUndefined()
      expect(toRpcErrorPayload('boom')).toBeUndefined()
    })
  })

  it('describes RPC errors by their data when present', () => {
    expect(describeRpcError({ code: -32000, message: 'failed', data: 'insufficient funds' })).toBe('insufficient funds')
    expect(describeRpcError({ code: -32000, message: 'failed', data: { gas: 1 } })).toBe('{"gas":1}')
    expect(describeRpcError({ code: -32000, message: 'failed' })).toBe('-32000: failed')
  })
})
