import { ethers } from 'ethers'
import { ConversionError } from '../../errors'
import {
  ERROR_METHOD_ID,
  OFFCHAIN_LOOKUP_SELECTOR,
  decodeRevert,
  getRevertReason,
  getRevertReasonEncodedData,
  isOffchainLookup,
  isReverted
} from '../decoder'

function errorString(reason: string): string {
  return ERROR_METHOD_ID + ethers.AbiCoder.defaultAbiCoder().encode(['string'], [reason]).slice(2)
}

describe('revert decoder', () => {
  describe('isReverted', () => {
    it('treats Error(string) return data as a revert', () => {
      expect(isReverted({ result: errorString('Out of funds') })).toBe(true)
    })

    it('treats ordinary return data as success', () => {
      expect(isReverted({ result: '0x' + '00'.repeat(31) + '01' })).toBe(false)
      expect(isReverted({ result: '0x' })).toBe(false)
      expect(isReverted({})).toBe(false)
    })

    it('treats any RPC error as a revert', () => {
      expect(isReverted({ error: { code: -32000, message: 'out of gas' } })).toBe(true)
      expect(isReverted({ error: { code: 3, message: 'execution reverted' } })).toBe(true)
    })

    it('treats execution-reverted errors carrying data as reverts', () => {
      expect(isReverted({ error: { code: 3, message: 'execution reverted', data: errorString('nope') } })).toBe(true)
    })

    it('does not treat off-chain lookups as reverts', () => {
      const data = OFFCHAIN_LOOKUP_SELECTOR + '00'.repeat(64)
      expect(isReverted({ error: { code: 3, message: 'execution reverted', data } })).toBe(false)
    })

    it('does not treat a bare off-chain lookup selector as a revert', () => {
      expect(isReverted({ error: { code: 3, message: 'execution reverted', data: '0x556F1830' } })).toBe(false)
    })

    it('only honours off-chain lookups on the execution-reverted code', () => {
      const data = OFFCHAIN_LOOKUP_SELECTOR + '00'.repeat(64)
      expect(isReverted({ error: { code: -32000, message: 'failed', data } })).toBe(true)
    })
  })

  describe('isOffchainLookup', () => {
    it('matches the selector case-insensitively', () => {
      expect(isOffchainLookup('0x556F1830ab')).toBe(true)
      expect(isOffchainLookup('0x08c379a0')).toBe(false)
      expect(isOffchainLookup({ data: '0x556f1830' })).toBe(false)
    })
  })

  describe('getRevertReason', () => {
    it('decodes the Error(string) payload', () => {
      expect(getRevertReason({ result: errorString('Out of funds') })).toBe('Out of funds')
    })

    it('returns the node message for RPC errors', () => {
      expect(getRevertReason({ error: { code: -32000, message: 'insufficient funds for gas' } })).toBe('insufficient funds for gas')
    })

    it('returns undefined when there is nothing to report', () => {
      expect(getRevertReason({ result: '0x01' })).toBeUndefined()
    })

    it('raises a conversion error when the payload does not decode', () => {
      expect(() => getRevertReason({ result: ERROR_METHOD_ID + 'ff' })).toThrow(ConversionError)
      expect(() => getRevertReason({ result: ERROR_METHOD_ID + 'ff', error: { code: 3, message: 'execution reverted' } })).toThrow(
        /^Unable to decode Error\(string\) revert payload: /
      )
    })
  })

  describe('getRevertReasonEncodedData', () => {
    it('returns string error data unchanged', () => {
      const data = errorString('nope')
      expect(getRevertReasonEncodedData({ error: { code: 3, message: 'execution reverted', data } })).toBe(data)
    })

    it('serialises structured error data as JSON', () => {
      expect(getRevertReasonEncodedData({ error: { code: -32000, message: 'failed', data: { reason: 'x' } } })).toBe('{"reason":"x"}')
    })

    it('returns undefined without error data', () => {
      expect(getRevertReasonEncodedData({ error: { code: -32000, message: 'failed' } })).toBeUndefined()
      expect(getRevertReasonEncodedData({ result: '0x' })).toBeUndefined()
    })
  })

  describe('decodeRevert', () => {
    it('classifies each kind of response', () => {
      expect(decodeRevert({ result: '0x01' })).toEqual({ kind: 'none', reverted: false, reason: undefined, encodedData: undefined })
      expect(decodeRevert({ result: errorString('Out of funds') })).toEqual({
        kind: 'abi-revert',
        reverted: true,
        reason: 'Out of funds',
        encodedData: undefined
      })
      expect(decodeRevert({ error: { code: -32000, message: 'failed' } })).toEqual({
        kind: 'rpc-error',
        reverted: true,
        reason: 'failed',
        encodedData: undefined
      })
      expect(decodeRevert({ error: { code: 3, message: 'execution reverted', data: '0x556f1830' } })).toEqual({
        kind: 'offchain-lookup',
        reverted: false,
        reason: 'execution reverted',
        encodedData: '0x556f1830'
      })
    })
  })
})
