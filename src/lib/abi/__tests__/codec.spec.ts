import { ethers } from 'ethers'
import {
  addressToString,
  decodeIndexedValue,
  decodeReturn,
  decodeRevertString,
  encodeConstructorArgs,
  encodeFunctionCall,
  functionCall,
  isHashedWhenIndexed,
  toNativeValues
} from '../codec'

const coder = ethers.AbiCoder.defaultAbiCoder()

describe('abi codec', () => {
  it('encodes the selector followed by the arguments', () => {
    const call = functionCall('function transfer(address to, uint256 amount)', ['0x2222222222222222222222222222222222222222', 10n])
    const encoded = encodeFunctionCall(call)

    expect(encoded.startsWith('0xa9059cbb')).toBe(true)
    expect(encoded).toBe('0xa9059cbb' + coder.encode(['address', 'uint256'], ['0x2222222222222222222222222222222222222222', 10n]).slice(2))
  })

  it('encodes calls without arguments as the bare selector', () => {
    expect(encodeFunctionCall(functionCall('function totalSupply() view returns (uint256)'))).toBe('0x18160ddd')
  })

  it('rejects a wrong number of arguments', () => {
    expect(() => functionCall('function transfer(address to, uint256 amount)', [1n])).toThrow(
      'Function "transfer" expects 2 arguments, got 1'
    )
  })

  it('encodes constructor arguments without a selector', () => {
    expect(encodeConstructorArgs(['uint256'], [1n])).toBe('0x' + '00'.repeat(31) + '01')
  })

  it('decodes return data against the declared outputs', () => {
    const fragment = ethers.FunctionFragment.from('function info() view returns (uint256 id, bool active, string label)')
    const data = coder.encode(['uint256', 'bool', 'string'], [5n, true, 'five'])
    const values = decodeReturn(data, fragment.outputs)

    expect(toNativeValues(values)).toEqual([5n, true, 'five'])
    expect(values.map(v => v.type.name)).toEqual(['id', 'active', 'label'])
  })

  it('decodes empty return data as no values', () => {
    const outputs = ethers.FunctionFragment.from('function f() view returns (uint256)').outputs
    expect(decodeReturn('0x', outputs)).toEqual([])
    expect(decodeReturn(undefined, outputs)).toEqual([])
    expect(decodeReturn('0x' + '00'.repeat(32), [])).toEqual([])
  })

  it('knows which indexed types are stored as hashes', () => {
    expect(isHashedWhenIndexed(ethers.ParamType.from('string'))).toBe(true)
    expect(isHashedWhenIndexed(ethers.ParamType.from('bytes'))).toBe(true)
    expect(isHashedWhenIndexed(ethers.ParamType.from('uint256[]'))).toBe(true)
    expect(isHashedWhenIndexed(ethers.ParamType.from('(uint256 a, bool b)'))).toBe(true)
    expect(isHashedWhenIndexed(ethers.ParamType.from('bytes32'))).toBe(false)
    expect(isHashedWhenIndexed(ethers.ParamType.from('address'))).toBe(false)
  })

  it('decodes static indexed values from their topic', () => {
    const topic = ethers.zeroPadValue('0x2a', 32)
    expect(decodeIndexedValue(topic, ethers.ParamType.from('uint256')).value).toBe(42n)
  })

  it('checksums addresses', () => {
    expect(addressToString('0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed')).toBe('0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed')
  })

  it('decodes Error(string) payloads', () => {
    expect(decodeRevertString(coder.encode(['string'], ['Out of funds']))).toBe('Out of funds')
  })
})
