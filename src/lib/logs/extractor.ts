import { ethers } from 'ethers'
import { AbiValue, decodeIndexedValue, decodeReturn, eventSignatureHash } from '../abi/codec'
import { ConversionError } from '../errors'
import { Log, TransactionReceipt } from '../types'

export interface EventValues {
  indexedValues: AbiValue[]
  nonIndexedValues: AbiValue[]
}

export interface EventValuesWithLog extends EventValues {
  log: Log
}

/**
 * Decodes `log` as an occurrence of `event`, or returns undefined when the
 * log's first topic is not the event's signature hash.
 */
export function staticExtractEventParameters(event: ethers.EventFragment, log: Log): EventValues | undefined {
  const { topics } = log
  if (topics.length === 0 || topics[0].toLowerCase() !== eventSignatureHash(event).toLowerCase()) {
    return undefined
  }

  const indexedParameters = event.inputs.filter(input => input.indexed === true)
  const nonIndexedParameters = event.inputs.filter(input => input.indexed !== true)

  const nonIndexedValues = decodeReturn(log.data, nonIndexedParameters)
  const indexedValues = indexedParameters.map((parameter, i) => {
    const topic = topics[i + 1]
    if (topic === undefined) {
      throw new ConversionError(`Log for event "${event.name}" has no topic for indexed parameter ${i} (${parameter.type})`)
    }
    return decodeIndexedValue(topic, parameter)
  })

  return { indexedValues, nonIndexedValues }
}

export function staticExtractEventParametersWithLog(event: ethers.EventFragment, log: Log): EventValuesWithLog | undefined {
  const values = staticExtractEventParameters(event, log)
  return values === undefined ? undefined : { ...values, log }
}

/**
 * All occurrences of `event` in a receipt, in log order.
 */
export function extractEventParametersFromReceipt(event: ethers.EventFragment, receipt: TransactionReceipt): EventValues[] {
  return receipt.logs
    .map(log => staticExtractEventParameters(event, log))
    .filter((values): values is EventValues => values !== undefined)
}

export function extractEventParametersWithLogFromReceipt(event: ethers.EventFragment, receipt: TransactionReceipt): EventValuesWithLog[] {
  return receipt.logs
    .map(log => staticExtractEventParametersWithLog(event, log))
    .filter((values): values is EventValuesWithLog => values !== undefined)
}
