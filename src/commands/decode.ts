import { Command } from 'commander'
import chalk from 'chalk'
import { decodeRevert, isOffchainLookup } from '../lib/revert/decoder'
import { CallResponse } from '../lib/types'
import { validateHexData } from '../lib/utils/validation'
import { failCommand, setVerbosity, verbosityOption } from './common'

const OFFCHAIN_LOOKUP_NOTICE = 'Off-chain lookup request (EIP-3668): the call asks the client to fetch data and retry'

interface DecodeRevertOptions {
  message?: string
  code?: string
  verbose: number
}

/**
 * Rebuilds the `eth_call` response a node would have returned: return data on
 * its own, or an error object when an RPC error code is given.
 */
export function toCallResponse(data: string, options: { code?: string; message?: string }): CallResponse {
  if (options.code === undefined) {
    return { result: data }
  }
  const code = Number(options.code)
  if (!Number.isInteger(code)) {
    throw new Error(`Invalid RPC error code: ${options.code}`)
  }
  return { error: { code, message: options.message ?? 'execution reverted', data } }
}

export function makeDecodeRevertCommand(): Command {
  const decode = new Command('decode-revert')
    .description('Decode revert data returned by a contract call')
    .argument('<data>', 'Hex revert data, e.g. 0x08c379a0...')
    .option('--code <code>', 'Treat the data as the payload of a JSON-RPC error with this code (3 for execution reverted)')
    .option('--message <message>', 'Message of that JSON-RPC error')

  verbosityOption(decode)

  decode.action((data: string, options: DecodeRevertOptions) => {
    try {
      setVerbosity(options.verbose)
      const hex = validateHexData(data, 'data')

      if (options.code === undefined && isOffchainLookup(hex)) {
        console.log(chalk.yellow(OFFCHAIN_LOOKUP_NOTICE))
        return
      }

      const outcome = decodeRevert(toCallResponse(hex, options))
      switch (outcome.kind) {
        case 'none':
          console.log(chalk.yellow('Not a revert: data does not start with Error(string)'))
          break
        case 'offchain-lookup':
          console.log(chalk.yellow(OFFCHAIN_LOOKUP_NOTICE))
          break
        default:
          console.log(outcome.reason ?? 'N/A')
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return decode
}
