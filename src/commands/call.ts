import { Command } from 'commander'
import chalk from 'chalk'
import { ethers } from 'ethers'
import { functionCall } from '../lib/abi/codec'
import { ContractHandle } from '../lib/contracts/handle'
import { BlockTag } from '../lib/types'
import { validateAmount } from '../lib/utils/validation'
import {
  ConnectionOptions,
  connect,
  dotenvOption,
  failCommand,
  formatValue,
  loadDotenv,
  networkOptions,
  parseArguments,
  projectOption,
  setVerbosity,
  signerOption,
  transactionOptions,
  verbosityOption
} from './common'

interface CallOptions extends ConnectionOptions {
  dotenv?: string
  verbose: number
  block?: string
  raw?: boolean
}

interface SendOptions extends ConnectionOptions {
  dotenv?: string
  verbose: number
  value?: string
}

const NAMED_BLOCK_TAGS = ['latest', 'earliest', 'pending', 'safe', 'finalized'] as const

function parseBlockTag(value: string): BlockTag {
  const named = NAMED_BLOCK_TAGS.find(tag => tag === value)
  if (named) return named
  if (/^\d+$/.test(value) || /^0x[0-9a-fA-F]+$/.test(value)) return BigInt(value)
  throw new Error(`Invalid block: ${value}. Use a block number or one of ${NAMED_BLOCK_TAGS.join(', ')}`)
}

export function makeCallCommand(): Command {
  const call = new Command('call')
    .description('Call a read-only contract function and print its return values')
    .argument('<address>', 'Contract address or name')
    .argument('<signature>', 'Function signature, e.g. "balanceOf(address owner) returns (uint256)"')
    .argument('[args...]', 'Function arguments. Arrays and tuples are given as JSON.')
    .option('-b, --block <block>', 'Block number or tag to read at', 'latest')
    .option('--raw', 'Print the undecoded return data', false)

  projectOption(call)
  dotenvOption(call)
  networkOptions(call)
  signerOption(call)
  verbosityOption(call)

  call.action(async (address: string, signature: string, args: string[], options: CallOptions) => {
    try {
      loadDotenv(options)
      setVerbosity(options.verbose)

      const fragment = ethers.FunctionFragment.from(signature)
      const request = functionCall(fragment, parseArguments(fragment.inputs, args))
      const connection = await connect(options, false)
      try {
        const contract = await ContractHandle.load(ContractHandle.create, { ...connection, address })
        contract.setDefaultBlockTag(parseBlockTag(options.block ?? 'latest'))

        if (options.raw) {
          console.log((await contract.executeCallWithoutDecoding(request)) ?? '0x')
          return
        }
        const values = await contract.executeCallMultipleValueReturn(request)
        if (values.length === 0) {
          console.log(chalk.yellow('No return values'))
          return
        }
        for (const { type, value } of values) {
          console.log(`${chalk.gray(type.format('full'))}: ${formatValue(value)}`)
        }
      } finally {
        connection.provider.destroy()
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return call
}

export function makeSendCommand(): Command {
  const send = new Command('send')
    .description('Submit a transaction calling a contract function and wait for its receipt')
    .argument('<address>', 'Contract address or name')
    .argument('<signature>', 'Function signature, e.g. "transfer(address to, uint256 amount)"')
    .argument('[args...]', 'Function arguments. Arrays and tuples are given as JSON.')
    .option('--value <wei>', 'Wei to send with the transaction', '0')

  projectOption(send)
  dotenvOption(send)
  networkOptions(send)
  signerOption(send)
  transactionOptions(send)
  verbosityOption(send)

  send.action(async (address: string, signature: string, args: string[], options: SendOptions) => {
    try {
      loadDotenv(options)
      // Transaction progress is shown at -v and above; make it the floor for send
      setVerbosity(Math.max(1, options.verbose))

      const fragment = ethers.FunctionFragment.from(signature)
      const request = functionCall(fragment, parseArguments(fragment.inputs, args))
      const value = validateAmount(options.value, 'value')
      const connection = await connect(options, true)
      try {
        const contract = await ContractHandle.load(ContractHandle.create, { ...connection, address })
        const receipt = await contract.executeTransaction(request, value)
        console.log(receipt.transactionHash)
      } finally {
        connection.provider.destroy()
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return send
}
