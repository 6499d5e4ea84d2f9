import { Command } from 'commander'
import chalk from 'chalk'
import { ethers } from 'ethers'
import { encodeConstructorArgs } from '../lib/abi/codec'
import { ContractHandle } from '../lib/contracts/handle'
import { validateAmount } from '../lib/utils/validation'
import {
  ConnectionOptions,
  connect,
  dotenvOption,
  failCommand,
  loadDotenv,
  networkOptions,
  parseArguments,
  projectOption,
  readBinary,
  setVerbosity,
  signerOption,
  transactionOptions,
  verbosityOption
} from './common'
import { libraryOption, parseLinkReference } from './link'

interface DeployOptions extends ConnectionOptions {
  dotenv?: string
  verbose: number
  constructorSignature?: string
  library: string[]
  value?: string
  verify?: boolean
}

/**
 * Accepts `constructor(uint256 supply)` or just `(uint256 supply)`.
 */
export function parseConstructor(signature: string): ethers.ConstructorFragment {
  const trimmed = signature.trim()
  return ethers.ConstructorFragment.from(trimmed.startsWith('constructor') ? trimmed : `constructor${trimmed}`)
}

export function makeDeployCommand(): Command {
  const deploy = new Command('deploy')
    .description('Deploy contract bytecode, optionally linking libraries and encoding constructor arguments')
    .argument('<binary>', 'Bytecode as hex, a .bin file, or a compiler artifact JSON')
    .argument('[args...]', 'Constructor arguments. Arrays and tuples are given as JSON.')
    .option('-c, --constructor-signature <signature>', 'Constructor signature, e.g. "constructor(uint256 supply)"')
    .option('--value <wei>', 'Wei to send to the constructor', '0')
    .option('--verify', 'Check the deployed code against the binary afterwards', false)

  projectOption(deploy)
  dotenvOption(deploy)
  networkOptions(deploy)
  signerOption(deploy)
  transactionOptions(deploy)
  libraryOption(deploy)
  verbosityOption(deploy)

  deploy.action(async (binary: string, args: string[], options: DeployOptions) => {
    try {
      loadDotenv(options)
      setVerbosity(Math.max(1, options.verbose))

      if (options.wait === false) {
        throw new Error('The contract address comes from the deployment receipt; --no-wait cannot be used with deploy')
      }

      let encodedConstructor = ''
      if (options.constructorSignature) {
        const fragment = parseConstructor(options.constructorSignature)
        encodedConstructor = encodeConstructorArgs(fragment.inputs, parseArguments(fragment.inputs, args))
      } else if (args.length > 0) {
        throw new Error('Constructor arguments were given without a --constructor-signature')
      }

      const bytecode = await readBinary(binary)
      const connection = await connect(options, true)
      try {
        const contract = await ContractHandle.deploy(ContractHandle.create, {
          ...connection,
          binary: bytecode,
          encodedConstructor,
          value: validateAmount(options.value, 'value'),
          links: options.library.map(parseLinkReference)
        })
        console.log(contract.getContractAddress())

        if (options.verify && !(await contract.isValid())) {
          console.error(chalk.red('Deployed code does not match the binary'))
          process.exitCode = 1
        }
      } finally {
        connection.provider.destroy()
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return deploy
}
