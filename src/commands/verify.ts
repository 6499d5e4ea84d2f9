import { Command } from 'commander'
import { ContractHandle } from '../lib/contracts/handle'
import {
  ConnectionOptions,
  connect,
  dotenvOption,
  failCommand,
  loadDotenv,
  networkOptions,
  projectOption,
  readBinary,
  setVerbosity,
  verbosityOption
} from './common'
import { libraryOption, parseLinkReference } from './link'
import { linkBinaryWithReferences } from '../lib/bytecode/linker'

interface VerifyOptions extends ConnectionOptions {
  dotenv?: string
  verbose: number
  library: string[]
}

export function makeVerifyCommand(): Command {
  const verify = new Command('verify')
    .description('Check that the code deployed at an address was built from the given binary (ignoring compiler metadata)')
    .argument('<address>', 'Contract address or name')
    .argument('<binary>', 'Bytecode as hex, a .bin file, or a compiler artifact JSON')

  projectOption(verify)
  dotenvOption(verify)
  networkOptions(verify)
  libraryOption(verify)
  verbosityOption(verify)

  verify.action(async (address: string, binary: string, options: VerifyOptions) => {
    try {
      loadDotenv(options)
      setVerbosity(options.verbose)

      const bytecode = linkBinaryWithReferences(await readBinary(binary), options.library.map(parseLinkReference))
      const connection = await connect(options, false)
      try {
        const contract = await ContractHandle.load(ContractHandle.create, { ...connection, address, binary: bytecode })
        // The result is reported through the bytecode_verified event
        if (!(await contract.isValid())) {
          process.exitCode = 1
        }
      } finally {
        connection.provider.destroy()
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return verify
}
