import { Command } from 'commander'
import * as fs from 'fs/promises'
import * as path from 'path'
import { LinkReference, linkBinaryWithReferences } from '../lib/bytecode/linker'
import { validateAddress } from '../lib/utils/validation'
import { failCommand, readBinary, setVerbosity, verbosityOption } from './common'

interface LinkOptions {
  library: string[]
  output?: string
  verbose: number
}

/**
 * Parses `<source>:<library>=<address>`, e.g. `contracts/Math.sol:Math=0x...`.
 * The source may itself contain colons; the last one separates the library name.
 */
export function parseLinkReference(value: string): LinkReference {
  const eq = value.lastIndexOf('=')
  if (eq === -1) {
    throw new Error(`Invalid library "${value}". Expected <source>:<library>=<address>`)
  }
  const qualified = value.slice(0, eq)
  const colon = qualified.lastIndexOf(':')
  if (colon <= 0 || colon === qualified.length - 1) {
    throw new Error(`Invalid library "${value}". Expected <source>:<library>=<address>`)
  }
  return {
    source: qualified.slice(0, colon),
    libraryName: qualified.slice(colon + 1),
    address: validateAddress(value.slice(eq + 1), qualified)
  }
}

export const libraryOption = (cmd: Command): Command =>
  cmd.option(
    '-l, --library <source:name=address>',
    'Library to link, e.g. contracts/Math.sol:Math=0x... (repeatable)',
    (value: string, previous: string[]) => [...previous, value],
    []
  )

export function makeLinkCommand(): Command {
  const link = new Command('link')
    .description('Replace library placeholders in contract bytecode with deployed library addresses')
    .argument('<binary>', 'Bytecode as hex, a .bin file, or a compiler artifact JSON')
    .option('-o, --output <file>', 'Write the linked bytecode to a file instead of stdout')

  libraryOption(link)
  verbosityOption(link)

  link.action(async (binary: string, options: LinkOptions) => {
    try {
      setVerbosity(options.verbose)
      const references = options.library.map(parseLinkReference)
      const linked = linkBinaryWithReferences(await readBinary(binary), references)

      if (options.output) {
        await fs.writeFile(path.resolve(options.output), linked + '\n', 'utf-8')
      } else {
        console.log(linked)
      }
    } catch (error) {
      failCommand(error)
    }
  })

  return link
}
