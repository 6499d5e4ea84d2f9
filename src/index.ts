#!/usr/bin/env node

import { program } from 'commander'
import { setupCommands } from './cli'
import { setVerbosity } from './commands/common'
import { contractEvents } from './lib/events'
import packageJson from '../package.json'

// Render contract events on the console; commands raise the level with -v
setVerbosity(0)

// Setup global error handling
process.on('unhandledRejection', (reason) => {
  contractEvents.emitEvent({
    type: 'unhandled_rejection',
    level: 'error',
    data: {
      reason
    }
  })
  process.exit(1)
})

process.on('uncaughtException', (error) => {
  contractEvents.emitEvent({
    type: 'uncaught_exception',
    level: 'error',
    data: {
      error
    }
  })
  process.exit(1)
})

async function main() {
  try {
    program
      .name('contract-runtime')
      .description('Call, deploy, link and verify EVM smart contracts')
      .version(packageJson.version)

    setupCommands(program)

    await program.parseAsync(process.argv)
  } catch (error) {
    contractEvents.emitEvent({
      type: 'cli_error',
      level: 'error',
      data: {
        message: error instanceof Error ? error.message : String(error)
      }
    })
    process.exit(1)
  }
}

void main()
