import chalk from 'chalk'
import { ContractEvent } from '../types/events'
import { ContractEventEmitter } from './emitter'

/**
 * Verbosity levels for filtering console output:
 * 0 (default): errors, warnings, deployments and verification results
 * 1 (-v): transaction submission and confirmation
 * 2 (-vv): read-only calls
 * 3 (-vvv): receipt polling and other debug output
 */
export type VerbosityLevel = 0 | 1 | 2 | 3

const EVENT_VERBOSITY: Record<ContractEvent['type'], VerbosityLevel> = {
  unhandled_rejection: 0,
  uncaught_exception: 0,
  cli_error: 0,
  contract_deployed: 0,
  bytecode_verified: 0,
  transaction_reverted: 0,
  call_reverted: 0,
  fee_market_fallback: 0,
  transaction_sent: 1,
  transaction_confirmed: 1,
  call_executed: 2,
  receipt_polling: 3,
  debug_info: 3
}

/**
 * CLI adapter that converts structured contract events into
 * formatted console output using chalk for colors.
 */
export class CLIEventAdapter {
  private emitter: ContractEventEmitter
  private verbosity: VerbosityLevel
  private readonly listener = (event: ContractEvent) => this.handleEvent(event)

  constructor(emitter: ContractEventEmitter, verbosity: VerbosityLevel = 0) {
    this.emitter = emitter
    this.verbosity = verbosity
    this.emitter.onAnyEvent(this.listener)
  }

  /**
   * Updates the verbosity level for this adapter.
   */
  setVerbosity(verbosity: VerbosityLevel): void {
    this.verbosity = verbosity
  }

  private handleEvent(event: ContractEvent): void {
    if (this.verbosity < EVENT_VERBOSITY[event.type]) {
      return
    }
    switch (event.type) {
      case 'call_executed':
        console.log(chalk.gray(`  call ${event.data.functionName} on ${event.data.to} @ ${event.data.blockTag} -> ${event.data.resultPreview}`))
        break

      case 'call_reverted':
        console.warn(chalk.yellow(`  call ${event.data.functionName} on ${event.data.to} reverted: ${event.data.reason}`))
        break

      case 'transaction_sent':
        console.log(chalk.gray(`  to: ${event.data.to}, value: ${event.data.value}, data: ${event.data.dataPreview}...`))
        console.log(chalk.gray(`  ${event.data.functionName} (${event.data.pricing}) tx hash: ${event.data.txHash}`))
        break

      case 'fee_market_fallback':
        console.warn(chalk.yellow(`  Fee-market submission of ${event.data.functionName} not available on chain ${event.data.chainId}, using legacy pricing`))
        break

      case 'receipt_polling':
        console.log(chalk.gray(`  waiting for ${event.data.txHash} (${event.data.attempt}/${event.data.maxAttempts})`))
        break

      case 'transaction_confirmed':
        if (event.data.synthetic) {
          console.log(chalk.gray(`  tx ${event.data.txHash} submitted, not waiting for confirmation`))
        } else {
          console.log(chalk.gray(`  tx confirmed in block: ${event.data.blockNumber ?? 'unknown'}, gas used: ${event.data.gasUsed ?? 'unknown'}`))
        }
        break

      case 'transaction_reverted':
        console.error(chalk.red(`❌ ${event.data.functionName} reverted (status ${event.data.status}, gas used ${event.data.gasUsed}): ${event.data.reason}`))
        console.error(chalk.red(`   tx hash: ${event.data.txHash}`))
        break

      case 'contract_deployed':
        console.log(chalk.green(`✅ Contract deployed at ${event.data.contractAddress} (tx ${event.data.txHash})`))
        break

      case 'bytecode_verified':
        if (event.data.valid) {
          console.log(chalk.green(`✅ Code at ${event.data.address} matches the binary`))
        } else {
          console.log(chalk.yellow(`✗ Code at ${event.data.address} does not match the binary${event.data.reason ? `: ${event.data.reason}` : ''}`))
        }
        break

      case 'unhandled_rejection':
        console.error(chalk.red('Unhandled Rejection:'), event.data.reason)
        break

      case 'uncaught_exception':
        console.error(chalk.red('Uncaught Exception:'), event.data.error)
        break

      case 'cli_error':
        console.error(chalk.red('Error:'), event.data.message)
        break

      case 'debug_info': {
        const levelColor = event.level === 'warn' ? chalk.yellow :
                          event.level === 'info' ? chalk.blue :
                          chalk.gray
        console.log(levelColor(`  [${event.level.toUpperCase()}] ${event.data.message}`))
        break
      }
    }
  }

  /**
   * Stop listening to events (cleanup method).
   */
  public destroy(): void {
    this.emitter.off('event', this.listener)
  }
}
