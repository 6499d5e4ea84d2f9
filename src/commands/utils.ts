import { Command } from 'commander'
import chalk from 'chalk'
import { failCommand, projectOption, setVerbosity, verbosityOption } from './common'
import { gasStrategyForNetwork, loadNetworks } from '../lib/network-loader'
import { Network } from '../lib/types'

interface UtilsOptions {
  project: string
  verbose: number
}

interface NetworksOptions extends UtilsOptions {
  onlyTestnets?: boolean
  onlyNonTestnets?: boolean
  simple?: boolean
}

export function describePricing(network: Network): string {
  const strategy = gasStrategyForNetwork(network)
  const limit = typeof strategy.gasLimit === 'bigint' ? strategy.gasLimit.toString() : 'estimated'
  switch (strategy.kind) {
    case 'legacy':
      return `legacy, gas price ${strategy.gasPrice} wei, gas limit ${limit}`
    case 'fee-market':
      return `fee-market, max fee ${strategy.maxFeePerGas} wei, priority fee ${strategy.maxPriorityFeePerGas} wei, gas limit ${limit}`
  }
}

export function makeUtilsCommand(): Command {
  const utils = new Command('utils')
    .description('Utility commands for network configuration')

  const chainIdToName = new Command('chain-id-to-name')
    .description('Convert a chain ID to network name')
  projectOption(chainIdToName)
  verbosityOption(chainIdToName)

  chainIdToName.argument('<chain-id>', 'The chain ID to convert')
  chainIdToName.action(async (chainId: string, options: UtilsOptions) => {
    try {
      setVerbosity(options.verbose)

      const chainIdNumber = parseInt(chainId, 10)
      if (isNaN(chainIdNumber)) {
        throw new Error('Invalid chain ID. Please provide a valid number.')
      }

      const networks = await loadNetworks(options.project)
      const network = networks.find(n => n.chainId === chainIdNumber)
      if (!network) {
        throw new Error(`No network found with chain ID ${chainIdNumber}`)
      }
      console.log(network.name)
    } catch (error) {
      failCommand(error)
    }
  })

  utils.addCommand(chainIdToName)

  const listNetworks = new Command('networks')
    .description('List all configured networks and how their transactions are priced')
  projectOption(listNetworks)
  verbosityOption(listNetworks)
  listNetworks.option('--only-testnets', 'Show only test networks')
  listNetworks.option('--only-non-testnets', 'Show only non-test networks')
  listNetworks.option('--simple', 'Output only network names, one per line')
  listNetworks.action(async (options: NetworksOptions) => {
    try {
      setVerbosity(options.verbose)
      const networks = await loadNetworks(options.project)

      let filteredNetworks = networks
      if (options.onlyTestnets) {
        filteredNetworks = networks.filter(network => network.testnet === true)
      } else if (options.onlyNonTestnets) {
        filteredNetworks = networks.filter(network => network.testnet !== true)
      }

      if (options.simple) {
        console.log(filteredNetworks.map(network => network.name).join('\n'))
        return
      }

      console.log(chalk.bold.underline('Available Networks:'))
      if (filteredNetworks.length === 0) {
        console.log(chalk.yellow('No networks configured. Create a networks.yaml file in your project root.'))
        return
      }
      for (const network of filteredNetworks) {
        const testnetIndicator = network.testnet ? chalk.green('(testnet)') : ''
        console.log(`- ${chalk.cyan(network.name)} (Chain ID: ${network.chainId}) ${testnetIndicator}`)
        console.log(`  ${chalk.gray(`RPC: ${network.rpcUrl}`)}`)
        console.log(`  ${chalk.gray(`Pricing: ${describePricing(network)}`)}`)
      }
    } catch (error) {
      failCommand(error)
    }
  })

  utils.addCommand(listNetworks)

  return utils
}
