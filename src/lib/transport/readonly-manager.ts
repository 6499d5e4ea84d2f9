import { ethers } from 'ethers'
import { UnsupportedOperationError } from '../errors'
import { TransactionManager } from '../types'

/**
 * TransactionManager for handles that only read. Calls are made from
 * `fromAddress` (the zero address by default); submitting anything fails.
 */
export class ReadonlyTransactionManager implements TransactionManager {
  constructor(private readonly fromAddress: string = ethers.ZeroAddress) {}

  async getFromAddress(): Promise<string> {
    return this.fromAddress
  }

  async sendLegacy(): Promise<string> {
    throw new UnsupportedOperationError('Only read operations are supported by this transaction manager')
  }

  async sendFeeMarket(): Promise<string | undefined> {
    throw new UnsupportedOperationError('Only read operations are supported by this transaction manager')
  }
}
