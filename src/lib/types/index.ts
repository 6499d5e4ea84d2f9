export * from './events'
export * from './network'
export * from './receipts'
export * from './transport'
