// Types
export * from './types'

// Errors
export * from './errors'

// ABI encoding and decoding
export * from './abi/codec'

// Bytecode
export * from './bytecode/linker'
export * from './bytecode/verifier'

// Reverts and events
export * from './revert/decoder'
export * from './logs/extractor'

// Gas pricing
export * from './gas/strategy'

// Node access
export * from './transport/json-rpc'
export * from './transport/signer-manager'
export * from './transport/readonly-manager'
export * from './transport/receipt-processor'

// Contracts
export * from './contracts/executor'
export * from './contracts/remote-call'
export * from './contracts/handle'

// Events
export * from './events'

// Network configuration
export * from './network-loader'
export * from './network-selection'

// Utilities
export * from './utils/hex'
export * from './utils/validation'
