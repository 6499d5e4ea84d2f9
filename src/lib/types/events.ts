/**
 * Event system for structured logging of contract interactions.
 * Components emit these instead of writing to the console; adapters decide
 * how (and whether) to render them.
 */

export interface BaseEvent {
  type: string
  timestamp: Date
  level: 'info' | 'warn' | 'error' | 'debug'
}

export type PricingMode = 'legacy' | 'fee-market'

// Read-only calls
export interface CallExecutedEvent extends BaseEvent {
  type: 'call_executed'
  level: 'debug'
  data: {
    to: string
    functionName: string
    blockTag: string
    resultPreview: string
  }
}

export interface CallRevertedEvent extends BaseEvent {
  type: 'call_reverted'
  level: 'warn'
  data: {
    to: string
    functionName: string
    reason: string
  }
}

// Transaction lifecycle
export interface TransactionSentEvent extends BaseEvent {
  type: 'transaction_sent'
  level: 'info'
  data: {
    to: string
    value: string
    functionName: string
    pricing: PricingMode
    dataPreview: string
    txHash: string
  }
}

export interface FeeMarketFallbackEvent extends BaseEvent {
  type: 'fee_market_fallback'
  level: 'warn'
  data: {
    functionName: string
    chainId: string
  }
}

export interface ReceiptPollingEvent extends BaseEvent {
  type: 'receipt_polling'
  level: 'debug'
  data: {
    txHash: string
    attempt: number
    maxAttempts: number
  }
}

export interface TransactionConfirmedEvent extends BaseEvent {
  type: 'transaction_confirmed'
  level: 'info'
  data: {
    txHash: string
    blockNumber?: string
    gasUsed?: string
    synthetic: boolean
  }
}

export interface TransactionRevertedEvent extends BaseEvent {
  type: 'transaction_reverted'
  level: 'error'
  data: {
    txHash: string
    functionName: string
    status: string
    gasUsed: string
    reason: string
  }
}

// Deployment and verification
export interface ContractDeployedEvent extends BaseEvent {
  type: 'contract_deployed'
  level: 'info'
  data: {
    contractAddress: string
    txHash: string
    blockNumber?: string
  }
}

export interface BytecodeVerifiedEvent extends BaseEvent {
  type: 'bytecode_verified'
  level: 'info' | 'warn'
  data: {
    address: string
    valid: boolean
    reason?: string
  }
}

// CLI and process-level events
export interface UnhandledRejectionEvent extends BaseEvent {
  type: 'unhandled_rejection'
  level: 'error'
  data: {
    reason: unknown
  }
}

export interface UncaughtExceptionEvent extends BaseEvent {
  type: 'uncaught_exception'
  level: 'error'
  data: {
    error: unknown
  }
}

export interface CLIErrorEvent extends BaseEvent {
  type: 'cli_error'
  level: 'error'
  data: {
    message: string
  }
}

export interface DebugInfoEvent extends BaseEvent {
  type: 'debug_info'
  level: 'debug' | 'info' | 'warn'
  data: {
    message: string
  }
}

// Union type of all events
export type ContractEvent =
  | CallExecutedEvent
  | CallRevertedEvent
  | TransactionSentEvent
  | FeeMarketFallbackEvent
  | ReceiptPollingEvent
  | TransactionConfirmedEvent
  | TransactionRevertedEvent
  | ContractDeployedEvent
  | BytecodeVerifiedEvent
  | UnhandledRejectionEvent
  | UncaughtExceptionEvent
  | CLIErrorEvent
  | DebugInfoEvent

/**
 * An event as handed to `emitEvent`: the timestamp is filled in by the emitter.
 * Distributes over the union so each variant keeps its own `data` shape.
 */
type WithoutTimestamp<E> = E extends BaseEvent ? Omit<E, 'timestamp'> : never

export type ContractEventInput = WithoutTimestamp<ContractEvent>
