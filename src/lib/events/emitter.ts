import { EventEmitter } from 'events'
import { ContractEvent, ContractEventInput } from '../types/events'

/**
 * Type-safe event emitter for contract interaction events.
 * Extends Node.js EventEmitter with typed event methods.
 */
export class ContractEventEmitter extends EventEmitter {
  /**
   * Emits an event with automatic timestamp injection.
   */
  public emitEvent(event: ContractEventInput): void {
    const fullEvent = {
      ...event,
      timestamp: new Date()
    }

    // Emit on both the specific event type and a general 'event' channel
    this.emit(event.type, fullEvent)
    this.emit('event', fullEvent)
  }

  /**
   * Type-safe event listener registration.
   */
  public onEvent<T extends ContractEvent['type']>(
    eventType: T,
    listener: (event: Extract<ContractEvent, { type: T }>) => void
  ): this {
    return this.on(eventType, listener)
  }

  /**
   * Listen to all events.
   */
  public onAnyEvent(listener: (event: ContractEvent) => void): this {
    return this.on('event', listener)
  }

  /**
   * One-time event listener.
   */
  public onceEvent<T extends ContractEvent['type']>(
    eventType: T,
    listener: (event: Extract<ContractEvent, { type: T }>) => void
  ): this {
    return this.once(eventType, listener)
  }

  /**
   * Remove event listener.
   */
  public offEvent<T extends ContractEvent['type']>(
    eventType: T,
    listener: (event: Extract<ContractEvent, { type: T }>) => void
  ): this {
    return this.off(eventType, listener)
  }
}

// Singleton instance for global access
export const contractEvents = new ContractEventEmitter()
