import { AbiValue, FunctionCall, decodeReturn, encodeFunctionCall } from '../abi/codec'

/**
 * A deferred contract operation: nothing reaches the node until `send()`.
 * Each `send()` performs the operation again.
 */
export class RemoteCall<T> {
  constructor(private readonly callable: () => Promise<T>) {}

  send(): Promise<T> {
    return this.callable()
  }
}

/**
 * A deferred operation that also exposes the function call behind it, so
 * callers can obtain the payload or decode a result they fetched themselves.
 */
export class RemoteFunctionCall<T> extends RemoteCall<T> {
  constructor(public readonly call: FunctionCall, callable: () => Promise<T>) {
    super(callable)
  }

  encodeFunctionCall(): string {
    return encodeFunctionCall(this.call)
  }

  decodeFunctionResponse(data: string): AbiValue[] {
    return decodeReturn(data, this.call.fragment.outputs)
  }
}
