import { ErrorCode } from "@packline/rpc-protocol";

/**
 * Error surfaced to the immediate caller of a client operation.
 */
export class RpcClientError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RpcClientError";
    this.code = code;
  }
}

export { ErrorCode };
