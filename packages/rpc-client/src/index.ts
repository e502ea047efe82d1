/**
 * @packline/rpc-client
 *
 * msgpack-RPC client engine for pipes, sockets and stdio.
 */

export { RpcClient } from "./client.ts";
export { attach, connect } from "./connection.ts";
export { RpcClientError, ErrorCode } from "./errors.ts";
export { BufferedReader, BufferedWriter } from "./transport.ts";
export { okResult, errResult } from "@packline/rpc-protocol";
export type {
  Transport,
  HandlerContext,
  CallHandler,
  NotifyHandler,
  RpcLogger,
  ClientOptions,
  ConnectOptions,
  ClientState,
  ClientStats,
  SocketConnection,
  FrameTracker,
  MessageValue,
  RpcResult,
} from "./types.ts";
