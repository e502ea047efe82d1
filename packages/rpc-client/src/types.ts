/**
 * Types for the msgpack-RPC client.
 */

import type { Readable, Writable } from "node:stream";
import type {
  ExtensionCodec,
  FrameTracker,
  MessageValue,
  RpcResult,
} from "@packline/rpc-protocol";
import type { RpcClient } from "./client.ts";

export type { FrameTracker, MessageValue, RpcResult };

/**
 * A duplex byte stream split into its two halves. For a socket both halves
 * are the same object.
 */
export interface Transport {
  input: Readable;
  output: Writable;
}

/**
 * What a handler gets besides its params.
 */
export interface HandlerContext<U = undefined> {
  /** Method name the frame was routed by */
  method: string;
  /** Request id, for call handlers */
  id?: number;
  /** Value passed when the method was registered */
  userdata: U | undefined;
}

/**
 * Handles an inbound request. The returned result becomes the response.
 */
export type CallHandler<U = undefined> = (
  params: MessageValue,
  context: HandlerContext<U>
) => RpcResult | Promise<RpcResult>;

/**
 * Handles an inbound notification. Nothing is sent back.
 */
export type NotifyHandler<U = undefined> = (
  params: MessageValue,
  context: HandlerContext<U>
) => void | Promise<void>;

/**
 * Logger the client reports through. Defaults to `console`.
 */
export type RpcLogger = Pick<Console, "debug" | "info" | "warn" | "error">;

/**
 * Options for constructing a client.
 */
export interface ClientOptions {
  /** Bytes buffered per transport half before flushing or pausing (default: 4096) */
  bufferSize?: number;
  /** Longest the reader waits before re-checking whether it should stop, in ms (default: 10) */
  pollIntervalMs?: number;
  /** Maximum inbound handlers running at once (default: available parallelism) */
  maxConcurrentHandlers?: number;
  /** Where diagnostics go (default: console) */
  logger?: RpcLogger;
  /** Observes message acquire/release */
  tracker?: FrameTracker;
  /** Codec for msgpack extension types (default: editor handles) */
  extensionCodec?: ExtensionCodec;
}

/**
 * Options for connecting to a host over a socket.
 */
export interface ConnectOptions extends ClientOptions {
  /** Unix socket path */
  socket?: string;
  /** TCP host */
  host?: string;
  /** TCP port */
  port?: number;
  /** Connection timeout in ms */
  timeout?: number;
}

export type ClientState = "created" | "running" | "stopped" | "disposed";

/**
 * Snapshot of the client's internal structures.
 */
export interface ClientStats {
  state: ClientState;
  /** Calls waiting for their response */
  pendingCalls: number;
  /** Responses received but not yet claimed */
  bufferedResponses: number;
  /** Frames waiting for the writer */
  queuedFrames: number;
  /** Handler tasks running */
  activeHandlers: number;
  /** Handler tasks waiting for a pool slot */
  queuedHandlers: number;
  /** Bytes read from the transport but not yet decoded */
  bufferedBytes: number;
}

/**
 * A client bound to a socket it owns.
 */
export interface SocketConnection {
  client: RpcClient;
  /** Stop the client, close the socket and release everything */
  close(): Promise<void>;
}
