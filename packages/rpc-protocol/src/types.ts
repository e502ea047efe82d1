/**
 * Message types for the msgpack-RPC protocol.
 *
 * Wire format (one msgpack value per frame, no extra framing):
 * ┌──────────────┬──────────────────────────────────────────┐
 * │ Request      │ [0, id: uint32, method: string, params]  │
 * │ Response     │ [1, id: uint32, error | nil, result | nil]│
 * │ Notification │ [2, method: string, params]              │
 * └──────────────┴──────────────────────────────────────────┘
 */

import type { ExtData } from "@msgpack/msgpack";
import type { ExtensionType } from "./codec.ts";

// ============================================================================
// Message Kind Constants
// ============================================================================

export const MessageKind = {
  REQUEST: 0,
  RESPONSE: 1,
  NOTIFICATION: 2,
} as const;

export type MessageKind = (typeof MessageKind)[keyof typeof MessageKind];

/** Reverse lookup for message kind names */
export const MessageKindName: Record<number, string> = Object.fromEntries(
  Object.entries(MessageKind).map(([k, v]) => [v, k])
);

/** Largest request id before the allocator wraps back to 0 */
export const MAX_REQUEST_ID = 0xffffffff;

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCode = {
  // Correlation errors
  DUPLICATE_ID: 2001,
  RESPONSE_NOT_FOUND: 2002,

  // Lifecycle errors
  ALREADY_STARTED: 3001,
  CLIENT_DISPOSED: 3002,

  // Connection errors
  CONNECTION_TIMEOUT: 4001,
  TRANSPORT_CLOSED: 4002,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================================================
// Message Values
// ============================================================================

/**
 * A value that can travel inside a frame.
 *
 * Maps decode to plain objects; msgpack timestamps decode to `Date`;
 * extension types without a registered decoder stay as `ExtData`.
 */
export type MessageValue =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | Date
  | ExtData
  | ExtensionType
  | MessageValue[]
  | MessageMap;

export interface MessageMap {
  [key: string]: MessageValue;
}

// ============================================================================
// Messages
// ============================================================================

export interface RequestMessage {
  type: typeof MessageKind.REQUEST;
  id: number;
  method: string;
  params: MessageValue;
}

export interface ResponseMessage {
  type: typeof MessageKind.RESPONSE;
  id: number;
  error: MessageValue;
  result: MessageValue;
}

export interface NotificationMessage {
  type: typeof MessageKind.NOTIFICATION;
  method: string;
  params: MessageValue;
}

export type Message = RequestMessage | ResponseMessage | NotificationMessage;

/** Array form of a message as it is written to the transport. */
export type WireFrame =
  | [typeof MessageKind.REQUEST, number, string, MessageValue]
  | [typeof MessageKind.RESPONSE, number, MessageValue, MessageValue]
  | [typeof MessageKind.NOTIFICATION, string, MessageValue];

// ============================================================================
// Results
// ============================================================================

/**
 * Outcome of a call, on either side of the wire.
 */
export type RpcResult =
  | { ok: true; result: MessageValue }
  | { ok: false; error: MessageValue };

export function okResult(result: MessageValue): RpcResult {
  return { ok: true, result };
}

export function errResult(error: MessageValue): RpcResult {
  return { ok: false, error };
}

// ============================================================================
// Ownership
// ============================================================================

/**
 * Observes message ownership. Every message is acquired once, when it is
 * built for sending or accepted off the wire, and released once, when its
 * last owner is done with it.
 */
export interface FrameTracker {
  acquire(message: Message): void;
  release(message: Message): void;
}
