/**
 * Frame construction and validation for msgpack-RPC.
 *
 * A frame is a single msgpack array; there is no length prefix. Inbound
 * values are checked here before anything routes them.
 */

import { ExtData } from "@msgpack/msgpack";
import {
  MessageKind,
  MessageKindName,
  MAX_REQUEST_ID,
  type Message,
  type MessageValue,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage,
  type RpcResult,
  type WireFrame,
} from "./types.ts";

// ============================================================================
// Frame Building
// ============================================================================

/**
 * Build a request. `params` is moved into the message.
 */
export function createRequest(
  id: number,
  method: string,
  params: MessageValue
): RequestMessage {
  return { type: MessageKind.REQUEST, id, method, params };
}

/**
 * Build the response for a call outcome. Exactly one of the two slots
 * carries the outcome, the other is nil.
 */
export function createResponse(id: number, outcome: RpcResult): ResponseMessage {
  return outcome.ok
    ? { type: MessageKind.RESPONSE, id, error: null, result: outcome.result }
    : { type: MessageKind.RESPONSE, id, error: outcome.error, result: null };
}

/**
 * Build a notification. `params` is moved into the message.
 */
export function createNotification(
  method: string,
  params: MessageValue
): NotificationMessage {
  return { type: MessageKind.NOTIFICATION, method, params };
}

/**
 * Convert a message to the array shape written on the wire.
 */
export function toWire(message: Message): WireFrame {
  switch (message.type) {
    case MessageKind.REQUEST:
      return [MessageKind.REQUEST, message.id, message.method, message.params];
    case MessageKind.RESPONSE:
      return [MessageKind.RESPONSE, message.id, message.error, message.result];
    case MessageKind.NOTIFICATION:
      return [MessageKind.NOTIFICATION, message.method, message.params];
  }
}

/**
 * Turn a response into the caller-facing result. A non-nil error slot wins.
 */
export function responseToResult(response: ResponseMessage): RpcResult {
  if (response.error !== null) {
    return { ok: false, error: response.error };
  }
  return { ok: true, result: response.result };
}

// ============================================================================
// Frame Parsing
// ============================================================================

/**
 * Result of validating one decoded value.
 */
export type ParseResult =
  | { ok: true; message: Message }
  | { ok: false; reason: string };

/**
 * Check that a decoded value is something a frame may carry.
 */
export function isMessageValue(value: unknown): value is MessageValue {
  switch (typeof value) {
    case "boolean":
    case "number":
    case "string":
      return true;
    case "object":
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isMessageValue);
      if (
        value instanceof Uint8Array ||
        value instanceof Date ||
        value instanceof ExtData
      ) {
        return true;
      }
      return Object.values(value).every(isMessageValue);
    default:
      return false;
  }
}

function isRequestId(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_REQUEST_ID
  );
}

/**
 * Validate a decoded value as a frame.
 *
 * @returns The message, or the reason the value is not a frame
 */
export function parseFrame(value: unknown): ParseResult {
  if (!Array.isArray(value)) {
    return { ok: false, reason: `expected an array, got ${describe(value)}` };
  }
  if (value.length !== 3 && value.length !== 4) {
    return {
      ok: false,
      reason: `expected an array of length 3 or 4, got length ${value.length}`,
    };
  }

  const [kind, second, third, fourth] = value;

  switch (kind) {
    case MessageKind.REQUEST: {
      if (value.length !== 4) {
        return { ok: false, reason: "request must have 4 elements" };
      }
      if (!isRequestId(second)) {
        return { ok: false, reason: `invalid request id ${describe(second)}` };
      }
      if (typeof third !== "string") {
        return { ok: false, reason: `invalid method name ${describe(third)}` };
      }
      if (!isMessageValue(fourth)) {
        return { ok: false, reason: "request params are not a message value" };
      }
      return { ok: true, message: createRequest(second, third, fourth) };
    }

    case MessageKind.RESPONSE: {
      if (value.length !== 4) {
        return { ok: false, reason: "response must have 4 elements" };
      }
      if (!isRequestId(second)) {
        return { ok: false, reason: `invalid response id ${describe(second)}` };
      }
      if (!isMessageValue(third) || !isMessageValue(fourth)) {
        return { ok: false, reason: "response slots are not message values" };
      }
      return {
        ok: true,
        message: {
          type: MessageKind.RESPONSE,
          id: second,
          error: third,
          result: fourth,
        },
      };
    }

    case MessageKind.NOTIFICATION: {
      if (value.length !== 3) {
        return { ok: false, reason: "notification must have 3 elements" };
      }
      if (typeof second !== "string") {
        return { ok: false, reason: `invalid method name ${describe(second)}` };
      }
      if (!isMessageValue(third)) {
        return {
          ok: false,
          reason: "notification params are not a message value",
        };
      }
      return { ok: true, message: createNotification(second, third) };
    }

    default:
      return { ok: false, reason: `unknown message kind ${describe(kind)}` };
  }
}

function describe(value: unknown): string {
  if (value === null) return "nil";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "object") return "map";
  return String(value);
}

/**
 * Get the message kind name for debugging.
 */
export function getMessageKindName(kind: number): string {
  return MessageKindName[kind] ?? `Unknown(${kind})`;
}
