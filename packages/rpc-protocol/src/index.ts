/**
 * @packline/rpc-protocol
 *
 * Message model, codec, and frame validation for msgpack-RPC.
 */

// Types and utilities
export * from "./types.ts";

// Codec
export {
  encodeMessage,
  encodeValue,
  decodeValue,
  decodeValueStream,
  createExtensionCodec,
  defaultExtensionCodec,
  createBufferRef,
  createWindowRef,
  createTabpageRef,
  ExtType,
  type BufferRef,
  type WindowRef,
  type TabpageRef,
  type ExtensionType,
} from "./codec.ts";

// Framing
export {
  createRequest,
  createResponse,
  createNotification,
  toWire,
  responseToResult,
  parseFrame,
  isMessageValue,
  getMessageKindName,
  type ParseResult,
} from "./framing.ts";

export type { ExtensionCodec } from "@msgpack/msgpack";
