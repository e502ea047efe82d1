/**
 * MessagePack codec with the editor handle extension types.
 */

import { encode, decode, decodeMultiStream, ExtensionCodec } from "@msgpack/msgpack";
import type { Message } from "./types.ts";
import { toWire } from "./framing.ts";

// ============================================================================
// Custom Extension Types
// ============================================================================

/**
 * Extension type codes used by editor hosts for remote object handles.
 */
export const ExtType = {
  /** Handle of an editor buffer */
  BUFFER: 0,
  /** Handle of an editor window */
  WINDOW: 1,
  /** Handle of an editor tab page */
  TABPAGE: 2,
} as const;

export type ExtType = (typeof ExtType)[keyof typeof ExtType];

/**
 * Represents a reference to a remote buffer.
 */
export interface BufferRef {
  __type: "BufferRef";
  handle: number;
}

/**
 * Represents a reference to a remote window.
 */
export interface WindowRef {
  __type: "WindowRef";
  handle: number;
}

/**
 * Represents a reference to a remote tab page.
 */
export interface TabpageRef {
  __type: "TabpageRef";
  handle: number;
}

export type ExtensionType = BufferRef | WindowRef | TabpageRef;

type HandleTag = ExtensionType["__type"];

// ============================================================================
// Extension Codec Setup
// ============================================================================

function isHandleRef(value: unknown, tag: HandleTag): value is ExtensionType {
  return (
    typeof value === "object" &&
    value !== null &&
    "__type" in value &&
    value.__type === tag &&
    "handle" in value &&
    typeof value.handle === "number"
  );
}

function decodeHandle(data: Uint8Array, tag: HandleTag): number {
  const handle = decode(data);
  if (typeof handle !== "number") {
    throw new TypeError(`${tag} payload must be an integer handle`);
  }
  return handle;
}

/**
 * Create the extension codec for editor handles.
 */
export function createExtensionCodec(): ExtensionCodec {
  const extensionCodec = new ExtensionCodec();

  extensionCodec.register({
    type: ExtType.BUFFER,
    encode: (value: unknown): Uint8Array | null =>
      isHandleRef(value, "BufferRef") ? encode(value.handle) : null,
    decode: (data: Uint8Array): BufferRef =>
      createBufferRef(decodeHandle(data, "BufferRef")),
  });

  extensionCodec.register({
    type: ExtType.WINDOW,
    encode: (value: unknown): Uint8Array | null =>
      isHandleRef(value, "WindowRef") ? encode(value.handle) : null,
    decode: (data: Uint8Array): WindowRef =>
      createWindowRef(decodeHandle(data, "WindowRef")),
  });

  extensionCodec.register({
    type: ExtType.TABPAGE,
    encode: (value: unknown): Uint8Array | null =>
      isHandleRef(value, "TabpageRef") ? encode(value.handle) : null,
    decode: (data: Uint8Array): TabpageRef =>
      createTabpageRef(decodeHandle(data, "TabpageRef")),
  });

  return extensionCodec;
}

// Singleton extension codec instance
export const defaultExtensionCodec = createExtensionCodec();

// ============================================================================
// Encoding/Decoding Functions
// ============================================================================

/**
 * Encode a message as one msgpack array.
 */
export function encodeMessage(
  message: Message,
  extensionCodec: ExtensionCodec = defaultExtensionCodec
): Uint8Array {
  return encode(toWire(message), { extensionCodec });
}

/**
 * Encode any value to MessagePack bytes.
 */
export function encodeValue(
  value: unknown,
  extensionCodec: ExtensionCodec = defaultExtensionCodec
): Uint8Array {
  return encode(value, { extensionCodec });
}

/**
 * Decode MessagePack bytes to any value.
 */
export function decodeValue(
  data: Uint8Array,
  extensionCodec: ExtensionCodec = defaultExtensionCodec
): unknown {
  return decode(data, { extensionCodec });
}

/**
 * Decode consecutive msgpack values from a stream of byte chunks.
 * Value boundaries are the frame boundaries; values may span chunks.
 */
export function decodeValueStream(
  chunks: AsyncIterable<Uint8Array>,
  extensionCodec: ExtensionCodec = defaultExtensionCodec
): AsyncGenerator<unknown, void, unknown> {
  return decodeMultiStream(chunks, { extensionCodec });
}

// ============================================================================
// Helper Functions for Creating Extension Types
// ============================================================================

export function createBufferRef(handle: number): BufferRef {
  return { __type: "BufferRef", handle };
}

export function createWindowRef(handle: number): WindowRef {
  return { __type: "WindowRef", handle };
}

export function createTabpageRef(handle: number): TabpageRef {
  return { __type: "TabpageRef", handle };
}
