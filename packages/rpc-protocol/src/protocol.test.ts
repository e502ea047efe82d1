import { describe, it } from "node:test";
import assert from "node:assert";
import { ExtData } from "@msgpack/msgpack";
import {
  MessageKind,
  okResult,
  errResult,
  type ResponseMessage,
} from "./types.ts";
import {
  encodeMessage,
  encodeValue,
  decodeValue,
  decodeValueStream,
  createBufferRef,
  createWindowRef,
  createTabpageRef,
} from "./codec.ts";
import {
  createRequest,
  createResponse,
  createNotification,
  toWire,
  parseFrame,
  responseToResult,
  isMessageValue,
  getMessageKindName,
} from "./framing.ts";

async function* chunksOf(...chunks: Uint8Array[]): AsyncGenerator<Uint8Array> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

describe("codec", () => {
  it("should encode a notification as a 3-element array", () => {
    const bytes = encodeMessage(createNotification("ping", []));

    assert.deepStrictEqual(
      Array.from(bytes),
      [0x93, 0x02, 0xa4, 0x70, 0x69, 0x6e, 0x67, 0x90]
    );
  });

  it("should encode and decode a request", () => {
    const encoded = encodeMessage(createRequest(7, "nvim_eval", ["1 + 1"]));
    const decoded = decodeValue(encoded);

    assert.deepStrictEqual(decoded, [0, 7, "nvim_eval", ["1 + 1"]]);
  });

  it("should encode and decode messages with binary data", () => {
    const encoded = encodeMessage(
      createResponse(42, okResult({ body: new Uint8Array([1, 2, 3, 4, 5]) }))
    );
    const decoded = decodeValue(encoded);

    assert.deepStrictEqual(decoded, [
      MessageKind.RESPONSE,
      42,
      null,
      { body: new Uint8Array([1, 2, 3, 4, 5]) },
    ]);
  });

  it("should encode a buffer handle as fixext1 type 0", () => {
    assert.deepStrictEqual(
      Array.from(encodeValue(createBufferRef(5))),
      [0xd4, 0x00, 0x05]
    );
  });

  it("should encode and decode handle extension types", () => {
    const encoded = encodeValue([
      createBufferRef(1),
      createWindowRef(1000),
      createTabpageRef(2),
    ]);

    assert.deepStrictEqual(decodeValue(encoded), [
      { __type: "BufferRef", handle: 1 },
      { __type: "WindowRef", handle: 1000 },
      { __type: "TabpageRef", handle: 2 },
    ]);
  });

  it("should keep unknown extension types as ExtData", () => {
    const decoded = decodeValue(new Uint8Array([0xd4, 0x09, 0x01]));

    assert.ok(decoded instanceof ExtData);
    assert.strictEqual(decoded.type, 9);
    assert.deepStrictEqual(decoded.data, new Uint8Array([0x01]));
  });

  it("should decode values that span chunks", async () => {
    const first = encodeMessage(createNotification("a", [1]));
    const second = encodeMessage(createNotification("b", [2]));
    const joined = new Uint8Array([...first, ...second]);

    const values: unknown[] = [];
    for await (const value of decodeValueStream(
      chunksOf(joined.subarray(0, 3), joined.subarray(3, 9), joined.subarray(9))
    )) {
      values.push(value);
    }

    assert.deepStrictEqual(values, [
      [2, "a", [1]],
      [2, "b", [2]],
    ]);
  });
});

describe("framing", () => {
  it("should build responses with exactly one slot set", () => {
    assert.deepStrictEqual(toWire(createResponse(3, okResult("done"))), [
      MessageKind.RESPONSE,
      3,
      null,
      "done",
    ]);
    assert.deepStrictEqual(toWire(createResponse(4, errResult("boom"))), [
      MessageKind.RESPONSE,
      4,
      "boom",
      null,
    ]);
  });

  it("should parse a request", () => {
    const parsed = parseFrame([0, 12, "echo", ["hi"]]);

    assert.deepStrictEqual(parsed, {
      ok: true,
      message: {
        type: MessageKind.REQUEST,
        id: 12,
        method: "echo",
        params: ["hi"],
      },
    });
  });

  it("should parse a response", () => {
    const parsed = parseFrame([1, 12, null, { lines: ["a", "b"] }]);

    assert.deepStrictEqual(parsed, {
      ok: true,
      message: {
        type: MessageKind.RESPONSE,
        id: 12,
        error: null,
        result: { lines: ["a", "b"] },
      },
    });
  });

  it("should parse a notification", () => {
    const parsed = parseFrame([2, "redraw", [["flush"]]]);

    assert.deepStrictEqual(parsed, {
      ok: true,
      message: {
        type: MessageKind.NOTIFICATION,
        method: "redraw",
        params: [["flush"]],
      },
    });
  });

  it("should reject arrays of the wrong length", () => {
    assert.deepStrictEqual(parseFrame([2, "x"]), {
      ok: false,
      reason: "expected an array of length 3 or 4, got length 2",
    });
    assert.deepStrictEqual(parseFrame([0, 1, "x", [], "extra"]), {
      ok: false,
      reason: "expected an array of length 3 or 4, got length 5",
    });
  });

  it("should reject non-array values", () => {
    assert.deepStrictEqual(parseFrame({ kind: 0 }), {
      ok: false,
      reason: "expected an array, got map",
    });
    assert.deepStrictEqual(parseFrame(17), {
      ok: false,
      reason: "expected an array, got 17",
    });
  });

  it("should reject unknown kinds and bad fields", () => {
    assert.deepStrictEqual(parseFrame([3, "x", []]), {
      ok: false,
      reason: "unknown message kind 3",
    });
    assert.deepStrictEqual(parseFrame([0, -1, "x", []]), {
      ok: false,
      reason: "invalid request id -1",
    });
    assert.deepStrictEqual(parseFrame([0, 1, 5, []]), {
      ok: false,
      reason: "invalid method name 5",
    });
    assert.deepStrictEqual(parseFrame([2, null, []]), {
      ok: false,
      reason: "invalid method name nil",
    });
    assert.deepStrictEqual(parseFrame([0, 1, "x"]), {
      ok: false,
      reason: "request must have 4 elements",
    });
    assert.deepStrictEqual(parseFrame([2, "x", [], null]), {
      ok: false,
      reason: "notification must have 3 elements",
    });
  });

  it("should reject params that are not message values", () => {
    assert.deepStrictEqual(parseFrame([2, "x", [() => 1]]), {
      ok: false,
      reason: "notification params are not a message value",
    });
  });

  it("should convert responses to results", () => {
    const failed: ResponseMessage = {
      type: MessageKind.RESPONSE,
      id: 1,
      error: [0, "Invalid method"],
      result: null,
    };
    const succeeded: ResponseMessage = {
      type: MessageKind.RESPONSE,
      id: 2,
      error: null,
      result: null,
    };

    assert.deepStrictEqual(responseToResult(failed), {
      ok: false,
      error: [0, "Invalid method"],
    });
    assert.deepStrictEqual(responseToResult(succeeded), {
      ok: true,
      result: null,
    });
  });

  it("should validate nested message values", () => {
    assert.strictEqual(isMessageValue({ a: [1, "b", null, new Date(0)] }), true);
    assert.strictEqual(isMessageValue([undefined]), false);
    assert.strictEqual(isMessageValue({ big: 1n }), false);
  });

  it("should get message kind names", () => {
    assert.strictEqual(getMessageKindName(MessageKind.REQUEST), "REQUEST");
    assert.strictEqual(getMessageKindName(MessageKind.RESPONSE), "RESPONSE");
    assert.strictEqual(getMessageKindName(0x7f), "Unknown(127)");
  });
});
