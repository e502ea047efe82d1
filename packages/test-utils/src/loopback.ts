import { PassThrough } from "node:stream";
import {
  decodeValueStream,
  encodeValue,
  MessageKind,
  parseFrame,
  type Message,
  type MessageValue,
  type RequestMessage,
} from "@packline/rpc-protocol";

export interface LoopbackPeer {
  /** Write a msgpack value to the client as-is, well-formed or not */
  send(value: unknown): void;
  /** Write raw bytes to the client */
  sendBytes(bytes: Uint8Array): void;
  /** Send `[0, id, method, params]` */
  request(id: number, method: string, params: MessageValue): void;
  /** Send `[1, id, error, result]` */
  respond(id: number, error: MessageValue, result: MessageValue): void;
  /** Send `[2, method, params]` */
  notify(method: string, params: MessageValue): void;
  /** Every value the client has written, in arrival order */
  getReceived(): unknown[];
  /** Received values that are valid frames, in arrival order */
  getMessages(): Message[];
  /** Received requests, in arrival order */
  getRequests(): RequestMessage[];
  /** Resolve once at least `count` values have arrived */
  waitForReceived(count: number): Promise<unknown[]>;
  /** End both directions of the loopback */
  close(): void;
}

export interface Loopback {
  /** Hand this to the client */
  transport: { input: PassThrough; output: PassThrough };
  /** The remote side, driven by the test */
  peer: LoopbackPeer;
}

/**
 * Create an in-process stand-in for an RPC host connected to a client by
 * two pass-through streams.
 *
 * @example
 * const { transport, peer } = createLoopback();
 * const client = new RpcClient(transport);
 * client.start();
 *
 * const pending = client.call("nvim_eval", ["1 + 1"]);
 * const [request] = await peer.waitForReceived(1);
 * peer.respond(0, null, 2);
 * await pending; // { ok: true, result: 2 }
 */
export function createLoopback(): Loopback {
  const toClient = new PassThrough();
  const fromClient = new PassThrough();
  const received: unknown[] = [];
  const waiters: Array<{ count: number; resolve: (values: unknown[]) => void }> = [];

  const settleWaiters = () => {
    for (let i = waiters.length - 1; i >= 0; i--) {
      const waiter = waiters[i];
      if (waiter && received.length >= waiter.count) {
        waiters.splice(i, 1);
        waiter.resolve(received.slice());
      }
    }
  };

  const pump = async () => {
    for await (const value of decodeValueStream(fromClient)) {
      received.push(value);
      settleWaiters();
    }
  };
  pump().catch((err: unknown) => {
    console.error("Loopback peer failed to decode client output:", err);
  });

  const getMessages = (): Message[] => {
    const messages: Message[] = [];
    for (const value of received) {
      const parsed = parseFrame(value);
      if (parsed.ok) messages.push(parsed.message);
    }
    return messages;
  };

  const peer: LoopbackPeer = {
    send(value) {
      toClient.write(encodeValue(value));
    },
    sendBytes(bytes) {
      toClient.write(bytes);
    },
    request(id, method, params) {
      peer.send([MessageKind.REQUEST, id, method, params]);
    },
    respond(id, error, result) {
      peer.send([MessageKind.RESPONSE, id, error, result]);
    },
    notify(method, params) {
      peer.send([MessageKind.NOTIFICATION, method, params]);
    },
    getReceived() {
      return received.slice();
    },
    getMessages,
    getRequests() {
      return getMessages().filter(
        (message): message is RequestMessage => message.type === MessageKind.REQUEST
      );
    },
    waitForReceived(count) {
      if (received.length >= count) {
        return Promise.resolve(received.slice());
      }
      return new Promise((resolve) => {
        waiters.push({ count, resolve });
      });
    },
    close() {
      if (!toClient.writableEnded) toClient.end();
      if (!fromClient.writableEnded) fromClient.end();
    },
  };

  return { transport: { input: toClient, output: fromClient }, peer };
}
