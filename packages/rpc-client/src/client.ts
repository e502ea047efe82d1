/**
 * msgpack-RPC client engine.
 *
 * A reader loop and a writer loop own the two halves of the transport.
 * Callers put frames on the outbound queue and wait on a per-id flag; the
 * reader parks responses in the response buffer and sets the flag, and
 * hands inbound requests and notifications to the worker pool.
 */

import { availableParallelism } from "node:os";
import {
  createNotification,
  createRequest,
  createResponse,
  decodeValueStream,
  defaultExtensionCodec,
  encodeMessage,
  getMessageKindName,
  MessageKind,
  parseFrame,
  responseToResult,
  ErrorCode,
  type Message,
  type MessageValue,
  type NotificationMessage,
  type RequestMessage,
  type RpcResult,
} from "@packline/rpc-protocol";
import { RpcClientError } from "./errors.ts";
import { MethodRegistry, type RegisteredMethod } from "./method-registry.ts";
import { IdAllocator, PendingCallTable } from "./pending-calls.ts";
import { OutboundQueue, ResponseBuffer } from "./queues.ts";
import { raceTimeout, TIMED_OUT, type ResetEvent } from "./sync.ts";
import { BufferedReader, BufferedWriter } from "./transport.ts";
import { WorkerPool } from "./worker-pool.ts";
import type {
  CallHandler,
  ClientOptions,
  ClientState,
  ClientStats,
  NotifyHandler,
  Transport,
} from "./types.ts";

type CallMethod = Extract<RegisteredMethod, { kind: "call" }>;
type NotifyMethod = Extract<RegisteredMethod, { kind: "notify" }>;

const DEFAULT_OPTIONS: Required<ClientOptions> = {
  bufferSize: 4096,
  pollIntervalMs: 10,
  maxConcurrentHandlers: availableParallelism(),
  logger: console,
  tracker: {
    acquire: () => undefined,
    release: () => undefined,
  },
  extensionCodec: defaultExtensionCodec,
};

export class RpcClient {
  private readonly options: Required<ClientOptions>;
  private readonly reader: BufferedReader;
  private readonly writer: BufferedWriter;
  private readonly registry = new MethodRegistry();
  private readonly ids = new IdAllocator();
  private readonly pendingCalls = new PendingCallTable();
  private readonly responses = new ResponseBuffer();
  private readonly outbound = new OutboundQueue();
  private readonly pool: WorkerPool;
  private state: ClientState = "created";
  private alive = false;

  /**
   * The client does not close the transport; its owner does.
   */
  constructor(transport: Transport, options: ClientOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.reader = new BufferedReader(transport.input, this.options.bufferSize);
    this.writer = new BufferedWriter(transport.output, this.options.bufferSize);
    this.pool = new WorkerPool({
      maxConcurrency: this.options.maxConcurrentHandlers,
      onError: (err, name) => {
        this.options.logger.error(`Error in ${name}:`, err);
      },
    });
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Bind `name` to a handler for inbound requests, replacing any binding.
   */
  registerCallMethod<U = undefined>(
    name: string,
    handler: CallHandler<U>,
    userdata?: U
  ): void {
    this.registry.register(name, {
      kind: "call",
      invoke: (params, id) => handler(params, { method: name, id, userdata }),
    });
  }

  /**
   * Bind `name` to a handler for inbound notifications, replacing any
   * binding.
   */
  registerNotifyMethod<U = undefined>(
    name: string,
    handler: NotifyHandler<U>,
    userdata?: U
  ): void {
    this.registry.register(name, {
      kind: "notify",
      invoke: (params) => handler(params, { method: name, userdata }),
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Spawn the reader and writer loops.
   */
  start(): void {
    if (this.state !== "created") {
      throw new RpcClientError(
        ErrorCode.ALREADY_STARTED,
        `Cannot start a client that is ${this.state}`
      );
    }
    this.state = "running";
    this.alive = true;
    this.pool.spawnLoop("reader loop", () => this.readLoop());
    this.pool.spawnLoop("writer loop", () => this.writeLoop());
  }

  /**
   * Ask both loops to finish. The writer is woken at once; the reader
   * notices within one poll interval. Callers still waiting in `call`
   * stay waiting.
   */
  stop(): void {
    if (this.state !== "running") return;
    this.state = "stopped";
    this.alive = false;
    this.outbound.wake();
  }

  /**
   * Wait for the loops and every handler task to finish, then release
   * every frame the client still holds. Stops the client first if needed.
   */
  async dispose(): Promise<void> {
    if (this.state === "disposed") {
      throw new RpcClientError(ErrorCode.CLIENT_DISPOSED, "Client already disposed");
    }
    this.stop();
    this.state = "disposed";

    await this.pool.join();
    this.reader.release();
    this.writer.release();

    for (const message of this.outbound.drain()) {
      this.release(message);
    }
    for (const response of this.responses.drain()) {
      this.release(response);
    }
    this.pendingCalls.clear();
    this.registry.clear();
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  stats(): ClientStats {
    return {
      state: this.state,
      pendingCalls: this.pendingCalls.size,
      bufferedResponses: this.responses.size,
      queuedFrames: this.outbound.size,
      activeHandlers: this.pool.active,
      queuedHandlers: this.pool.queued,
      bufferedBytes: this.reader.available(),
    };
  }

  // ==========================================================================
  // Outbound
  // ==========================================================================

  /**
   * Send a request and wait for its response. `params` is moved into the
   * request frame. There is no timeout: if no response ever arrives the
   * returned promise never settles.
   */
  async call(method: string, params: MessageValue): Promise<RpcResult> {
    this.assertUsable();
    const id = this.ids.next();
    const request = this.track(createRequest(id, method, params));

    let arrived: ResetEvent;
    try {
      arrived = this.pendingCalls.register(id);
    } catch (err) {
      this.release(request);
      throw err;
    }

    this.outbound.enqueue(request);
    await arrived.wait();
    this.pendingCalls.remove(id);

    const response = this.responses.takeMatching(id);
    if (!response) {
      throw new RpcClientError(
        ErrorCode.RESPONSE_NOT_FOUND,
        `No response buffered for request ${id}`
      );
    }
    const result = responseToResult(response);
    this.release(response);
    return result;
  }

  /**
   * Send a notification. Returns as soon as the frame is queued.
   */
  notify(method: string, params: MessageValue): void {
    this.assertUsable();
    this.outbound.enqueue(this.track(createNotification(method, params)));
  }

  private assertUsable(): void {
    if (this.state === "disposed") {
      throw new RpcClientError(ErrorCode.CLIENT_DISPOSED, "Client is disposed");
    }
  }

  // ==========================================================================
  // Loops
  // ==========================================================================

  private async readLoop(): Promise<void> {
    const frames = decodeValueStream(this.reader, this.options.extensionCodec);
    let next: Promise<IteratorResult<unknown, void>> | undefined;

    try {
      while (this.alive) {
        next ??= frames.next();
        const result = await raceTimeout(next, this.options.pollIntervalMs);
        if (result === TIMED_OUT) continue;
        next = undefined;

        if (result.done) {
          this.options.logger.info("Transport closed, reader loop finished");
          return;
        }
        this.route(result.value);
      }
    } catch (err) {
      this.options.logger.error("Error decoding frame, reader loop stopped:", err);
      return;
    }

    // Stopped while a decode was outstanding; it settles once the reader
    // half is released.
    next?.catch((err: unknown) => {
      this.options.logger.debug("Decode after stop failed:", err);
    });
  }

  private async writeLoop(): Promise<void> {
    while (this.alive) {
      await this.outbound.waitForFrame();
      if (!this.alive) break;

      const message = this.outbound.dequeue();
      if (!message) continue;

      if (!(await this.send(message))) return;
    }
  }

  /**
   * Encode, write and flush one frame, then release it.
   *
   * @returns false once the transport can no longer be written
   */
  private async send(message: Message): Promise<boolean> {
    try {
      let bytes: Uint8Array;
      try {
        bytes = encodeMessage(message, this.options.extensionCodec);
      } catch (err) {
        this.options.logger.error(
          `Error encoding ${getMessageKindName(message.type)} frame, dropping it:`,
          err
        );
        return true;
      }

      try {
        await this.writer.write(bytes);
        await this.writer.flush();
      } catch (err) {
        this.options.logger.error("Error writing frame, writer loop stopped:", err);
        return false;
      }
      return true;
    } finally {
      this.release(message);
    }
  }

  // ==========================================================================
  // Inbound
  // ==========================================================================

  private route(value: unknown): void {
    const parsed = parseFrame(value);
    if (!parsed.ok) {
      this.options.logger.warn(`Discarding malformed frame: ${parsed.reason}`);
      return;
    }
    const message = this.track(parsed.message);

    switch (message.type) {
      case MessageKind.RESPONSE:
        this.responses.push(message);
        this.pendingCalls.signal(message.id);
        break;

      case MessageKind.REQUEST: {
        const method = this.registry.lookup(message.method);
        if (method?.kind !== "call") {
          this.options.logger.debug(`No call handler for "${message.method}", dropping request ${message.id}`);
          this.release(message);
          break;
        }
        this.pool.spawn(`request handler "${message.method}"`, () =>
          this.handleRequest(method, message)
        );
        break;
      }

      case MessageKind.NOTIFICATION: {
        const method = this.registry.lookup(message.method);
        if (method?.kind !== "notify") {
          this.options.logger.debug(`No notify handler for "${message.method}", dropping notification`);
          this.release(message);
          break;
        }
        this.pool.spawn(`notify handler "${message.method}"`, () =>
          this.handleNotification(method, message)
        );
        break;
      }
    }
  }

  /**
   * Run a call handler and queue its response. A handler that throws gets
   * no response sent; the pool logs the failure.
   */
  private async handleRequest(method: CallMethod, request: RequestMessage): Promise<void> {
    try {
      const outcome = await method.invoke(request.params, request.id);
      this.outbound.enqueue(this.track(createResponse(request.id, outcome)));
    } finally {
      this.release(request);
    }
  }

  private async handleNotification(
    method: NotifyMethod,
    notification: NotificationMessage
  ): Promise<void> {
    try {
      await method.invoke(notification.params);
    } finally {
      this.release(notification);
    }
  }

  // ==========================================================================
  // Ownership
  // ==========================================================================

  private track<T extends Message>(message: T): T {
    this.options.tracker.acquire(message);
    return message;
  }

  private release(message: Message): void {
    this.options.tracker.release(message);
  }
}
