/**
 * The two message queues between the loops and everyone else.
 */

import type { Message, ResponseMessage } from "@packline/rpc-protocol";
import { Semaphore } from "./sync.ts";

/**
 * Responses the reader has accepted but no caller has claimed yet.
 */
export class ResponseBuffer {
  private readonly entries: ResponseMessage[] = [];

  get size(): number {
    return this.entries.length;
  }

  push(response: ResponseMessage): void {
    this.entries.push(response);
  }

  /**
   * Remove and return the oldest response for `id`. Everything else keeps
   * its place and order.
   */
  takeMatching(id: number): ResponseMessage | undefined {
    const index = this.entries.findIndex((entry) => entry.id === id);
    if (index === -1) return undefined;
    const [response] = this.entries.splice(index, 1);
    return response;
  }

  drain(): ResponseMessage[] {
    return this.entries.splice(0);
  }
}

/**
 * Frames waiting for the writer, with the signal that wakes it. Each
 * enqueue posts the signal once.
 */
export class OutboundQueue {
  private readonly entries: Message[] = [];
  private readonly signal = new Semaphore();

  get size(): number {
    return this.entries.length;
  }

  enqueue(message: Message): void {
    this.entries.push(message);
    this.signal.post();
  }

  dequeue(): Message | undefined {
    return this.entries.shift();
  }

  /** Wake the writer without queuing anything. */
  wake(): void {
    this.signal.post();
  }

  /** Resolve on the next post, or at once if one is outstanding. */
  waitForFrame(): Promise<void> {
    return this.signal.wait();
  }

  drain(): Message[] {
    return this.entries.splice(0);
  }
}
