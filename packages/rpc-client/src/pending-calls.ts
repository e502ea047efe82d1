/**
 * Request id allocation and the table that wakes callers when their
 * response arrives.
 */

import { ErrorCode, MAX_REQUEST_ID } from "@packline/rpc-protocol";
import { RpcClientError } from "./errors.ts";
import { ResetEvent } from "./sync.ts";

/**
 * Monotonic uint32 counter. Wraps to 0 after `MAX_REQUEST_ID`; an id may
 * be reused while an older call with the same id is still waiting.
 */
export class IdAllocator {
  private current: number;

  constructor(start = 0) {
    this.current = start >>> 0;
  }

  next(): number {
    const id = this.current;
    this.current = id === MAX_REQUEST_ID ? 0 : id + 1;
    return id;
  }
}

/**
 * Request id to wait-flag mapping. Entries are created and removed by the
 * call that owns them; the reader only sets flags.
 */
export class PendingCallTable {
  private readonly entries = new Map<number, ResetEvent>();

  get size(): number {
    return this.entries.size;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  register(id: number): ResetEvent {
    if (this.entries.has(id)) {
      throw new RpcClientError(
        ErrorCode.DUPLICATE_ID,
        `Request id ${id} is already pending`
      );
    }
    const event = new ResetEvent();
    this.entries.set(id, event);
    return event;
  }

  /**
   * Set the flag for `id`. The entry stays in place.
   *
   * @returns Whether a caller was waiting on `id`
   */
  signal(id: number): boolean {
    const event = this.entries.get(id);
    if (!event) return false;
    event.set();
    return true;
  }

  remove(id: number): void {
    this.entries.delete(id);
  }

  clear(): void {
    this.entries.clear();
  }
}
