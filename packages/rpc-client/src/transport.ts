/**
 * Buffered halves of a transport. The reader half is consumed only by the
 * reader loop and the writer half only by the writer loop.
 */

import type { Readable, Writable } from "node:stream";
import { RpcClientError, ErrorCode } from "./errors.ts";

/**
 * Collects chunks from a readable stream and hands them out as an async
 * iterable. The stream is paused while more than `bufferSize` bytes are
 * waiting to be consumed.
 */
export class BufferedReader implements AsyncIterable<Uint8Array> {
  private readonly chunks: Uint8Array[] = [];
  private buffered = 0;
  private ended = false;
  private failure: Error | undefined;
  private wakeReader: (() => void) | undefined;

  constructor(
    private readonly stream: Readable,
    private readonly bufferSize: number
  ) {
    stream.on("data", this.onData);
    stream.on("end", this.onEnd);
    stream.on("close", this.onEnd);
    stream.on("error", this.onError);
  }

  /** Bytes received but not yet handed out */
  available(): number {
    return this.buffered;
  }

  /** True once the stream has ended or the reader was released */
  isEnded(): boolean {
    return this.ended;
  }

  /**
   * Detach from the stream. Iteration finishes once the chunks already
   * buffered are consumed.
   */
  release(): void {
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("close", this.onEnd);
    this.stream.off("error", this.onError);
    this.stream.pause();
    this.onEnd();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
    while (true) {
      const chunk = this.chunks.shift();
      if (chunk) {
        this.buffered -= chunk.byteLength;
        if (this.stream.isPaused() && !this.ended && this.buffered < this.bufferSize) {
          this.stream.resume();
        }
        yield chunk;
        continue;
      }
      if (this.failure) throw this.failure;
      if (this.ended) return;
      await new Promise<void>((resolve) => {
        this.wakeReader = resolve;
      });
    }
  }

  private readonly onData = (chunk: Buffer | string): void => {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    this.chunks.push(bytes);
    this.buffered += bytes.byteLength;
    if (this.buffered >= this.bufferSize) {
      this.stream.pause();
    }
    this.wake();
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.wake();
  };

  private readonly onError = (err: Error): void => {
    this.failure = err;
    this.ended = true;
    this.wake();
  };

  private wake(): void {
    const resolve = this.wakeReader;
    this.wakeReader = undefined;
    resolve?.();
  }
}

/**
 * Accumulates encoded frames and writes them to the stream on `flush()`,
 * or as soon as the buffer would exceed `bufferSize`. Stream errors are
 * held here and surface as `TRANSPORT_CLOSED` from the next flush.
 */
export class BufferedWriter {
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private failure: Error | undefined;

  constructor(
    private readonly stream: Writable,
    private readonly bufferSize: number
  ) {
    stream.on("error", this.onError);
  }

  /** Bytes written but not yet flushed */
  pending(): number {
    return this.buffered;
  }

  /** Detach from the stream. */
  release(): void {
    this.stream.off("error", this.onError);
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.buffered > 0 && this.buffered + bytes.byteLength > this.bufferSize) {
      await this.flush();
    }
    this.chunks.push(bytes);
    this.buffered += bytes.byteLength;
    if (this.buffered >= this.bufferSize) {
      await this.flush();
    }
  }

  /**
   * Write everything buffered. Resolves once the stream has accepted the
   * bytes, rejects with `TRANSPORT_CLOSED` once the stream has failed or
   * ended.
   */
  async flush(): Promise<void> {
    if (this.buffered === 0) return;
    const data =
      this.chunks.length === 1 && this.chunks[0]
        ? this.chunks[0]
        : Buffer.concat(this.chunks);
    this.chunks = [];
    this.buffered = 0;
    await this.writeChunk(data);
  }

  private writeChunk(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.failure) {
        reject(writeFailed(this.failure));
        return;
      }
      if (this.stream.destroyed || this.stream.writableEnded) {
        reject(
          new RpcClientError(ErrorCode.TRANSPORT_CLOSED, "Transport is closed for writing")
        );
        return;
      }
      this.stream.write(data, (err) => {
        if (err) {
          reject(writeFailed(err));
        } else {
          resolve();
        }
      });
    });
  }

  private readonly onError = (err: Error): void => {
    this.failure ??= err;
  };
}

function writeFailed(cause: Error): RpcClientError {
  return new RpcClientError(
    ErrorCode.TRANSPORT_CLOSED,
    `Transport write failed: ${cause.message}`,
    { cause }
  );
}
