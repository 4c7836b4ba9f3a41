// ByteStream over a Node.js socket or any Duplex.

import type { Duplex } from "node:stream";
import type { ByteStream } from "@blobwire/core";

export interface SocketByteStreamOptions {
  /**
   * Queued bytes above which the socket is paused until reads catch up.
   * Defaults to 1 MiB.
   */
  highWaterMark?: number;
}

const DEFAULT_HIGH_WATER_MARK = 1024 * 1024;

/**
 * Adapts a Duplex to the partial-delivery ByteStream contract.
 *
 * Incoming chunks are queued as they arrive; `read` hands out whatever is
 * queued, up to the requested length, and resolves with 0 once the
 * readable side has ended. A stream error rejects the pending read and
 * every later one.
 */
export class SocketByteStream implements ByteStream {
  private readonly socket: Duplex;
  private readonly highWaterMark: number;
  private chunks: Uint8Array[] = [];
  private queued = 0;
  private ended = false;
  private error: Error | null = null;
  private waiter: (() => void) | null = null;

  constructor(socket: Duplex, options: SocketByteStreamOptions = {}) {
    this.socket = socket;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    socket.on("data", (chunk: Buffer) => {
      if (this.ended) return;
      this.chunks.push(chunk);
      this.queued += chunk.length;
      if (this.queued > this.highWaterMark) socket.pause();
      this.wake();
    });

    socket.on("end", () => {
      this.ended = true;
      this.wake();
    });

    socket.on("close", () => {
      this.ended = true;
      this.wake();
    });

    socket.on("error", (err: Error) => {
      this.error = err;
      this.ended = true;
      this.wake();
    });
  }

  /** Get the underlying socket. */
  getSocket(): Duplex {
    return this.socket;
  }

  async read(target: Uint8Array, offset: number, length: number): Promise<number> {
    if (length === 0) return 0;

    while (this.chunks.length === 0 && !this.ended) {
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
    if (this.error !== null) throw this.error;
    if (this.chunks.length === 0) return 0;

    let copied = 0;
    while (copied < length && this.chunks.length > 0) {
      const head = this.chunks[0];
      const n = Math.min(length - copied, head.length);
      target.set(head.subarray(0, n), offset + copied);
      copied += n;
      if (n === head.length) this.chunks.shift();
      else this.chunks[0] = head.subarray(n);
    }

    this.queued -= copied;
    if (this.queued <= this.highWaterMark && this.socket.isPaused()) this.socket.resume();
    return copied;
  }

  write(source: Uint8Array, offset: number, length: number): Promise<number> {
    if (this.socket.writableEnded || this.socket.destroyed) return Promise.resolve(0);

    return new Promise((resolve, reject) => {
      this.socket.write(Buffer.from(source.subarray(offset, offset + length)), (err) => {
        if (err) reject(err);
        else resolve(length);
      });
    });
  }

  /** End the writable side and stop reading; pending reads resolve with 0. */
  async close(): Promise<void> {
    this.ended = true;
    this.chunks = [];
    this.queued = 0;
    this.wake();
    this.socket.end();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
