// In-process byte stream pair.

import type { ByteStream } from "./transport.ts";

export interface PipeOptions {
  /**
   * Upper bound on the bytes moved by a single read or write. Defaults to
   * unbounded; small values reproduce the short reads and writes of a
   * congested socket.
   */
  maxChunk?: number;
}

/** One direction of a pipe. */
class HalfPipe {
  private chunks: Uint8Array[] = [];
  private closed = false;
  private waiter: (() => void) | null = null;

  constructor(private readonly maxChunk: number) {}

  push(source: Uint8Array, offset: number, length: number): number {
    if (this.closed) return 0;
    const n = Math.min(length, this.maxChunk);
    if (n === 0) return 0;
    this.chunks.push(source.slice(offset, offset + n));
    this.wake();
    return n;
  }

  async pull(target: Uint8Array, offset: number, length: number): Promise<number> {
    if (length === 0) return 0;
    while (this.chunks.length === 0 && !this.closed) {
      if (this.waiter) throw new Error("pipe: concurrent read");
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }

    let copied = 0;
    const limit = Math.min(length, this.maxChunk);
    while (copied < limit && this.chunks.length > 0) {
      const head = this.chunks[0];
      const n = Math.min(head.length, limit - copied);
      target.set(head.subarray(0, n), offset + copied);
      copied += n;
      if (n === head.length) this.chunks.shift();
      else this.chunks[0] = head.subarray(n);
    }
    return copied;
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

class PipeEnd implements ByteStream {
  constructor(
    private readonly inbound: HalfPipe,
    private readonly outbound: HalfPipe,
  ) {}

  read(target: Uint8Array, offset: number, length: number): Promise<number> {
    return this.inbound.pull(target, offset, length);
  }

  async write(source: Uint8Array, offset: number, length: number): Promise<number> {
    return this.outbound.push(source, offset, length);
  }

  async close(): Promise<void> {
    this.outbound.close();
    this.inbound.close();
  }
}

/**
 * Create two connected in-memory streams: bytes written to one are read
 * from the other. Closing either end ends both directions; the peer still
 * drains what was already written before its reads return 0.
 *
 * ```typescript
 * const [client, server] = createPipe({ maxChunk: 1 });
 * const tx = new MessageChannel(new StreamChannel(client, "client"), utf8String);
 * const rx = new MessageChannel(new StreamChannel(server, "server"), utf8String);
 * await tx.send("hello");
 * await rx.receive(); // "hello", delivered one byte per read
 * ```
 */
export function createPipe(options: PipeOptions = {}): [ByteStream, ByteStream] {
  const maxChunk = options.maxChunk ?? Number.POSITIVE_INFINITY;
  if (!(maxChunk >= 1)) throw new RangeError(`pipe: maxChunk must be at least 1, got ${maxChunk}`);

  const aToB = new HalfPipe(maxChunk);
  const bToA = new HalfPipe(maxChunk);
  return [new PipeEnd(bToA, aToB), new PipeEnd(aToB, bToA)];
}
