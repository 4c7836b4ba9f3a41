// Stream channel: complete transfers and length-prefix framing over a
// ByteStream.
//
// Frame layout: [u32 big-endian length L][L bytes payload].

import { decode, encode, uint32 } from "@blobwire/codec";
import type { ByteStream } from "./transport.ts";
import { ChannelError, type Side } from "./errors.ts";
import { createLogger, type Logger } from "./logging.ts";

/** Largest length a 4-byte prefix can carry. */
export const MAX_LENGTH_PREFIX = 0xffff_ffff;

export interface StreamChannelOptions {
  /** Defaults to a `debug` logger on the `blobwire:stream` namespace. */
  logger?: Logger;
}

/**
 * Unguarded operations handed to a transfer. Only valid while the
 * transfer that received them is running.
 */
export interface StreamIo {
  /**
   * Read into `target` from `start` until at least `minEnd` bytes are
   * present, never past `target.length`. Resolves with the new fill end.
   */
  fill(target: Uint8Array, start: number, minEnd: number): Promise<number>;
  readExact(n: number): Promise<Uint8Array>;
  writeExact(bytes: Uint8Array): Promise<void>;
  readLengthPrefix(): Promise<number>;
  writeLengthPrefix(length: number): Promise<void>;
}

/**
 * A named, bidirectional byte stream with complete (non-partial) reads and
 * writes.
 *
 * Each side carries at most one transfer at a time: starting a second read
 * while one is pending fails with `busy` instead of interleaving bytes.
 * Reads and writes may proceed concurrently with each other.
 *
 * Any failure inside a transfer leaves the byte position unknown, so the
 * channel is poisoned and every later operation fails with `broken`.
 */
export class StreamChannel {
  readonly name: string;
  private readonly stream: ByteStream;
  private readonly logger: Logger;
  private readonly inFlight: Record<Side, boolean> = { read: false, write: false };
  private failure: unknown = null;
  private closed = false;
  private readonly io: StreamIo;

  constructor(stream: ByteStream, name: string, options: StreamChannelOptions = {}) {
    this.stream = stream;
    this.name = name;
    this.logger = options.logger ?? createLogger("blobwire:stream");
    this.io = {
      fill: (target, start, minEnd) => this.fill(target, start, minEnd),
      readExact: (n) => this.readExact(n),
      writeExact: (bytes) => this.writeExact(bytes),
      readLengthPrefix: async () => decode(uint32, await this.readExact(4)),
      writeLengthPrefix: async (length) => this.writeExact(await encode(uint32, length)),
    };
  }

  /** False once the channel is closed or poisoned. */
  get usable(): boolean {
    return !this.closed && this.failure === null;
  }

  /**
   * Run a multi-step transfer holding one side of the channel.
   *
   * Message channels use this to read a prefix and its payload as one
   * logical transfer.
   */
  async transfer<T>(side: Side, fn: (io: StreamIo) => Promise<T>): Promise<T> {
    if (this.closed) throw ChannelError.closed(this.name);
    if (this.failure !== null) throw ChannelError.broken(this.name, this.failure);
    if (this.inFlight[side]) throw ChannelError.busy(this.name, side);

    this.inFlight[side] = true;
    try {
      return await fn(this.io);
    } catch (e) {
      if (this.failure === null) this.failure = e;
      throw e;
    } finally {
      this.inFlight[side] = false;
    }
  }

  /** Receive exactly `n` bytes. */
  receiveExact(n: number): Promise<Uint8Array> {
    return this.transfer("read", (io) => io.readExact(n));
  }

  /** Send all of `bytes`. */
  sendExact(bytes: Uint8Array): Promise<void> {
    return this.transfer("write", (io) => io.writeExact(bytes));
  }

  receiveLengthPrefix(): Promise<number> {
    return this.transfer("read", (io) => io.readLengthPrefix());
  }

  async sendLengthPrefix(length: number): Promise<void> {
    if (!Number.isInteger(length) || length < 0 || length > MAX_LENGTH_PREFIX) {
      throw ChannelError.frameTooLarge(this.name, length, MAX_LENGTH_PREFIX);
    }
    return this.transfer("write", (io) => io.writeLengthPrefix(length));
  }

  /** Close the underlying stream. Pending transfers fail; later ones fail with `closed`. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.logger.trace("%s: close", this.name);
    await this.stream.close();
  }

  private async fill(target: Uint8Array, start: number, minEnd: number): Promise<number> {
    let filled = start;
    while (filled < minEnd) {
      let n: number;
      try {
        n = await this.stream.read(target, filled, target.length - filled);
      } catch (e) {
        throw ChannelError.endOfStream(this.name, "read", target.length, filled, e);
      }
      if (n === 0) {
        throw ChannelError.endOfStream(this.name, "read", target.length, filled);
      }
      filled += n;
    }
    return filled;
  }

  private async readExact(n: number): Promise<Uint8Array> {
    this.logger.trace("%s: read %d", this.name, n);
    const target = new Uint8Array(n);
    await this.fill(target, 0, n);
    return target;
  }

  private async writeExact(bytes: Uint8Array): Promise<void> {
    this.logger.trace("%s: write %d", this.name, bytes.length);
    let sent = 0;
    while (sent < bytes.length) {
      let n: number;
      try {
        n = await this.stream.write(bytes, sent, bytes.length - sent);
      } catch (e) {
        throw ChannelError.endOfStream(this.name, "write", bytes.length, sent, e);
      }
      if (n === 0) {
        throw ChannelError.endOfStream(this.name, "write", bytes.length, sent);
      }
      sent += n;
    }
  }
}
