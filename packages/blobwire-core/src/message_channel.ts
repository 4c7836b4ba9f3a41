// Typed message channel: one codec bound to one stream channel.

import {
  CodecError,
  CursorBuffer,
  encode,
  formatBufferDump,
  isCodecError,
  type Codec,
} from "@blobwire/codec";
import { ChannelError } from "./errors.ts";
import { createLogger, type Logger } from "./logging.ts";
import { MAX_LENGTH_PREFIX, type StreamChannel } from "./stream_channel.ts";

/** Default `maxFrameLength`: 16 MiB. */
export const DEFAULT_MAX_FRAME_LENGTH = 16 * 1024 * 1024;

export interface MessageChannelOptions {
  /** Defaults to a `debug` logger on the `blobwire:message` namespace. */
  logger?: Logger;

  /**
   * Largest payload accepted or sent, in bytes. Defaults to
   * {@link DEFAULT_MAX_FRAME_LENGTH}; values above {@link MAX_LENGTH_PREFIX}
   * are clamped to it. The receive buffer is allocated at the frame's full
   * length, so a received prefix above the limit fails before allocation.
   */
  maxFrameLength?: number;

  /** Dump the buffer under inspection to the logger's error output on decode failure. Defaults to true. */
  dumpOnError?: boolean;
}

/**
 * Sends and receives values of `T` as length-prefixed frames.
 *
 * The frame length is always `codec.sizeof(value)`, and both directions
 * verify that the codec consumed exactly that many bytes: a codec whose
 * `sizeof` disagrees with its `write` or `read` would otherwise shift every
 * later frame on the channel.
 *
 * @example
 * ```typescript
 * const entries = sequenceOf(pair(utf8String, optional(uint32Scalar)));
 * const channel = new MessageChannel(new StreamChannel(stream, "peer"), entries);
 * await channel.send([["a", 1], ["bb", null]]);
 * ```
 */
export class MessageChannel<T> {
  private readonly logger: Logger;
  private readonly maxFrameLength: number;
  private readonly dumpOnError: boolean;

  constructor(
    readonly channel: StreamChannel,
    readonly codec: Codec<T>,
    options: MessageChannelOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("blobwire:message");
    this.maxFrameLength = Math.min(options.maxFrameLength ?? DEFAULT_MAX_FRAME_LENGTH, MAX_LENGTH_PREFIX);
    this.dumpOnError = options.dumpOnError ?? true;
  }

  get name(): string {
    return this.channel.name;
  }

  /**
   * Receive one value.
   *
   * The payload buffer is filled on demand while the codec decodes, never
   * reading past the end of the frame.
   */
  receive(): Promise<T> {
    return this.channel.transfer("read", async (io) => {
      const length = await io.readLengthPrefix();
      if (length > this.maxFrameLength) {
        throw ChannelError.frameTooLarge(this.name, length, this.maxFrameLength);
      }
      this.logger.trace("%s: receive frame of %d byte(s)", this.name, length);

      const backing = new Uint8Array(length);
      let filled = 0;
      const pull = async (offset: number) => {
        filled = await io.fill(backing, filled, offset + 1);
      };
      const buf = CursorBuffer.wrap(backing, (offset) => (offset < filled ? undefined : pull(offset)));

      try {
        const value = await this.codec.read(buf);
        if (!buf.exhausted) {
          throw CodecError.trailingBytes(buf.cursor, buf.snapshot());
        }
        return value;
      } catch (e) {
        this.dump("receive", e);
        throw e;
      }
    });
  }

  /**
   * Send one value.
   *
   * The value is encoded in full before the first byte is sent, so a codec
   * failure leaves the channel usable.
   */
  async send(value: T): Promise<void> {
    let payload: Uint8Array;
    try {
      payload = await encode(this.codec, value);
    } catch (e) {
      this.dump("send", e);
      throw e;
    }
    if (payload.length > this.maxFrameLength) {
      throw ChannelError.frameTooLarge(this.name, payload.length, this.maxFrameLength);
    }

    this.logger.trace("%s: send frame of %d byte(s)", this.name, payload.length);
    await this.channel.transfer("write", async (io) => {
      await io.writeLengthPrefix(payload.length);
      await io.writeExact(payload);
    });
  }

  close(): Promise<void> {
    return this.channel.close();
  }

  private dump(op: "send" | "receive", error: unknown): void {
    if (!this.dumpOnError || !isCodecError(error) || !error.snapshot) return;
    if (!this.logger.enabled("error")) return;
    this.logger.error("%s: %s failed: %s\n%s", this.name, op, error.message, formatBufferDump(error.snapshot));
  }
}
