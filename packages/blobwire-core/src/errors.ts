// Channel error types

/** Direction of a transfer on a channel. */
export type Side = "read" | "write";

export type ChannelErrorKind = "unexpectedEndOfStream" | "frameTooLarge" | "busy" | "broken" | "closed";

/**
 * Error raised by stream and message channels.
 *
 * `unexpectedEndOfStream` and `broken` are fatal to the channel: close it
 * and reconnect if applicable.
 */
export class ChannelError extends Error {
  constructor(
    public readonly kind: ChannelErrorKind,
    public readonly channel: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${channel}: ${message}`, options);
    this.name = "ChannelError";
  }

  /**
   * The peer closed, or the stream failed, after `transferred` of
   * `expected` bytes. A stream failure is kept as `cause`.
   */
  static endOfStream(
    channel: string,
    side: Side,
    expected: number,
    transferred: number,
    cause?: unknown,
  ): ChannelError {
    const verb = side === "read" ? "received" : "sent";
    const reason = cause === undefined ? "" : ` (${cause instanceof Error ? cause.message : String(cause)})`;
    return new ChannelError(
      "unexpectedEndOfStream",
      channel,
      `unexpected end of stream: ${verb} ${transferred} of ${expected} byte(s)${reason}`,
      cause === undefined ? undefined : { cause },
    );
  }

  static frameTooLarge(channel: string, length: number, limit: number): ChannelError {
    return new ChannelError("frameTooLarge", channel, `frame of ${length} byte(s) exceeds limit ${limit}`);
  }

  static busy(channel: string, side: Side): ChannelError {
    return new ChannelError("busy", channel, `a ${side} transfer is already in flight`);
  }

  /** An earlier failure left the byte position unknown. */
  static broken(channel: string, cause: unknown): ChannelError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ChannelError("broken", channel, `channel unusable after failure: ${reason}`, { cause });
  }

  static closed(channel: string): ChannelError {
    return new ChannelError("closed", channel, "channel closed");
  }
}

/** Narrow an unknown error to a ChannelError, optionally of a given kind. */
export function isChannelError(error: unknown, kind?: ChannelErrorKind): error is ChannelError {
  return error instanceof ChannelError && (kind === undefined || error.kind === kind);
}
