// @blobwire/core - framed transport for exact-size codecs
//
// Stream channels move complete length-prefixed frames over partial-delivery
// byte streams; message channels bind a codec to a stream channel.

export type { ByteStream } from "./transport.ts";
export { createPipe, type PipeOptions } from "./pipe.ts";

export {
  StreamChannel,
  MAX_LENGTH_PREFIX,
  type StreamChannelOptions,
  type StreamIo,
} from "./stream_channel.ts";

export {
  MessageChannel,
  DEFAULT_MAX_FRAME_LENGTH,
  type MessageChannelOptions,
} from "./message_channel.ts";

export { ChannelError, isChannelError, type ChannelErrorKind, type Side } from "./errors.ts";

export { createLogger, silentLogger, type Logger, type LogLevel } from "./logging.ts";
