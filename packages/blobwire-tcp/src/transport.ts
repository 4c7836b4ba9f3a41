// TCP transport for blobwire channels.

import net from "node:net";
import type { Duplex } from "node:stream";
import { StreamChannel, createLogger, type Logger } from "@blobwire/core";
import { SocketByteStream, type SocketByteStreamOptions } from "./socket_stream.ts";

/** Options for connecting/accepting connections. */
export interface TcpTransportOptions extends SocketByteStreamOptions {
  /** Passed to the resulting channel. Defaults to a `debug` logger on `blobwire:tcp`. */
  logger?: Logger;
}

/** Opens and accepts socket connections as stream channels. */
export class TcpTransport {
  /**
   * Connect to `host:port` and name the resulting channel `name`.
   */
  connect(addr: string, name: string, options: TcpTransportOptions = {}): Promise<StreamChannel> {
    return new Promise((resolve, reject) => {
      const lastColon = addr.lastIndexOf(":");
      const host = addr.slice(0, lastColon);
      const port = Number(addr.slice(lastColon + 1));
      if (lastColon < 0 || !Number.isInteger(port) || port < 1 || port > 0xffff) {
        reject(new Error(`invalid address: ${addr}`));
        return;
      }

      const socket = net.createConnection({ host, port }, () => {
        socket.off("error", reject);
        resolve(this.accept(socket, name, options));
      });
      socket.once("error", reject);
    });
  }

  /**
   * Wrap an accepted socket, or any other Duplex, as a stream channel.
   */
  accept(socket: Duplex, name: string, options: TcpTransportOptions = {}): StreamChannel {
    const logger = options.logger ?? createLogger("blobwire:tcp");
    logger.trace("%s: open", name);
    return new StreamChannel(new SocketByteStream(socket, options), name, { logger });
  }
}
