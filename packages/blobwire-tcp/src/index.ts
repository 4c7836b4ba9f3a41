// @blobwire/tcp - socket byte streams for blobwire channels

export { SocketByteStream, type SocketByteStreamOptions } from "./socket_stream.ts";
export { TcpTransport, type TcpTransportOptions } from "./transport.ts";
