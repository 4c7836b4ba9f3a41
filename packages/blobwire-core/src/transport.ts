/**
 * Byte stream abstraction.
 *
 * A ByteStream is the raw, partial-delivery stream a StreamChannel drives:
 * reads and writes may move fewer bytes than asked for, and a result of 0
 * means the peer is gone.
 *
 * Implementations:
 * - createPipe() (core) for in-process pairs
 * - SocketByteStream (blobwire-tcp) for sockets and Node.js duplexes
 */
export interface ByteStream {
  /**
   * Read up to `length` bytes into `target` starting at `offset`.
   *
   * Resolves with the number of bytes read, at least 1 while the stream is
   * open, 0 once the peer has closed and everything has been drained.
   */
  read(target: Uint8Array, offset: number, length: number): Promise<number>;

  /**
   * Write up to `length` bytes of `source` starting at `offset`.
   *
   * Resolves with the number of bytes accepted; 0 means the stream can no
   * longer be written.
   */
  write(source: Uint8Array, offset: number, length: number): Promise<number>;

  /** Close the stream. Pending and later reads resolve with 0. */
  close(): Promise<void>;
}
