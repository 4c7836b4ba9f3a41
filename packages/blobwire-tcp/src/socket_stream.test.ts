import { describe, it, expect } from "vitest";
import { Duplex } from "node:stream";
import { optional, pair, sequenceOf, uint32Scalar, utf8String } from "@blobwire/codec";
import { MessageChannel, isChannelError, silentLogger } from "@blobwire/core";
import { SocketByteStream } from "./socket_stream.ts";
import { TcpTransport } from "./transport.ts";

/** Two Duplex ends where bytes written to one are read from the other. */
function loopback(): [Duplex, Duplex] {
  const ends: Duplex[] = [];
  const end = (peer: number) =>
    new Duplex({
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        ends[peer].push(chunk);
        callback();
      },
      final(callback) {
        ends[peer].push(null);
        callback();
      },
    });
  ends.push(end(1), end(0));
  return [ends[0], ends[1]];
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("SocketByteStream", () => {
  it("hands out queued bytes up to the requested length", async () => {
    const [left, right] = loopback();
    const stream = new SocketByteStream(right);
    left.write(Buffer.from([1, 2, 3]));

    const target = new Uint8Array(3);
    expect(await stream.read(target, 0, 2)).toBe(2);
    expect(await stream.read(target, 2, 5)).toBe(1);
    expect(Array.from(target)).toEqual([1, 2, 3]);
  });

  it("resolves with 0 once the peer has ended", async () => {
    const [left, right] = loopback();
    const stream = new SocketByteStream(right);
    left.end(Buffer.from([9]));

    const target = new Uint8Array(4);
    expect(await stream.read(target, 0, 4)).toBe(1);
    expect(await stream.read(target, 0, 4)).toBe(0);
  });

  it("rejects a pending read when the socket fails", async () => {
    const [, right] = loopback();
    const stream = new SocketByteStream(right);
    const pending = stream.read(new Uint8Array(1), 0, 1);

    right.destroy(new Error("connection reset"));

    await expect(pending).rejects.toThrow("connection reset");
  });

  it("returns 0 from writes after close", async () => {
    const [left] = loopback();
    const stream = new SocketByteStream(left);
    await stream.close();

    expect(await stream.write(new Uint8Array([1]), 0, 1)).toBe(0);
    expect(await stream.read(new Uint8Array(1), 0, 1)).toBe(0);
  });

  it("drops data that arrives after close", async () => {
    const [left, right] = loopback();
    const stream = new SocketByteStream(right);
    await stream.close();

    left.write(Buffer.from([1, 2]));
    await tick();

    expect(await stream.read(new Uint8Array(2), 0, 2)).toBe(0);
  });

  it("pauses the socket above the high-water mark and resumes once drained", async () => {
    const [left, right] = loopback();
    const stream = new SocketByteStream(right, { highWaterMark: 2 });
    left.write(Buffer.from([1, 2, 3]));
    await tick();

    expect(right.isPaused()).toBe(true);
    expect(await stream.read(new Uint8Array(3), 0, 3)).toBe(3);
    expect(right.isPaused()).toBe(false);
  });
});

describe("TcpTransport", () => {
  it("rejects an address without a port", async () => {
    await expect(new TcpTransport().connect("localhost", "peer")).rejects.toThrow(
      "invalid address: localhost",
    );
    await expect(new TcpTransport().connect("localhost:0", "peer")).rejects.toThrow(
      "invalid address: localhost:0",
    );
  });

  it("reports a reset socket as an unexpected end of stream", async () => {
    const [left, right] = loopback();
    const channel = new TcpTransport().accept(right, "peer", { logger: silentLogger });
    left.write(Buffer.from([1]));
    const pending = channel.receiveExact(4);
    await tick();

    right.destroy(new Error("read ECONNRESET"));

    const error = await pending.then(
      () => null,
      (e: unknown) => e,
    );
    expect(isChannelError(error, "unexpectedEndOfStream")).toBe(true);
    expect(error instanceof Error && error.message).toBe(
      "peer: unexpected end of stream: received 1 of 4 byte(s) (read ECONNRESET)",
    );
    expect(error instanceof Error && error.cause instanceof Error && error.cause.message).toBe(
      "read ECONNRESET",
    );
    await expect(channel.receiveExact(1)).rejects.toMatchObject({ kind: "broken" });
  });

  it("carries messages between accepted sockets", async () => {
    const [left, right] = loopback();
    const transport = new TcpTransport();
    const entries = sequenceOf(pair(utf8String, optional(uint32Scalar)));
    const client = new MessageChannel(transport.accept(left, "client", { logger: silentLogger }), entries, {
      logger: silentLogger,
    });
    const server = new MessageChannel(transport.accept(right, "server", { logger: silentLogger }), entries, {
      logger: silentLogger,
    });

    const received = server.receive();
    await client.send([
      ["a", 1],
      ["bb", null],
    ]);
    expect(await received).toEqual([
      ["a", 1],
      ["bb", null],
    ]);

    await client.close();
    await expect(server.receive()).rejects.toMatchObject({ kind: "unexpectedEndOfStream" });
  });
});
