// The serialization capability and the whole-buffer helpers built on it.

import { CursorBuffer } from "./binary/cursor.ts";
import { CodecError } from "./errors.ts";

/** JSON value used by the diagnostic forms. Never consulted on the wire. */
export type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

/**
 * What a type must provide to be carried on the wire.
 *
 * Laws every implementation upholds:
 * - `write(buf, v)` advances the cursor by exactly `sizeof(v)` bytes;
 * - `read` consumes exactly what the matching `write` produced;
 * - reading back what was written yields an equal value.
 */
export interface Codec<T> {
  /** Exact byte length `write` produces for `value`. Pure. */
  sizeof(value: T): number;
  write(buf: CursorBuffer, value: T): Promise<void>;
  read(buf: CursorBuffer): Promise<T>;
}

/** A codec with human/diagnostic forms. Combinators require this. */
export interface Serializable<T> extends Codec<T> {
  pretty(value: T): string;
  toJson(value: T): Json;
  ofJson(json: Json): T;
}

/** The value type carried by a codec. */
export type ValueOf<C> = C extends Codec<infer T> ? T : never;

/**
 * Encode `value` into a fresh buffer of exactly `sizeof(value)` bytes.
 *
 * @throws CodecError `sizeMismatch` if `write` stops short of capacity.
 * A write past capacity surfaces as `bufferOverrun`.
 */
export async function encode<T>(codec: Codec<T>, value: T): Promise<Uint8Array> {
  const size = codec.sizeof(value);
  const buf = CursorBuffer.alloc(size);
  await codec.write(buf, value);
  if (!buf.exhausted) {
    throw CodecError.sizeMismatch(size, buf.cursor, buf.snapshot());
  }
  return buf.bytes();
}

/**
 * Decode exactly one value spanning all of `bytes`.
 *
 * @throws CodecError `trailingBytes` if `read` leaves bytes behind.
 */
export async function decode<T>(codec: Codec<T>, bytes: Uint8Array): Promise<T> {
  const buf = CursorBuffer.wrap(bytes);
  const value = await codec.read(buf);
  if (!buf.exhausted) {
    throw CodecError.trailingBytes(buf.cursor, buf.snapshot());
  }
  return value;
}
