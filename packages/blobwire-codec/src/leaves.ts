// Leaf capabilities: fixed-width integers, characters, and the common
// scalar projections domain types are built from.

import type { Json, Serializable } from "./capability.ts";
import type { CursorBuffer } from "./binary/cursor.ts";
import {
  readChar,
  readU16,
  readU32,
  readU64,
  readU8,
  writeChar,
  writeU16,
  writeU32,
  writeU64,
  writeU8,
} from "./binary/primitives.ts";
import { scalar, type ByteProjection } from "./combinators/scalar.ts";
import { CodecError } from "./errors.ts";

// ============================================================================
// Fixed-width leaves
// ============================================================================

function fixedNumber(
  type: string,
  width: number,
  write: (buf: CursorBuffer, value: number) => Promise<void>,
  read: (buf: CursorBuffer) => Promise<number>,
): Serializable<number> {
  return {
    sizeof: () => width,
    write,
    read,
    pretty: (value) => String(value),
    toJson: (value) => value,
    ofJson(json: Json) {
      if (typeof json !== "number") throw CodecError.malformedJson(`${type}.ofJson`);
      return json;
    },
  };
}

export const uint8: Serializable<number> = fixedNumber("u8", 1, writeU8, readU8);
export const uint16: Serializable<number> = fixedNumber("u16", 2, writeU16, readU16);
export const uint32: Serializable<number> = fixedNumber("u32", 4, writeU32, readU32);

/** u64 as a bigint. Its JSON form is a decimal string. */
export const uint64: Serializable<bigint> = {
  sizeof: () => 8,
  write: writeU64,
  read: readU64,
  pretty: (value) => value.toString(),
  toJson: (value) => value.toString(),
  ofJson(json) {
    if (typeof json === "string" && /^\d+$/.test(json)) return BigInt(json);
    if (typeof json === "number" && Number.isSafeInteger(json)) return BigInt(json);
    throw CodecError.malformedJson("u64.ofJson");
  },
};

/** One latin-1 character, one byte. */
export const char: Serializable<string> = {
  sizeof: () => 1,
  write: writeChar,
  read: readChar,
  pretty: (value) => JSON.stringify(value),
  toJson: (value) => value,
  ofJson(json) {
    if (typeof json !== "string") throw CodecError.malformedJson("char.ofJson");
    return json;
  },
};

// ============================================================================
// Projections
// ============================================================================

/** UTF-8 text. Decoding rejects invalid UTF-8. */
export const utf8Text: ByteProjection<string> = {
  toBytes: (value) => new TextEncoder().encode(value),
  ofBytes(bytes) {
    try {
      return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (e) {
      throw CodecError.invalidValue("utf8", e instanceof Error ? e.message : e);
    }
  },
};

/** Bytes as themselves. */
export const rawBytes: ByteProjection<Uint8Array> = {
  toBytes: (value) => value,
  ofBytes: (bytes) => bytes,
};

/**
 * A u32 projected to its canonical decimal text ("0", "1", "4294967295").
 * Leading zeros and signs are rejected so the projection stays lossless.
 */
export const decimalUint32: ByteProjection<number> = {
  toBytes(value) {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff_ffff) {
      throw CodecError.invalidValue("decimal u32", value);
    }
    return new TextEncoder().encode(String(value));
  },
  ofBytes(bytes) {
    const text = new TextDecoder().decode(bytes);
    if (!/^(0|[1-9]\d{0,9})$/.test(text)) throw CodecError.invalidValue("decimal u32", text);
    const value = Number(text);
    if (value > 0xffff_ffff) throw CodecError.invalidValue("decimal u32", text);
    return value;
  },
};

// ============================================================================
// Ready-made scalar wrappers
// ============================================================================

export const utf8String: Serializable<string> = scalar(utf8Text);
export const bytesScalar: Serializable<Uint8Array> = scalar(rawBytes);
export const uint32Scalar: Serializable<number> = scalar(decimalUint32);
