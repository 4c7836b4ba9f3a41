import type { Json, Serializable } from "../capability.ts";
import { readBytes, readU32, writeBytes, writeU32 } from "../binary/primitives.ts";
import { fromHex, toHex } from "../binary/hexdump.ts";
import { CodecError } from "../errors.ts";

/**
 * Lossless projection of `S` to and from a byte string.
 *
 * `ofBytes(toBytes(s))` must equal `s`. `ofBytes` may throw on bytes that
 * no `S` projects to.
 */
export interface ByteProjection<S> {
  toBytes(value: S): Uint8Array;
  ofBytes(bytes: Uint8Array): S;
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

function utf8OrNull(bytes: Uint8Array): string | null {
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Wrap a projectable scalar: a u32 byte length followed by the raw bytes
 * of its projection.
 *
 * The JSON form is the projection as a string when it is valid UTF-8,
 * `{ "hex": "..." }` otherwise.
 */
export function scalar<S>(projection: ByteProjection<S>): Serializable<S> {
  return {
    sizeof(value) {
      return 4 + projection.toBytes(value).length;
    },

    async write(buf, value) {
      const bytes = projection.toBytes(value);
      await writeU32(buf, bytes.length);
      await writeBytes(buf, bytes);
    },

    async read(buf) {
      const len = await readU32(buf);
      const bytes = await readBytes(buf, len);
      return projection.ofBytes(bytes);
    },

    pretty(value) {
      const bytes = projection.toBytes(value);
      return JSON.stringify(utf8OrNull(bytes) ?? `0x${toHex(bytes)}`);
    },

    toJson(value) {
      const bytes = projection.toBytes(value);
      return utf8OrNull(bytes) ?? { hex: toHex(bytes) };
    },

    ofJson(json: Json) {
      if (typeof json === "string") {
        return projection.ofBytes(new TextEncoder().encode(json));
      }
      if (json !== null && typeof json === "object" && !Array.isArray(json)) {
        const hex = json.hex;
        const bytes = typeof hex === "string" ? fromHex(hex) : null;
        if (bytes) return projection.ofBytes(bytes);
      }
      throw CodecError.malformedJson("scalar.ofJson");
    },
  };
}
