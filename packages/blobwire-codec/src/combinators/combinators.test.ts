import { describe, it, expect } from "vitest";
import { decode, encode, type Serializable } from "../capability.ts";
import { toHex } from "../binary/hexdump.ts";
import { bytesScalar, uint16, uint32, uint32Scalar, utf8String } from "../leaves.ts";
import { optional } from "./optional.ts";
import { pair } from "./pair.ts";
import { scalar } from "./scalar.ts";
import { sequenceOf } from "./sequence.ts";

/** Encode, check the exact-size law, decode, and return the decoded value. */
async function roundTrip<T>(codec: Serializable<T>, value: T): Promise<T> {
  const bytes = await encode(codec, value);
  expect(bytes.length).toBe(codec.sizeof(value));
  return decode(codec, bytes);
}

describe("sequenceOf", () => {
  it("prefixes a u32 count and keeps element order", async () => {
    const codec = sequenceOf(uint16);
    const bytes = await encode(codec, [1, 2, 3]);

    expect(codec.sizeof([1, 2, 3])).toBe(10);
    expect(toHex(bytes)).toBe("00000003" + "0001" + "0002" + "0003");
  });

  it("preserves order and duplicates", async () => {
    const codec = sequenceOf(utf8String);
    expect(await roundTrip(codec, ["c", "a", "b", "a"])).toEqual(["c", "a", "b", "a"]);
  });

  it("encodes the empty sequence as a zero count", async () => {
    const codec = sequenceOf(uint32);
    expect(toHex(await encode(codec, []))).toBe("00000000");
    expect(await roundTrip(codec, [])).toEqual([]);
  });

  it("fails when the count promises more elements than the payload holds", async () => {
    const codec = sequenceOf(uint32);
    const bytes = new Uint8Array([0, 0, 0, 2, 0, 0, 0, 1]);
    await expect(decode(codec, bytes)).rejects.toMatchObject({ kind: "bufferOverrun" });
  });
});

describe("optional", () => {
  const codec = optional(uint32);

  it("encodes absence as an empty sequence", async () => {
    expect(codec.sizeof(null)).toBe(4);
    expect(toHex(await encode(codec, null))).toBe("00000000");
    expect(await roundTrip(codec, null)).toBeNull();
  });

  it("encodes presence as a one-element sequence", async () => {
    expect(codec.sizeof(7)).toBe(8);
    expect(toHex(await encode(codec, 7))).toBe("00000001" + "00000007");
    expect(await roundTrip(codec, 7)).toBe(7);
  });

  it("rejects a count of two", async () => {
    const bytes = new Uint8Array([0, 0, 0, 2, 0, 0, 0, 1, 0, 0, 0, 2]);
    await expect(decode(codec, bytes)).rejects.toThrow(
      "optional: expected 0 or 1 element, decoded 2",
    );
    await expect(decode(codec, bytes)).rejects.toMatchObject({ kind: "malformedOptional" });
  });

  it("renders absence diagnostically", () => {
    expect(codec.pretty(null)).toBe("<none>");
    expect(codec.pretty(5)).toBe("5");
    expect(codec.toJson(null)).toBeNull();
    expect(codec.ofJson(null)).toBeNull();
    expect(codec.ofJson(5)).toBe(5);
  });
});

describe("pair", () => {
  const codec = pair(utf8String, uint16);

  it("concatenates both encodings with no separator", async () => {
    expect(codec.sizeof(["ab", 9])).toBe(8);
    expect(toHex(await encode(codec, ["ab", 9]))).toBe("00000002" + "6162" + "0009");
    expect(await roundTrip(codec, ["ab", 9])).toEqual(["ab", 9]);
  });

  it("labels components first and second in JSON only", () => {
    expect(codec.toJson(["ab", 9])).toEqual({ first: "ab", second: 9 });
    expect(codec.ofJson({ first: "x", second: 1 })).toEqual(["x", 1]);
    expect(codec.pretty(["ab", 9])).toBe('"ab":9');
  });

  it("rejects JSON missing a component", () => {
    expect(() => codec.ofJson({ first: "x" })).toThrow("malformed JSON: pair.ofJson: missing second");
    expect(() => codec.ofJson([1, 2])).toThrow("malformed JSON: pair.ofJson: not an object");
  });
});

describe("scalar", () => {
  it("length-prefixes the UTF-8 bytes, not the UTF-16 length", async () => {
    expect(utf8String.sizeof("héllo")).toBe(10);
    expect(toHex(await encode(utf8String, "héllo"))).toBe("00000006" + "68c3a96c6c6f");
    expect(await roundTrip(utf8String, "héllo")).toBe("héllo");
  });

  it("wraps a u32 through its decimal text", async () => {
    expect(toHex(await encode(uint32Scalar, 1))).toBe("00000001" + "31");
    expect(await roundTrip(uint32Scalar, 4294967295)).toBe(4294967295);
  });

  it("rejects non-canonical decimal text", async () => {
    const bytes = new Uint8Array([0, 0, 0, 2, 0x30, 0x31]);
    await expect(decode(uint32Scalar, bytes)).rejects.toMatchObject({ kind: "invalidValue" });
  });

  it("rejects invalid UTF-8 for text scalars", async () => {
    const bytes = new Uint8Array([0, 0, 0, 1, 0xff]);
    await expect(decode(utf8String, bytes)).rejects.toMatchObject({ kind: "invalidValue" });
  });

  it("falls back to hex in diagnostics for binary projections", () => {
    const blob = new Uint8Array([0xff, 0x00]);
    expect(bytesScalar.toJson(blob)).toEqual({ hex: "ff00" });
    expect(bytesScalar.pretty(blob)).toBe('"0xff00"');
    expect(Array.from(bytesScalar.ofJson({ hex: "ff00" }))).toEqual([0xff, 0x00]);
    expect(() => bytesScalar.ofJson({ hex: "f" })).toThrow("malformed JSON: scalar.ofJson");
  });

  it("accepts any lossless projection", async () => {
    const reversed = scalar<string>({
      toBytes: (value) => new TextEncoder().encode([...value].reverse().join("")),
      ofBytes: (bytes) => [...new TextDecoder().decode(bytes)].reverse().join(""),
    });
    expect(toHex(await encode(reversed, "ab"))).toBe("00000002" + "6261");
    expect(await roundTrip(reversed, "ab")).toBe("ab");
  });
});

describe("nested shapes", () => {
  const entries = sequenceOf(pair(utf8String, optional(uint32Scalar)));
  const value: Array<[string, number | null]> = [
    ["a", 1],
    ["bb", null],
  ];

  it("composes without new codec logic", async () => {
    expect(entries.sizeof(value)).toBe(28);
    expect(toHex(await encode(entries, value))).toBe(
      "00000002" +
        ("00000001" + "61" + "00000001" + "00000001" + "31") +
        ("00000002" + "6262" + "00000000"),
    );
    expect(await roundTrip(entries, value)).toEqual(value);
  });

  it("renders the diagnostic forms of every layer", () => {
    expect(entries.pretty(value)).toBe('"a":"1"\n"bb":<none>');
    const json = entries.toJson(value);
    expect(json).toEqual([
      { first: "a", second: "1" },
      { first: "bb", second: null },
    ]);
    expect(entries.ofJson(json)).toEqual(value);
  });
});
