import type { Json, Serializable } from "../capability.ts";
import { readU32, writeU32 } from "../binary/primitives.ts";
import { CodecError } from "../errors.ts";

/**
 * Ordered list of `E`: a u32 count followed by each element in order.
 *
 * Order is preserved exactly; nothing is sorted or deduplicated.
 */
export function sequenceOf<E>(element: Serializable<E>): Serializable<E[]> {
  return {
    sizeof(values) {
      let size = 4;
      for (const v of values) size += element.sizeof(v);
      return size;
    },

    async write(buf, values) {
      await writeU32(buf, values.length);
      for (const v of values) {
        await element.write(buf, v);
      }
    },

    async read(buf) {
      const count = await readU32(buf);
      const values: E[] = [];
      for (let i = 0; i < count; i++) {
        values.push(await element.read(buf));
      }
      return values;
    },

    pretty(values) {
      return values.map((v) => element.pretty(v)).join("\n");
    },

    toJson(values) {
      return values.map((v) => element.toJson(v));
    },

    ofJson(json: Json) {
      if (!Array.isArray(json)) throw CodecError.malformedJson("sequence.ofJson");
      return json.map((j) => element.ofJson(j));
    },
  };
}
