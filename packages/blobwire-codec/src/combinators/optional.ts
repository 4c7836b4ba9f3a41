import type { Serializable } from "../capability.ts";
import { CodecError } from "../errors.ts";
import { sequenceOf } from "./sequence.ts";

/**
 * Zero-or-one `E`, carried as a sequence of length 0 or 1. `null` is the
 * absent value, so `E` itself should not admit `null`.
 */
export function optional<E>(element: Serializable<E>): Serializable<E | null> {
  const list = sequenceOf(element);

  return {
    sizeof(value) {
      return value === null ? 4 : 4 + element.sizeof(value);
    },

    write(buf, value) {
      return list.write(buf, value === null ? [] : [value]);
    },

    async read(buf) {
      const values = await list.read(buf);
      switch (values.length) {
        case 0:
          return null;
        case 1:
          return values[0];
        default:
          throw CodecError.malformedOptional(values.length, buf.snapshot());
      }
    },

    pretty(value) {
      return value === null ? "<none>" : element.pretty(value);
    },

    toJson(value) {
      return value === null ? null : element.toJson(value);
    },

    ofJson(json) {
      return json === null ? null : element.ofJson(json);
    },
  };
}
