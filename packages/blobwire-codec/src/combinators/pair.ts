import type { Json, Serializable } from "../capability.ts";
import { CodecError } from "../errors.ts";

/**
 * Ordered 2-tuple: the `K` encoding immediately followed by the `V`
 * encoding. No length prefix and no labels on the wire; the JSON form
 * labels the components `first` and `second`.
 */
export function pair<K, V>(first: Serializable<K>, second: Serializable<V>): Serializable<[K, V]> {
  return {
    sizeof([k, v]) {
      return first.sizeof(k) + second.sizeof(v);
    },

    async write(buf, [k, v]) {
      await first.write(buf, k);
      await second.write(buf, v);
    },

    async read(buf) {
      const k = await first.read(buf);
      const v = await second.read(buf);
      const value: [K, V] = [k, v];
      return value;
    },

    pretty([k, v]) {
      return `${first.pretty(k)}:${second.pretty(v)}`;
    },

    toJson([k, v]) {
      return { first: first.toJson(k), second: second.toJson(v) };
    },

    ofJson(json: Json) {
      if (json === null || typeof json !== "object" || Array.isArray(json)) {
        throw CodecError.malformedJson("pair.ofJson: not an object");
      }
      if (!("first" in json)) throw CodecError.malformedJson("pair.ofJson: missing first");
      if (!("second" in json)) throw CodecError.malformedJson("pair.ofJson: missing second");
      return [first.ofJson(json.first), second.ofJson(json.second)];
    },
  };
}
