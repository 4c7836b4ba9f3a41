import type { BufferSnapshot } from "./cursor.ts";

/**
 * Render a buffer snapshot as a header line followed by 16-byte hex/ASCII
 * rows addressed from the start of the buffer. The byte at the cursor is
 * bracketed.
 *
 * ```text
 * [[ offset:2 len:5 ]]
 *     0000: 00 00 [00] 01 61                                   ....a
 * ```
 */
export function formatBufferDump(snapshot: BufferSnapshot): string {
  const { offset, length, start, bytes } = snapshot;
  const lines = [`[[ offset:${offset} len:${length} ]]`];

  for (let i = 0; i < bytes.length; i += 16) {
    const lineEnd = Math.min(i + 16, bytes.length);
    const hex: string[] = [];
    const chars: string[] = [];

    for (let j = i; j < lineEnd; j++) {
      const byte = bytes[j];
      const h = byte.toString(16).padStart(2, "0");
      hex.push(start + j === offset ? `[${h}]` : h);
      chars.push(byte >= 32 && byte < 127 ? String.fromCharCode(byte) : ".");
    }

    const addr = (start + i).toString(16).padStart(4, "0");
    lines.push(`    ${addr}: ${hex.join(" ").padEnd(52)} ${chars.join("")}`);
  }

  return lines.join("\n");
}

/** Lowercase hex of `bytes`, no separators. */
export function toHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) out += b.toString(16).padStart(2, "0");
  return out;
}

/** Inverse of {@link toHex}; returns null for odd lengths or non-hex digits. */
export function fromHex(hex: string): Uint8Array | null {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) return null;
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
