// Big-endian fixed-width primitives over a CursorBuffer.
//
// Wire widths: char 1, u8 1, u16 2, u32 4, u64 8. Raw bytes carry no
// terminator and no padding; their length is always declared elsewhere.

import { CodecError } from "../errors.ts";
import type { CursorBuffer } from "./cursor.ts";

const U64_MAX = 0xffff_ffff_ffff_ffffn;

function checkUint(type: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw CodecError.invalidValue(type, value);
  }
}

function checkChar(value: string): number {
  if (value.length !== 1) throw CodecError.invalidValue("char", JSON.stringify(value));
  const code = value.charCodeAt(0);
  if (code > 0xff) throw CodecError.invalidValue("char", JSON.stringify(value));
  return code;
}

// ============================================================================
// Writers
// ============================================================================

export async function writeU8(buf: CursorBuffer, value: number): Promise<void> {
  checkUint("u8", value, 0xff);
  return buf.take(1, (view, o) => view.setUint8(o, value));
}

export async function writeU16(buf: CursorBuffer, value: number): Promise<void> {
  checkUint("u16", value, 0xffff);
  return buf.take(2, (view, o) => view.setUint16(o, value, false));
}

export async function writeU32(buf: CursorBuffer, value: number): Promise<void> {
  checkUint("u32", value, 0xffff_ffff);
  return buf.take(4, (view, o) => view.setUint32(o, value, false));
}

export async function writeU64(buf: CursorBuffer, value: bigint): Promise<void> {
  if (value < 0n || value > U64_MAX) throw CodecError.invalidValue("u64", value);
  return buf.take(8, (view, o) => view.setBigUint64(o, value, false));
}

/** Write a single latin-1 character as one byte. */
export async function writeChar(buf: CursorBuffer, value: string): Promise<void> {
  const code = checkChar(value);
  return buf.take(1, (view, o) => view.setUint8(o, code));
}

/** Write `bytes` verbatim. The length is not recorded. */
export async function writeBytes(buf: CursorBuffer, bytes: Uint8Array): Promise<void> {
  return buf.take(bytes.length, (_view, o, backing) => backing.set(bytes, o));
}

// ============================================================================
// Readers
// ============================================================================

export function readU8(buf: CursorBuffer): Promise<number> {
  return buf.take(1, (view, o) => view.getUint8(o));
}

export function readU16(buf: CursorBuffer): Promise<number> {
  return buf.take(2, (view, o) => view.getUint16(o, false));
}

export function readU32(buf: CursorBuffer): Promise<number> {
  return buf.take(4, (view, o) => view.getUint32(o, false));
}

export function readU64(buf: CursorBuffer): Promise<bigint> {
  return buf.take(8, (view, o) => view.getBigUint64(o, false));
}

export function readChar(buf: CursorBuffer): Promise<string> {
  return buf.take(1, (view, o) => String.fromCharCode(view.getUint8(o)));
}

/** Read exactly `len` bytes into a fresh array. */
export async function readBytes(buf: CursorBuffer, len: number): Promise<Uint8Array> {
  checkUint("byte length", len, Number.MAX_SAFE_INTEGER);
  return buf.take(len, (_view, o, backing) => backing.slice(o, o + len));
}
