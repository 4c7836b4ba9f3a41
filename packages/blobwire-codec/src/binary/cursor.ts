// Single-pass cursor buffer.

import { CodecError } from "../errors.ts";

/**
 * Called once per byte offset immediately before that offset is touched.
 *
 * A streaming reader uses it to pull bytes that have not arrived yet; the
 * in-memory case uses {@link noReadiness}.
 */
export type ReadinessHook = (offset: number) => Promise<void> | undefined;

/** Hook for buffers whose bytes are all present up front. */
export const noReadiness: ReadinessHook = () => undefined;

/** Bytes copied on either side of the cursor by {@link CursorBuffer.snapshot}. */
const SNAPSHOT_WINDOW = 32;

/** Copy of a buffer's state for diagnostics. */
export interface BufferSnapshot {
  /** Cursor position. */
  offset: number;
  /** Full capacity of the buffer. */
  length: number;
  /** Absolute offset of `bytes[0]`. */
  start: number;
  /** Window of the backing region around the cursor. */
  bytes: Uint8Array;
}

/**
 * A fixed-capacity byte region with a monotonically advancing cursor.
 *
 * Created for exactly one read pass or one write pass over one message.
 * There is no way to move the cursor backwards.
 */
export class CursorBuffer {
  private readonly backing: Uint8Array;
  private readonly ready: ReadinessHook;
  private _cursor = 0;

  private constructor(backing: Uint8Array, ready: ReadinessHook) {
    this.backing = backing;
    this.ready = ready;
  }

  /** A zero-filled buffer of exactly `capacity` bytes. */
  static alloc(capacity: number, ready: ReadinessHook = noReadiness): CursorBuffer {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw CodecError.invalidValue("buffer capacity", capacity);
    }
    return new CursorBuffer(new Uint8Array(capacity), ready);
  }

  /**
   * Wrap existing bytes (no copy). The hook sees the same offsets it
   * would for an allocated buffer.
   */
  static wrap(bytes: Uint8Array, ready: ReadinessHook = noReadiness): CursorBuffer {
    return new CursorBuffer(bytes, ready);
  }

  get capacity(): number {
    return this.backing.length;
  }

  get cursor(): number {
    return this._cursor;
  }

  get remaining(): number {
    return this.backing.length - this._cursor;
  }

  /** True once the cursor has reached capacity. */
  get exhausted(): boolean {
    return this._cursor === this.backing.length;
  }

  /** The whole backing region. */
  bytes(): Uint8Array {
    return this.backing;
  }

  /** Cursor, capacity and a copy of the bytes around the cursor. */
  snapshot(): BufferSnapshot {
    const start = Math.max(0, this._cursor - 8);
    const end = Math.min(this.backing.length, this._cursor + SNAPSHOT_WINDOW - 8);
    return {
      offset: this._cursor,
      length: this.backing.length,
      start,
      bytes: this.backing.slice(start, end),
    };
  }

  /**
   * Reserve `width` bytes at the cursor: bounds-check, run the readiness
   * hook for each offset, and hand the caller the backing region plus the
   * absolute offset. The cursor advances only after `fn` returns.
   */
  async take<T>(
    width: number,
    fn: (view: DataView, offset: number, backing: Uint8Array) => T,
  ): Promise<T> {
    const start = this._cursor;
    if (start + width > this.backing.length) {
      throw CodecError.bufferOverrun(start, width, this.snapshot());
    }
    for (let o = start; o < start + width; o++) {
      const pending = this.ready(o);
      if (pending !== undefined) await pending;
    }
    const view = new DataView(this.backing.buffer, this.backing.byteOffset, this.backing.byteLength);
    const result = fn(view, start, this.backing);
    this._cursor = start + width;
    return result;
  }
}
