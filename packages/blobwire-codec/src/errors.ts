// Codec error taxonomy.
//
// Every failure raised while sizing, writing or reading a value is a
// CodecError. Callers tell a corrupt payload apart from a caller bug by
// `kind`; channel-level failures (disconnects) live in @blobwire/core.

import type { BufferSnapshot } from "./binary/cursor.ts";

export type CodecErrorKind =
  | "bufferOverrun"
  | "malformedOptional"
  | "malformedJson"
  | "invalidValue"
  | "sizeMismatch"
  | "trailingBytes";

/** Error raised by the cursor buffer, the primitives and the combinators. */
export class CodecError extends Error {
  constructor(
    public readonly kind: CodecErrorKind,
    message: string,
    /** State of the buffer under inspection when the error was raised, if any. */
    public readonly snapshot?: BufferSnapshot,
  ) {
    super(message);
    this.name = "CodecError";
  }

  /** An access of `width` bytes at `offset` does not fit in `capacity`. */
  static bufferOverrun(offset: number, width: number, snapshot: BufferSnapshot): CodecError {
    return new CodecError(
      "bufferOverrun",
      `buffer overrun: ${width} byte(s) at offset ${offset} exceed capacity ${snapshot.length}`,
      snapshot,
    );
  }

  static malformedOptional(count: number, snapshot: BufferSnapshot): CodecError {
    return new CodecError(
      "malformedOptional",
      `optional: expected 0 or 1 element, decoded ${count}`,
      snapshot,
    );
  }

  static malformedJson(context: string): CodecError {
    return new CodecError("malformedJson", `malformed JSON: ${context}`);
  }

  static invalidValue(type: string, value: unknown): CodecError {
    return new CodecError("invalidValue", `${type}: invalid value ${String(value)}`);
  }

  /** `write` filled `written` bytes where `sizeof` promised `expected`. */
  static sizeMismatch(expected: number, written: number, snapshot: BufferSnapshot): CodecError {
    return new CodecError(
      "sizeMismatch",
      `size mismatch: sizeof reported ${expected} byte(s), write produced ${written}`,
      snapshot,
    );
  }

  static trailingBytes(consumed: number, snapshot: BufferSnapshot): CodecError {
    return new CodecError(
      "trailingBytes",
      `trailing bytes: read consumed ${consumed} of ${snapshot.length} byte(s)`,
      snapshot,
    );
  }
}

/** Narrow an unknown error to a CodecError, optionally of a given kind. */
export function isCodecError(error: unknown, kind?: CodecErrorKind): error is CodecError {
  return error instanceof CodecError && (kind === undefined || error.kind === kind);
}
