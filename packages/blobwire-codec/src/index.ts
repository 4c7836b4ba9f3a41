// @blobwire/codec - exact-size binary codec
//
// Cursor buffers, big-endian primitives, the Serializable capability and the
// combinators that lift it to compound shapes.

// ============================================================================
// Buffers and primitives
// ============================================================================

export {
  CursorBuffer,
  noReadiness,
  type ReadinessHook,
  type BufferSnapshot,
} from "./binary/cursor.ts";

export {
  writeU8,
  writeU16,
  writeU32,
  writeU64,
  writeChar,
  writeBytes,
  readU8,
  readU16,
  readU32,
  readU64,
  readChar,
  readBytes,
} from "./binary/primitives.ts";

export { formatBufferDump, toHex, fromHex } from "./binary/hexdump.ts";

// ============================================================================
// Capability
// ============================================================================

export {
  encode,
  decode,
  type Codec,
  type Serializable,
  type Json,
  type ValueOf,
} from "./capability.ts";

export { CodecError, isCodecError, type CodecErrorKind } from "./errors.ts";

// ============================================================================
// Combinators and leaves
// ============================================================================

export { sequenceOf } from "./combinators/sequence.ts";
export { optional } from "./combinators/optional.ts";
export { pair } from "./combinators/pair.ts";
export { scalar, type ByteProjection } from "./combinators/scalar.ts";

export {
  uint8,
  uint16,
  uint32,
  uint64,
  char,
  utf8Text,
  rawBytes,
  decimalUint32,
  utf8String,
  bytesScalar,
  uint32Scalar,
} from "./leaves.ts";
