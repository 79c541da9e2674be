/**
 * codeform — grammar and layout constants
 *
 * The codeform grammar, one line per field, comma-separated:
 *
 *   name:i16            signed integer, 8 | 16 | 32 | 64 bits (default 8)
 *   ratio:f64           IEEE-754 float, 32 | 64 bits (default 32)
 *   label:s             UTF-8 string, NUL-terminated
 *   mode:e[on,off;]     enum, encoded as the index of the matching label
 *
 * Changing a type code or a default width changes the meaning of every
 * schema string already in circulation.
 */

import type { FieldKind, FloatBits, IntegerBits } from './types';

// ─── Type Codes ───────────────────────────────────────────────────────────────

export const TYPE_CODES: Readonly<Record<FieldKind['type'], string>> = {
  integer: 'i',
  float:   'f',
  string:  's',
  enum:    'e',
};

// ─── Bit Widths ───────────────────────────────────────────────────────────────

export const INTEGER_BITS: readonly IntegerBits[] = [8, 16, 32, 64];
export const FLOAT_BITS:   readonly FloatBits[]   = [32, 64];

/** Width used when a bare `i` carries no digits. */
export const DEFAULT_INTEGER_BITS: IntegerBits = 8;
/** Width used when a bare `f` carries no digits. */
export const DEFAULT_FLOAT_BITS:   FloatBits   = 32;

// ─── Punctuation ──────────────────────────────────────────────────────────────

export const FIELD_SEPARATOR = ',';
export const TYPE_SEPARATOR  = ':';
export const ENUM_OPEN       = '[';
export const ENUM_ITEM_SEP   = ',';
export const ENUM_TERMINATOR = ';';
export const ENUM_CLOSE      = ']';

/** String fields end with a single zero byte. */
export const NUL = 0x00;

// ─── Enum Geometry ────────────────────────────────────────────────────────────

/**
 * Bits needed for the index of an enum with `count` items:
 * ceil(log2(count + 1)), which is the binary length of `count`.
 * Integer arithmetic only.
 */
export function enumBitWidth(count: number): number {
  if (!Number.isInteger(count) || count < 1 || count > 0xffffffff) {
    throw new RangeError(`enumBitWidth: item count must be an integer in [1, 2^32 - 1]; got ${count}.`);
  }
  return 32 - Math.clz32(count);
}

/** Whole bytes occupied by an enum with `count` items. */
export function enumByteWidth(count: number): number {
  return Math.ceil(enumBitWidth(count) / 8);
}
