/**
 * codeform — field codec
 *
 * Encodes one text value into the standalone bytes of one field, and decodes
 * one field from a buffer at a given offset. Every multi-byte number is
 * big-endian. The field codec knows nothing about forms or parsing.
 *
 * Wire layout per kind:
 *
 *   integer  [bits / 8 bytes, two's complement]
 *   float    [bits / 8 bytes, IEEE-754]
 *   string   [UTF-8 bytes][0x00]
 *   enum     [index in the top enumBitWidth(n) bits of enumByteWidth(n) bytes]
 *
 * Example: an enum with 3 items has a 2-bit index, so label #1 is 0b01000000.
 */

import { NUL, enumBitWidth, enumByteWidth } from './constants';
import {
  InvalidValueError,
  MalformedError,
  OutOfRangeError,
  TruncatedError,
} from './errors';
import type {
  DecodedField,
  FieldKind,
  FieldSpec,
  FloatBits,
  IntegerBits,
} from './types';

// ─── Module-level codecs ──────────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();
// fatal: invalid UTF-8 throws instead of decoding to U+FFFD.
// ignoreBOM: a leading U+FEFF is part of the value, not a marker to strip.
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN   = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SPECIAL   = /^([+-]?)(inf|infinity|nan)$/i;

function assertNever(kind: never): never {
  throw new TypeError(`unknown field kind: ${JSON.stringify(kind)}`);
}

// ─── Width ────────────────────────────────────────────────────────────────────

/**
 * Byte width of a field, or null for strings, whose width is only known once
 * the NUL terminator has been found.
 */
export function fixedWidth(spec: FieldSpec): number | null {
  const kind = spec.kind;
  switch (kind.type) {
    case 'integer':
    case 'float':
      return kind.bits / 8;
    case 'enum':
      return enumByteWidth(kind.items.length);
    case 'string':
      return null;
    default:
      return assertNever(kind);
  }
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

function encodeInteger(bits: IntegerBits, text: string): Uint8Array {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidValueError(text, 'a base-10 integer');
  }

  const value = BigInt(trimmed);
  const max   = (1n << BigInt(bits - 1)) - 1n;
  const min   = -max - 1n;
  if (value < min || value > max) {
    throw new InvalidValueError(text, `an integer in [${min}, ${max}]`);
  }

  const out = new Uint8Array(bits / 8);
  const dv  = new DataView(out.buffer);
  switch (bits) {
    case 8:  dv.setInt8(0, Number(value));                          break;
    case 16: dv.setInt16(0, Number(value), /* littleEndian */ false); break;
    case 32: dv.setInt32(0, Number(value), /* littleEndian */ false); break;
    case 64: dv.setBigInt64(0, value,      /* littleEndian */ false); break;
  }
  return out;
}

/** Decimal float text as accepted for float fields, or null. */
function parseFloatText(text: string): number | null {
  const trimmed = text.trim();
  if (FLOAT_PATTERN.test(trimmed)) return Number(trimmed);

  const special = FLOAT_SPECIAL.exec(trimmed);
  if (special === null) return null;
  if (special[2]?.toLowerCase() === 'nan') return NaN;
  return special[1] === '-' ? -Infinity : Infinity;
}

function encodeFloat(bits: FloatBits, text: string): Uint8Array {
  const value = parseFloatText(text);
  if (value === null) {
    throw new InvalidValueError(text, 'a decimal number');
  }
  // A finite value that rounds to ±Infinity in binary32 cannot be stored.
  if (bits === 32 && Number.isFinite(value) && !Number.isFinite(Math.fround(value))) {
    throw new InvalidValueError(text, 'a number within 32-bit float range');
  }

  const out = new Uint8Array(bits / 8);
  const dv  = new DataView(out.buffer);
  if (bits === 32) dv.setFloat32(0, value, /* littleEndian */ false);
  else             dv.setFloat64(0, value, /* littleEndian */ false);
  return out;
}

function encodeString(text: string): Uint8Array {
  if (text.includes('\0')) {
    throw new InvalidValueError(text, 'text without NUL characters');
  }
  const encoded = utf8Encoder.encode(text);
  const out     = new Uint8Array(encoded.length + 1); // trailing byte stays 0x00
  out.set(encoded);
  return out;
}

function encodeEnum(items: readonly string[], text: string): Uint8Array {
  const index = items.indexOf(text);
  if (index === -1) {
    throw new InvalidValueError(text, `one of (${items.join(', ')})`, items);
  }

  const bits  = enumBitWidth(items.length);
  const bytes = enumByteWidth(items.length);
  const out   = new Uint8Array(bytes);

  // Left-align the index: the low (bytes * 8 - bits) bits are padding.
  let packed = index * 2 ** (bytes * 8 - bits);
  for (let i = bytes - 1; i >= 0; i--) {
    out[i]  = packed % 256;
    packed  = Math.floor(packed / 256);
  }
  return out;
}

/**
 * Encode one text value for a field.
 *
 * @throws InvalidValueError if the text is not a value of the field's kind.
 */
export function encodeField(spec: FieldSpec, text: string): Uint8Array {
  const kind: FieldKind = spec.kind;
  switch (kind.type) {
    case 'integer': return encodeInteger(kind.bits, text);
    case 'float':   return encodeFloat(kind.bits, text);
    case 'string':  return encodeString(text);
    case 'enum':    return encodeEnum(kind.items, text);
    default:        return assertNever(kind);
  }
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

function decodeInteger(bits: IntegerBits, dv: DataView): number | bigint {
  switch (bits) {
    case 8:  return dv.getInt8(0);
    case 16: return dv.getInt16(0, /* littleEndian */ false);
    case 32: return dv.getInt32(0, /* littleEndian */ false);
    case 64: return dv.getBigInt64(0, /* littleEndian */ false);
  }
}

function decodeEnum(items: readonly string[], buffer: Uint8Array, offset: number): string {
  const bits  = enumBitWidth(items.length);
  const bytes = enumByteWidth(items.length);

  let packed = 0;
  for (let i = 0; i < bytes; i++) {
    packed = packed * 256 + buffer[offset + i];
  }
  const index = Math.floor(packed / 2 ** (bytes * 8 - bits));

  if (index >= items.length) throw new OutOfRangeError(index, items.length);
  return items[index];
}

function decodeString(buffer: Uint8Array, offset: number): DecodedField {
  const nul = buffer.indexOf(NUL, offset);
  if (nul === -1) {
    throw new TruncatedError(offset, null, Math.max(0, buffer.length - offset));
  }

  let value: string;
  try {
    value = utf8Decoder.decode(buffer.subarray(offset, nul));
  } catch (err) {
    throw new MalformedError(offset, err);
  }
  return { value, bytesConsumed: nul - offset + 1 };
}

/**
 * Decode one field starting at `offset`.
 *
 * The buffer is only read. A Uint8Array view into a larger ArrayBuffer
 * (non-zero byteOffset) is fine.
 *
 * @throws TruncatedError  if the buffer ends inside the field.
 * @throws OutOfRangeError if an enum index has no label.
 * @throws MalformedError  if string bytes are not valid UTF-8.
 * @throws RangeError      if `offset` is not a non-negative integer.
 */
export function decodeField(spec: FieldSpec, buffer: Uint8Array, offset: number): DecodedField {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`decodeField: offset must be a non-negative integer; got ${offset}.`);
  }

  const width = fixedWidth(spec);
  if (width !== null && buffer.length - offset < width) {
    throw new TruncatedError(offset, width, Math.max(0, buffer.length - offset));
  }

  const kind: FieldKind = spec.kind;
  switch (kind.type) {
    case 'integer': {
      const dv = new DataView(buffer.buffer, buffer.byteOffset + offset, kind.bits / 8);
      return { value: decodeInteger(kind.bits, dv), bytesConsumed: kind.bits / 8 };
    }
    case 'float': {
      const dv    = new DataView(buffer.buffer, buffer.byteOffset + offset, kind.bits / 8);
      const value = kind.bits === 32
        ? dv.getFloat32(0, /* littleEndian */ false)
        : dv.getFloat64(0, /* littleEndian */ false);
      return { value, bytesConsumed: kind.bits / 8 };
    }
    case 'enum':
      return {
        value:         decodeEnum(kind.items, buffer, offset),
        bytesConsumed: enumByteWidth(kind.items.length),
      };
    case 'string':
      return decodeString(buffer, offset);
    default:
      return assertNever(kind);
  }
}
