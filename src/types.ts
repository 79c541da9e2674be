/**
 * codeform — type definitions
 *
 * A FormSpec is the parsed form of a codeform string. The buffer layout is
 * fully determined by it: there is no header, no length prefix and no
 * checksum on the wire.
 */

// ─── Field Kinds ──────────────────────────────────────────────────────────────

export type IntegerBits = 8 | 16 | 32 | 64;
export type FloatBits   = 32 | 64;

/**
 * The closed set of field kinds.
 *
 * integer  Signed two's complement, big-endian, bits / 8 bytes.
 * float    IEEE-754 binary32 / binary64, big-endian, bits / 8 bytes.
 * string   UTF-8 followed by one NUL byte. Width is only known after
 *          the terminator has been found.
 * enum     Zero-based index of the matching label, written as an unsigned
 *          big-endian number of enumBitWidth(items.length) bits and padded
 *          with zero bits on the right to a whole byte.
 */
export type FieldKind =
  | { readonly type: 'integer'; readonly bits:  IntegerBits }
  | { readonly type: 'float';   readonly bits:  FloatBits }
  | { readonly type: 'string' }
  | { readonly type: 'enum';    readonly items: readonly string[] };

// ─── Form ─────────────────────────────────────────────────────────────────────

/** One named slot of a form. Names are not required to be unique. */
export interface FieldSpec {
  readonly name: string;
  readonly kind: FieldKind;
}

/**
 * Ordered field list. Order is the serialization order and the prompt order.
 * Frozen by parseForm(); safe to share between concurrent decode calls.
 */
export interface FormSpec {
  readonly fields: readonly FieldSpec[];
}

/** Points at one field of a form, for error reporting. */
export interface FieldLocation {
  readonly name:  string;
  readonly index: number;
}

// ─── Values ───────────────────────────────────────────────────────────────────

/**
 * A decoded field value.
 *
 * 8, 16 and 32-bit integers and all floats decode to number. 64-bit integers
 * decode to bigint so that values beyond 2^53 survive. Strings and enum labels
 * decode to string.
 */
export type FieldValue = number | bigint | string;

export interface DecodedField {
  readonly value:         FieldValue;
  readonly bytesConsumed: number;
}

/**
 * Decoded form, in declaration order. A repeated field name keeps the
 * position of its first occurrence and the value of its last.
 */
export type DecodedForm = ReadonlyMap<string, FieldValue>;
