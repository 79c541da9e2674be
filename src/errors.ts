/**
 * codeform — error taxonomy
 *
 * Everything the parser and the codecs throw derives from CodeformError.
 * Nothing in the core retries or recovers; the caller decides.
 */

import type { FieldLocation } from './types';

// ─── Base ─────────────────────────────────────────────────────────────────────

export class CodeformError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CodeformError';
  }
}

// ─── Parse ────────────────────────────────────────────────────────────────────

/**
 * Malformed schema text. `position` is the zero-based offset of the offending
 * character; `found` is null when the input ended early.
 */
export class ParseError extends CodeformError {
  readonly position: number;
  readonly expected: string;
  readonly found:    string | null;

  constructor(position: number, expected: string, found: string | null) {
    super(
      `expected ${expected} at position ${position} but got ` +
      (found === null ? 'end of input' : `'${found}'`),
    );
    this.name     = 'ParseError';
    this.position = position;
    this.expected = expected;
    this.found    = found;
  }
}

// ─── Field errors ─────────────────────────────────────────────────────────────

/**
 * An error raised while encoding or decoding a single field.
 *
 * The field codec does not know where its field sits in a form. The form
 * codec attaches that with withField() before rethrowing.
 */
export abstract class FieldError extends CodeformError {
  field: FieldLocation | undefined = undefined;

  withField(field: FieldLocation): this {
    this.field   = field;
    this.message = `field '${field.name}' (#${field.index}): ${this.message}`;
    return this;
  }
}

/** Text input that the field's kind cannot represent. */
export class InvalidValueError extends FieldError {
  readonly input:    string;
  readonly expected: string;
  /** Enum labels, for enum fields; undefined otherwise. */
  readonly allowed:  readonly string[] | undefined;

  constructor(input: string, expected: string, allowed?: readonly string[]) {
    super(`invalid value, expected ${expected}, but got '${input}'`);
    this.name     = 'InvalidValueError';
    this.input    = input;
    this.expected = expected;
    this.allowed  = allowed;
  }
}

/**
 * The buffer ends before the field does. `needed` is the fixed width of the
 * field, or null for a string field whose NUL terminator is missing.
 */
export class TruncatedError extends FieldError {
  readonly offset:    number;
  readonly needed:    number | null;
  readonly available: number;

  constructor(offset: number, needed: number | null, available: number) {
    super(
      needed === null
        ? `truncated at offset ${offset}: no NUL terminator in the remaining ${available} bytes`
        : `truncated at offset ${offset}: need ${needed} bytes, ${available} available`,
    );
    this.name      = 'TruncatedError';
    this.offset    = offset;
    this.needed    = needed;
    this.available = available;
  }
}

/** A decoded enum index with no matching label. */
export class OutOfRangeError extends FieldError {
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number) {
    super(`enum index ${index} out of range for ${count} items`);
    this.name  = 'OutOfRangeError';
    this.index = index;
    this.count = count;
  }
}

/** String bytes that are not valid UTF-8. */
export class MalformedError extends FieldError {
  readonly offset: number;

  constructor(offset: number, cause: unknown) {
    super(`invalid UTF-8 in string at offset ${offset}`, { cause });
    this.name   = 'MalformedError';
    this.offset = offset;
  }
}

// ─── Form errors ──────────────────────────────────────────────────────────────

export class ArityMismatchError extends CodeformError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`form has ${expected} fields but ${received} values were given`);
    this.name     = 'ArityMismatchError';
    this.expected = expected;
    this.received = received;
  }
}
