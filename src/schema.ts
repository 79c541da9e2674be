/**
 * codeform — schema parser
 *
 * Turns a one-line codeform string into a FormSpec:
 *
 *   form        := field ("," field)*
 *   field       := identifier ":" type_spec
 *   identifier  := letter (letter | digit | "_")*
 *   type_spec   := "i" digits? | "f" digits? | "s"
 *                | "e" "[" identifier ("," identifier)* ";" "]"
 *
 * Single pass, one character of lookahead, no backtracking. The first
 * malformed token throws a ParseError carrying its position.
 *
 * Lenient mode accepts the older grammar, in which an enum ends at ";" with
 * no "]" and any character other than "," after a field ends the form. Under
 * that grammar `a:e[x;],b:i8` parses as the single field `a`, because the "]"
 * stops the parser. Strict mode (the default) rejects such text instead.
 */

import {
  DEFAULT_FLOAT_BITS,
  DEFAULT_INTEGER_BITS,
  ENUM_CLOSE,
  ENUM_ITEM_SEP,
  ENUM_OPEN,
  ENUM_TERMINATOR,
  FIELD_SEPARATOR,
  FLOAT_BITS,
  INTEGER_BITS,
  TYPE_CODES,
  TYPE_SEPARATOR,
} from './constants';
import { ParseError } from './errors';
import type { FieldKind, FieldSpec, FormSpec } from './types';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface ParseOptions {
  /**
   * Accept the older grammar: no closing "]" after an enum's ";", trailing
   * text after the last recognized field ignored, trailing "," allowed.
   */
  readonly lenient?: boolean;
}

// ─── Character classes ────────────────────────────────────────────────────────

function isLetter(c: string | null): boolean {
  return c !== null && ((c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z'));
}

function isDigit(c: string | null): boolean {
  return c !== null && c >= '0' && c <= '9';
}

function isIdentifierTail(c: string | null): boolean {
  return isLetter(c) || isDigit(c) || c === '_';
}

// ─── Parser ───────────────────────────────────────────────────────────────────

class FormParser {
  private readonly source:  string;
  private readonly lenient: boolean;
  private cursor = 0;

  constructor(source: string, lenient: boolean) {
    this.source  = source;
    this.lenient = lenient;
  }

  parse(): FormSpec {
    const fields: FieldSpec[] = [];

    for (;;) {
      fields.push(this.field());

      const next = this.peek();
      if (next === FIELD_SEPARATOR) {
        this.advance();
        if (this.lenient && this.peek() === null) break;
        continue;
      }
      if (next === null || this.lenient) break;
      throw new ParseError(this.cursor, `'${FIELD_SEPARATOR}' or end of input`, next);
    }

    return Object.freeze({ fields: Object.freeze(fields) });
  }

  // ── Productions ───────────────────────────────────────────────────────────

  private field(): FieldSpec {
    const name = this.identifier('field name');
    this.expect(TYPE_SEPARATOR);
    const kind = this.typeSpec();
    return Object.freeze({ name, kind });
  }

  private identifier(what: string): string {
    const start = this.cursor;
    if (!isLetter(this.peek())) {
      throw new ParseError(start, what, this.peek());
    }
    while (isIdentifierTail(this.peek())) this.advance();
    return this.source.slice(start, this.cursor);
  }

  private typeSpec(): FieldKind {
    const c = this.peek();
    switch (c) {
      case TYPE_CODES.integer:
        this.advance();
        return Object.freeze({ type: 'integer', bits: this.bitWidth(INTEGER_BITS, DEFAULT_INTEGER_BITS) });
      case TYPE_CODES.float:
        this.advance();
        return Object.freeze({ type: 'float', bits: this.bitWidth(FLOAT_BITS, DEFAULT_FLOAT_BITS) });
      case TYPE_CODES.string:
        this.advance();
        return Object.freeze({ type: 'string' });
      case TYPE_CODES.enum:
        this.advance();
        return Object.freeze({ type: 'enum', items: this.enumItems() });
      default:
        throw new ParseError(
          this.cursor,
          `type (${Object.values(TYPE_CODES).join(', ')})`,
          c,
        );
    }
  }

  /** Optional digits after `i` / `f`. Absent digits select the default width. */
  private bitWidth<T extends number>(allowed: readonly T[], fallback: T): T {
    const start = this.cursor;
    while (isDigit(this.peek())) this.advance();
    if (this.cursor === start) return fallback;

    const digits = this.source.slice(start, this.cursor);
    const value  = Number(digits);
    const bits   = allowed.find(b => b === value);
    if (bits === undefined) {
      throw new ParseError(start, `bit width (${allowed.join(', ')})`, digits);
    }
    return bits;
  }

  private enumItems(): readonly string[] {
    this.expect(ENUM_OPEN);
    const items: string[] = [];

    for (;;) {
      items.push(this.identifier('enum item'));
      const c = this.peek();
      if (c === ENUM_TERMINATOR) {
        this.advance();
        break;
      }
      if (c !== ENUM_ITEM_SEP) {
        throw new ParseError(this.cursor, `'${ENUM_ITEM_SEP}' or '${ENUM_TERMINATOR}'`, c);
      }
      this.advance();
    }

    if (!this.lenient) this.expect(ENUM_CLOSE);
    return Object.freeze(items);
  }

  // ── Cursor ────────────────────────────────────────────────────────────────

  /** Current character, or null at end of input. */
  private peek(): string | null {
    return this.cursor < this.source.length ? this.source.charAt(this.cursor) : null;
  }

  private advance(): void {
    this.cursor++;
  }

  private expect(char: string): void {
    const c = this.peek();
    if (c !== char) throw new ParseError(this.cursor, `'${char}'`, c);
    this.advance();
  }
}

// ─── Entry point ──────────────────────────────────────────────────────────────

/**
 * Parse a codeform string.
 *
 * Each call runs a fresh parser; the returned FormSpec and everything in it
 * is frozen.
 *
 * @throws ParseError on the first malformed token.
 */
export function parseForm(schema: string, options: ParseOptions = {}): FormSpec {
  return new FormParser(schema, options.lenient ?? false).parse();
}
