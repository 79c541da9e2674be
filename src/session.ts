/**
 * codeform — interactive session
 *
 * The prompt loop around the pure core. It owns every prompt, the base64
 * transport of buffers, the colors, and the retry policy:
 *
 *   1. The schema comes from the caller or from an `input form: ` prompt.
 *      A schema that does not parse ends the session with exit code 1.
 *   2. The operation prompt chooses encode or decode. An empty answer or
 *      closed input ends the session with exit code 0. Input that closes
 *      inside an operation is reported and ends it with exit code 1.
 *   3. A failed operation prints the error and asks for the operation again,
 *      reusing the parsed form.
 *
 * All I/O goes through SessionIO.
 */

import { CodeformError, ParseError } from './errors';
import { decodeForm, encodeForm } from './form';
import { parseForm } from './schema';
import type { FieldSpec, FormSpec } from './types';

// ─── I/O seam ─────────────────────────────────────────────────────────────────

export interface SessionIO {
  /** Resolves with the answer, or null once input is closed. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  error(line: string): void;
}

export interface SessionOptions {
  /** Parse the schema in lenient mode; see ParseOptions. */
  readonly lenient?: boolean;
  /** Wrap output in ANSI colors. Default true. */
  readonly color?:   boolean;
}

// ─── Prompts ──────────────────────────────────────────────────────────────────

export const FORM_PROMPT      = 'input form: ';
export const OPERATION_PROMPT = 'select operation (e/encode), (d/decode): ';
export const ENCODED_PROMPT   = 'input encoded form: ';

/** `name: `, or `name(on, off): ` for an enum field. */
export function fieldPrompt(field: FieldSpec): string {
  return field.kind.type === 'enum'
    ? `${field.name}(${field.kind.items.join(', ')}): `
    : `${field.name}: `;
}

// ─── Colors ───────────────────────────────────────────────────────────────────

const GREEN = '\x1b[32m';
const RED   = '\x1b[31m';
const RESET = '\x1b[0m';

function paint(text: string, code: string, color: boolean): string {
  return color ? `${code}${text}${RESET}` : text;
}

// ─── Transport ────────────────────────────────────────────────────────────────

/** Raised for encoded-form text that is not canonical, padded base64. */
export class TransportError extends CodeformError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/** Whitespace (line breaks from copy-paste) is ignored. */
export function decodeBase64(text: string): Uint8Array {
  const compact = text.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new TransportError('invalid base64 input');
  }
  return Buffer.from(compact, 'base64');
}

// ─── Operations ───────────────────────────────────────────────────────────────

/** Input closed before an operation had all its answers. Not retried. */
export class InputClosedError extends CodeformError {
  constructor(message: string) {
    super(message);
    this.name = 'InputClosedError';
  }
}

async function runEncode(io: SessionIO, form: FormSpec, color: boolean): Promise<void> {
  const values: string[] = [];
  for (const field of form.fields) {
    const answer = await io.ask(fieldPrompt(field));
    if (answer === null) throw new InputClosedError('input closed before all fields were entered');
    values.push(answer);
  }

  const encoded = encodeBase64(encodeForm(form, values));
  io.print(`encoded form: ${paint(encoded, GREEN, color)}`);
}

async function runDecode(io: SessionIO, form: FormSpec, color: boolean): Promise<void> {
  const answer = await io.ask(ENCODED_PROMPT);
  if (answer === null) throw new InputClosedError('input closed before the encoded form was entered');

  const decoded = decodeForm(form, decodeBase64(answer));
  for (const [name, value] of decoded) {
    io.print(paint(`${name}: ${String(value)}`, GREEN, color));
  }
}

// ─── runSession ───────────────────────────────────────────────────────────────

/**
 * Run one session and resolve with the process exit code.
 *
 * CodeformError is reported and retried, except InputClosedError, which is
 * reported and resolves with 1. Anything else is a bug and rejects the
 * returned promise.
 */
export async function runSession(
  io:      SessionIO,
  schema:  string | undefined,
  options: SessionOptions = {},
): Promise<number> {
  const color  = options.color ?? true;
  const report = (err: CodeformError): void => {
    io.error(paint(`[Error]: ${err.message}`, RED, color));
  };

  const source = schema ?? await io.ask(FORM_PROMPT);
  if (source === null) return 0;

  let form: FormSpec;
  try {
    form = parseForm(source, { lenient: options.lenient ?? false });
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    report(err);
    return 1;
  }

  for (;;) {
    const answer = await io.ask(OPERATION_PROMPT);
    if (answer === null) return 0;
    const operation = answer.trim();
    if (operation === '') return 0;

    try {
      if (operation === 'e' || operation === 'encode') {
        await runEncode(io, form, color);
        return 0;
      }
      if (operation === 'd' || operation === 'decode') {
        await runDecode(io, form, color);
        return 0;
      }
      throw new CodeformError(`invalid operation '${operation}'`);
    } catch (err) {
      if (!(err instanceof CodeformError)) throw err;
      report(err);
      if (err instanceof InputClosedError) return 1;
    }
  }
}
