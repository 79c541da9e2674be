/**
 * codeform — form codec
 *
 * A form's buffer is the plain concatenation of its fields' encodings in
 * declaration order. Decoding walks the same order with a running offset,
 * advancing by each field's bytesConsumed.
 */

import { ArityMismatchError, FieldError } from './errors';
import { decodeField, encodeField } from './field';
import type { DecodedField, DecodedForm, FieldSpec, FieldValue, FormSpec } from './types';

/** Run a field-level operation, tagging any FieldError with the field's location. */
function atField<T>(field: FieldSpec, index: number, run: () => T): T {
  try {
    return run();
  } catch (err) {
    if (err instanceof FieldError) throw err.withField({ name: field.name, index });
    throw err;
  }
}

// ─── encodeForm ───────────────────────────────────────────────────────────────

/**
 * Encode one text value per field, in field order.
 *
 * @throws ArityMismatchError if `values` and the form differ in length.
 * @throws InvalidValueError  for the first value its field rejects.
 */
export function encodeForm(form: FormSpec, values: readonly string[]): Uint8Array {
  const fields = form.fields;
  if (values.length !== fields.length) {
    throw new ArityMismatchError(fields.length, values.length);
  }

  const parts: Uint8Array[] = [];
  let   total = 0;
  for (let i = 0; i < fields.length; i++) {
    const field = fields[i];
    const text  = values[i];
    const bytes = atField(field, i, () => encodeField(field, text));
    parts.push(bytes);
    total += bytes.length;
  }

  const out = new Uint8Array(total);
  let   pos = 0;
  for (const part of parts) {
    out.set(part, pos);
    pos += part.length;
  }
  return out;
}

// ─── decodeForm ───────────────────────────────────────────────────────────────

/**
 * Decode a buffer produced with the same form.
 *
 * All or nothing: the first failing field's error propagates, tagged with
 * that field's name and index. Bytes after the last field are ignored.
 */
export function decodeForm(form: FormSpec, buffer: Uint8Array): DecodedForm {
  const result = new Map<string, FieldValue>();
  let   offset = 0;

  form.fields.forEach((field, index) => {
    const decoded: DecodedField = atField(field, index, () => decodeField(field, buffer, offset));
    result.set(field.name, decoded.value);
    offset += decoded.bytesConsumed;
  });

  return result;
}
