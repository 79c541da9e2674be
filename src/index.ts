// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  IntegerBits,
  FloatBits,
  FieldKind,
  FieldSpec,
  FormSpec,
  FieldLocation,
  FieldValue,
  DecodedField,
  DecodedForm,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  TYPE_CODES,
  INTEGER_BITS,
  FLOAT_BITS,
  DEFAULT_INTEGER_BITS,
  DEFAULT_FLOAT_BITS,
  enumBitWidth,
  enumByteWidth,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  CodeformError,
  ParseError,
  FieldError,
  InvalidValueError,
  TruncatedError,
  OutOfRangeError,
  MalformedError,
  ArityMismatchError,
} from './errors';

// ─── Schema ───────────────────────────────────────────────────────────────────
export { parseForm } from './schema';
export type { ParseOptions } from './schema';

// ─── Codecs ───────────────────────────────────────────────────────────────────
export { encodeField, decodeField, fixedWidth } from './field';
export { encodeForm, decodeForm } from './form';

// ─── Session ──────────────────────────────────────────────────────────────────
export {
  runSession,
  fieldPrompt,
  encodeBase64,
  decodeBase64,
  TransportError,
  InputClosedError,
  FORM_PROMPT,
  OPERATION_PROMPT,
  ENCODED_PROMPT,
} from './session';
export type { SessionIO, SessionOptions } from './session';
export { createTerminalIO } from './terminal';
export type { TerminalStreams, TerminalIO } from './terminal';

export { parseCliArgs, CliUsageError, USAGE } from './options';
export type { CliOptions } from './options';
