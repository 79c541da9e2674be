/**
 * codeform — command-line options
 */

export interface CliOptions {
  /** Schema from the first positional argument; prompted for when absent. */
  readonly schema:  string | undefined;
  readonly lenient: boolean;
  readonly color:   boolean;
  readonly help:    boolean;
}

export const USAGE = `Usage: codeform [schema] [options]

Encode values into a base64 buffer, or decode such a buffer, for a codeform
schema such as "name:s,age:i8,mode:e[on,off;]".

Options:
  --lenient                         Accept enums without a closing "]" and
                                    ignore text after the last field
  --no-color                        Print without ANSI colors (also NO_COLOR)
  -h, --help                        Show this help`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse `process.argv.slice(2)`.
 *
 * A non-empty NO_COLOR variable turns colors off, as does --no-color.
 */
export function parseCliArgs(
  argv: readonly string[],
  env:  Readonly<Record<string, string | undefined>> = process.env,
): CliOptions {
  let schema:  string | undefined;
  let lenient = false;
  let color   = (env['NO_COLOR'] ?? '') === '';
  let help    = false;

  for (const arg of argv) {
    if (arg === '-h' || arg === '--help') {
      help = true;
    } else if (arg === '--lenient') {
      lenient = true;
    } else if (arg === '--no-color') {
      color = false;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`unknown option: ${arg}`);
    } else if (schema === undefined) {
      schema = arg;
    } else {
      throw new CliUsageError(`unexpected argument: ${arg}`);
    }
  }

  return { schema, lenient, color, help };
}
