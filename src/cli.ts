#!/usr/bin/env node

import { CliUsageError, USAGE, parseCliArgs } from './options';
import { runSession } from './session';
import { createTerminalIO } from './terminal';

async function main(): Promise<number> {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const { io, close } = createTerminalIO({
    input:  process.stdin,
    output: process.stdout,
    errors: process.stderr,
  });
  try {
    return await runSession(io, options.schema, {
      lenient: options.lenient,
      color:   options.color,
    });
  } finally {
    close();
  }
}

main().then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    if (err instanceof CliUsageError) console.error(USAGE);
    process.exitCode = 1;
  },
);
