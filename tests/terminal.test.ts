/**
 * codeform — stream-backed SessionIO
 *
 * Feeds whole scripts through an in-memory stdin in a single write, the way
 * a shell pipe delivers them, and checks that every line reaches a prompt.
 */

import { PassThrough, Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { createTerminalIO, runSession, OPERATION_PROMPT } from '../src/index';

// ─── helpers ─────────────────────────────────────────────────────────────────

function collector() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, done) {
      chunks.push(String(chunk));
      done();
    },
  });
  return { stream, text: () => chunks.join('') };
}

/** A terminal whose stdin holds `script` in one chunk and then ends. */
function pipedTerminal(script: string) {
  const input  = new PassThrough();
  const output = collector();
  const errors = collector();
  const terminal = createTerminalIO({ input, output: output.stream, errors: errors.stream });
  input.end(script);
  return { terminal, output, errors };
}

// ─── Piped input ─────────────────────────────────────────────────────────────

describe('createTerminalIO — piped input', () => {

  it('answers every prompt from a single chunk', async () => {
    const { terminal, output, errors } = pipedTerminal('e\n1\n2\n');

    const code = await runSession(terminal.io, 'a:i8,b:i8', { color: false });
    terminal.close();

    expect(code).toBe(0);
    expect(output.text()).toBe(`${OPERATION_PROMPT}a: b: encoded form: AQI=\n`);
    expect(errors.text()).toBe('');
  });

  it('decodes from a single chunk', async () => {
    const { terminal, output } = pipedTerminal('d\nAQI=\n');

    const code = await runSession(terminal.io, 'a:i8,b:i8', { color: false });
    terminal.close();

    expect(code).toBe(0);
    expect(output.text()).toBe(`${OPERATION_PROMPT}input encoded form: a: 1\nb: 2\n`);
  });

  it('reports input that ends before the last field', async () => {
    const { terminal, output, errors } = pipedTerminal('e\n1\n');

    const code = await runSession(terminal.io, 'a:i8,b:i8', { color: false });
    terminal.close();

    expect(code).toBe(1);
    expect(output.text()).toBe(`${OPERATION_PROMPT}a: b: `);
    expect(errors.text()).toBe('[Error]: input closed before all fields were entered\n');
  });
});

// ─── Interactive input ───────────────────────────────────────────────────────

describe('createTerminalIO — line by line', () => {

  it('waits for a line that has not arrived yet', async () => {
    const input  = new PassThrough();
    const output = collector();
    const { io, close } = createTerminalIO({ input, output: output.stream });

    const answer = io.ask('a: ');
    input.write('7\n');

    expect(await answer).toBe('7');
    expect(output.text()).toBe('a: ');

    input.end();
    expect(await io.ask('b: ')).toBeNull();
    close();
  });
});
