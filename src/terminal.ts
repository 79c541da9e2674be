/**
 * codeform — stream-backed SessionIO
 *
 * Lines are queued as readline emits them, so a piped chunk holding several
 * answers is consumed one answer per ask(), in order. ask() resolves null only
 * once the input has closed and the queue is empty.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { SessionIO } from './session';

export interface TerminalStreams {
  readonly input:  Readable;
  readonly output: Writable;
  /** Where error lines go. Defaults to `output`. */
  readonly errors?: Writable;
}

export interface TerminalIO {
  readonly io: SessionIO;
  close(): void;
}

export function createTerminalIO(streams: TerminalStreams): TerminalIO {
  const { input, output } = streams;
  const errors = streams.errors ?? output;
  const rl     = createInterface({ input, output });

  const lines:   string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line) => {
    const next = waiting.shift();
    if (next === undefined) lines.push(line);
    else                    next(line);
  });
  rl.once('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve(null);
  });

  const prompt = (question: string): void => {
    if (closed) {
      output.write(question);
      return;
    }
    rl.setPrompt(question);
    rl.prompt();
  };

  const io: SessionIO = {
    ask(question) {
      prompt(question);
      const queued = lines.shift();
      if (queued !== undefined) return Promise.resolve(queued);
      if (closed)               return Promise.resolve(null);
      return new Promise((resolve) => { waiting.push(resolve); });
    },
    print: (line) => { output.write(`${line}\n`); },
    error: (line) => { errors.write(`${line}\n`); },
  };

  return { io, close: () => rl.close() };
}
