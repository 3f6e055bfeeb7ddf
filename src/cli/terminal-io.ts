/**
 * SessionIO over readline.
 *
 * Every question carries an abort signal. Closing the interface (end of
 * input, Ctrl+C or close()) aborts the pending question, so a waiting
 * prompt always settles with null.
 */

import { createInterface } from 'node:readline/promises';
import type { SessionIO } from './session.js';

export interface TerminalIO extends SessionIO {
  close(): void;
}

export interface TerminalIOOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function createTerminalIO(options: TerminalIOOptions): TerminalIO {
  const rl = createInterface({ input: options.input, output: options.output });
  let closed = false;
  let pending: AbortController | null = null;

  const close = (): void => {
    pending?.abort();
    if (!closed) {
      closed = true;
      rl.close();
    }
  };

  rl.on('close', () => {
    closed = true;
    pending?.abort();
  });
  rl.on('SIGINT', () => {
    console.log('\nExiting. Your legend rests—for now.');
    close();
  });

  return {
    async prompt(message: string) {
      if (closed) {
        return null;
      }
      const controller = new AbortController();
      pending = controller;
      try {
        return await rl.question(message, { signal: controller.signal });
      } catch (error) {
        if (controller.signal.aborted || closed) {
          return null;
        }
        throw error;
      } finally {
        if (pending === controller) {
          pending = null;
        }
      }
    },
    print(text: string) {
      console.log(text);
    },
    close,
  };
}
