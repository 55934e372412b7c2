/**
 * Console prompter over node:readline.
 */

import readline from 'node:readline';
import type { Prompter } from './types.js';

/**
 * Creates a prompter reading stdin and writing stdout. Reads after stdin ends
 * resolve to undefined.
 */
export function createConsolePrompter(): Prompter {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const state: { closed: boolean; pending?: ((line: string | undefined) => void) | undefined } = {
    closed: false,
  };
  rl.on('close', () => {
    state.closed = true;
    state.pending?.(undefined);
    state.pending = undefined;
  });

  return {
    readLine(prompt: string): Promise<string | undefined> {
      if (state.closed) {
        return Promise.resolve(undefined);
      }
      return new Promise((resolve) => {
        state.pending = resolve;
        rl.question(prompt, (answer) => {
          state.pending = undefined;
          resolve(answer);
        });
      });
    },
    print(text: string): void {
      console.log(text);
    },
    close(): void {
      rl.close();
    },
  };
}
