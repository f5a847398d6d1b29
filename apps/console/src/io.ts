import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

export interface GameIO {
  /** Resolves with the next line, or null once input has closed. */
  ask(question: string): Promise<string | null>;
  print(text: string): void;
  close(): void;
}

export function createConsoleIO(input: Readable, output: Writable): GameIO {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', () => rl.close());

  return {
    async ask(question) {
      // Lines buffered before close are still delivered.
      if (!closed) {
        rl.setPrompt(question);
        rl.prompt();
      }
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    print(text) {
      output.write(`${text}\n`);
    },
    close() {
      rl.close();
    },
  };
}
