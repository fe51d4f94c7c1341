// CHANGE: Terminal prompts for values not supplied by flags or environment.
// WHY: The core receives a finished RunConfig and never reads stdin itself.

import { createInterface } from "node:readline/promises";

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompter reading answers from the process terminal.
 */
export function createTerminalPrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: async question => (await rl.question(question)).trim(),
    close: () => rl.close()
  };
}
