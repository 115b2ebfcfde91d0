import { createInterface } from "node:readline/promises";

import type { Confirmer } from "./guard.js";

type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

/** Asks on the terminal; anything but y/yes is a no. */
export class TtyConfirmer implements Confirmer {
  constructor(
    private readonly input: InputStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  isInteractive(): boolean {
    return Boolean(this.input.isTTY);
  }

  async confirm(question: string): Promise<boolean> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      const answer = await rl.question(`${question} [y/N] `);
      return /^y(es)?$/i.test(answer.trim());
    } finally {
      rl.close();
    }
  }
}
