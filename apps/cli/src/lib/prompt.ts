/**
 * Terminal prompts
 */

import chalk from 'chalk';
import { createInterface, type Interface } from 'node:readline';
import type { Confirmer } from '@pack-doctor/core';

export type Answer = 'yes' | 'no' | 'unknown';

export function parseAnswer(input: string): Answer {
  const answer = input.trim().toLowerCase();
  if (answer === 'yes' || answer === 'y') return 'yes';
  if (answer === 'no' || answer === 'n') return 'no';
  return 'unknown';
}

function question(rl: Interface, text: string): Promise<string | null> {
  return new Promise((resolve) => {
    const onClose = (): void => resolve(null);
    rl.once('close', onClose);
    rl.question(text, (answer) => {
      rl.off('close', onClose);
      resolve(answer);
    });
  });
}

/**
 * Asks on the terminal until it gets a yes or a no.
 * A closed input counts as no.
 */
export class ReadlineConfirmer implements Confirmer {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async confirm(text: string): Promise<boolean> {
    const rl = createInterface({ input: this.input, output: this.output });

    try {
      let prompt = chalk.yellow(`${text} [y/n] `);
      for (;;) {
        const answer = await question(rl, prompt);
        if (answer === null) return false;

        const parsed = parseAnswer(answer);
        if (parsed !== 'unknown') return parsed === 'yes';

        prompt = chalk.yellow("Please type either 'yes' or 'no'. ");
      }
    } finally {
      rl.close();
    }
  }
}

/**
 * Wait for the operator to press Enter
 */
export async function waitForEnter(
  text: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<void> {
  const rl = createInterface({ input, output });
  try {
    await question(rl, chalk.gray(text));
  } finally {
    rl.close();
  }
}
