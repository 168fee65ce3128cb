import readline from 'node:readline/promises';
import { CancelledError } from './errors.js';

/** Interactive prompts are only offered when a human is on both ends of the terminal. */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

async function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

export async function promptText(question: string): Promise<string> {
  const answer = await ask(`${question}: `);
  if (!answer) throw new CancelledError();
  return answer;
}

export async function confirm(question: string): Promise<boolean> {
  const answer = await ask(`${question} [y/N] `);
  return /^y(es)?$/i.test(answer);
}

/**
 * Print a numbered list and return the chosen item. Any answer that is not
 * one of the listed numbers cancels.
 */
export async function choose<T>(title: string, items: T[], label: (item: T) => string): Promise<T> {
  console.log(`\n${title}`);
  items.forEach((item, i) => {
    console.log(`  [${i + 1}] ${label(item)}`);
  });
  const answer = await ask(`Choose (1-${items.length}): `);
  const idx = Number.parseInt(answer, 10) - 1;
  const picked = Number.isInteger(idx) ? items[idx] : undefined;
  if (picked === undefined) throw new CancelledError();
  return picked;
}
