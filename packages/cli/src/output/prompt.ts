import { createInterface } from 'node:readline/promises';
import { t } from './theme.js';

/**
 * confirm — ask a yes/no question on the terminal. Anything other than
 * "y" or "yes" is a no.
 */
export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${t.amber('?')} ${question} ${t.muted('[y/N]')} `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}
