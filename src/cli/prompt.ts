/**
 * Interactive confirmation on the controlling terminal.
 */

import * as readline from 'node:readline';

/**
 * Ask a question via readline. The prompt goes to stderr so stdout carries
 * only command output.
 */
export async function question(promptText: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(promptText, (answer: string) => {
      rl.close();
      resolve(answer);
    });
  });
}

/** True for an answer of y or yes; everything else, including empty, is no. */
export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/** y/N prompt. */
export async function confirm(promptText: string): Promise<boolean> {
  return isYes(await question(`${promptText} [y/N] `));
}
