/**
 * Terminal Prompts
 */

import { createInterface } from 'node:readline';

/**
 * Ask a question on stdin. Hidden input is read in raw mode and never echoed.
 */
export async function prompt(question: string, hidden = false): Promise<string> {
  if (hidden && process.stdin.isTTY) {
    return promptHidden(question);
  }

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

function promptHidden(question: string): Promise<string> {
  return new Promise((resolve) => {
    process.stdout.write(question);
    let input = '';

    const onData = (chunk: Buffer): void => {
      for (const c of chunk.toString('utf8')) {
        if (c === '\n' || c === '\r') {
          process.stdin.setRawMode(false);
          process.stdin.pause();
          process.stdin.off('data', onData);
          process.stdout.write('\n');
          resolve(input);
          return;
        } else if (c === '\u0003') {
          process.stdout.write('\n');
          process.exit(130);
        } else if (c === '\u007F' || c === '\b') {
          input = input.slice(0, -1);
        } else {
          input += c;
        }
      }
    };

    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on('data', onData);
  });
}

/**
 * Re-ask until the answer passes `accept`
 */
export async function promptUntil(
  question: string,
  retryQuestion: string,
  accept: (answer: string) => boolean | Promise<boolean>
): Promise<string> {
  let answer = (await prompt(question)).trim();
  while (!(await accept(answer))) {
    answer = (await prompt(retryQuestion)).trim();
  }
  return answer;
}
