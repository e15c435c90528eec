/**
 * Line prompts: yes/no, single-line text and multiline text.
 *
 * Without a TTY, text prompts answer null and `confirm` reads one line
 * from piped stdin, falling back to its default.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

function pauseStdinSafely(): void {
  try {
    if (process.stdin.readable && !process.stdin.destroyed) {
      process.stdin.pause();
    }
  } catch {
    return;
  }
}

/** Ask one question on the terminal; `prefill` is typed into the line editor */
function ask(question: string, prefill?: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(chalk.green(question), (answer) => {
      rl.close();
      pauseStdinSafely();
      resolve(answer);
    });
    if (prefill) {
      rl.write(prefill);
    }
  });
}

function parseYesNo(answer: string, defaultYes: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (!normalized) {
    return defaultYes;
  }
  return normalized === 'y' || normalized === 'yes';
}

/**
 * @param defaultValue - Pre-filled in the line editor
 * @returns Trimmed answer, or null when it is empty
 */
export async function promptInput(message: string, defaultValue?: string): Promise<string | null> {
  if (!process.stdin.isTTY) {
    return null;
  }
  const answer = (await ask(`${message}: `, defaultValue)).trim();
  return answer || null;
}

/**
 * Read multiline input from a readable stream.
 * An empty line finishes input. If the first line is empty, returns null.
 * Exported for testing.
 */
export function readMultilineFromStream(input: NodeJS.ReadableStream): Promise<string | null> {
  const lines: string[] = [];
  const rl = readline.createInterface({ input });

  return new Promise((resolve) => {
    let done = false;
    const finish = (): void => {
      done = true;
      rl.close();
      resolve(lines.join('\n').trim() || null);
    };

    rl.on('line', (line) => {
      if (done) {
        return;
      }
      if (line === '') {
        finish();
        return;
      }
      lines.push(line);
    });

    rl.on('close', () => {
      if (!done) {
        resolve(lines.join('\n').trim() || null);
      }
    });
  });
}

/** Text spanning several lines, ended by an empty line */
export async function promptMultiline(message: string): Promise<string | null> {
  if (!process.stdin.isTTY) {
    return null;
  }
  process.stdout.write(`${chalk.green(`${message} (finish with an empty line):`)}\n`);
  const text = await readMultilineFromStream(process.stdin);
  pauseStdinSafely();
  return text;
}

export async function confirm(message: string, defaultYes = true): Promise<boolean> {
  const hint = defaultYes ? '[Y/n]' : '[y/N]';
  if (process.stdin.isTTY) {
    return parseYesNo(await ask(`${message} ${hint}: `), defaultYes);
  }
  if (!process.stdin.readable || process.stdin.destroyed) {
    return defaultYes;
  }
  return readConfirmFromPipe(defaultYes);
}

function readConfirmFromPipe(defaultYes: boolean): Promise<boolean> {
  const rl = readline.createInterface({ input: process.stdin });

  return new Promise((resolve) => {
    let answered = false;

    rl.once('line', (line) => {
      answered = true;
      rl.close();
      pauseStdinSafely();
      resolve(parseYesNo(line, defaultYes));
    });

    rl.once('close', () => {
      if (!answered) {
        resolve(defaultYes);
      }
    });
  });
}
