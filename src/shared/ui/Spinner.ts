/**
 * Braille spinner shown while a dashboard load or action runs.
 *
 * A stopped spinner can be started again, which the dashboard tab does
 * around every prompt a background job raises. Without a TTY nothing is
 * drawn.
 */

import chalk from 'chalk';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_INTERVAL_MS = 80;

export interface SpinnerOutput {
  isTTY?: boolean;
  write(chunk: string): unknown;
}

export class Spinner {
  private intervalId?: ReturnType<typeof setInterval>;
  private frame = 0;
  private drawnWidth = 0;

  constructor(
    private message: string,
    private readonly output: SpinnerOutput = process.stdout,
  ) {}

  get running(): boolean {
    return this.intervalId !== undefined;
  }

  start(): void {
    if (this.running || !this.output.isTTY) {
      return;
    }
    this.draw();
    this.intervalId = setInterval(() => this.draw(), FRAME_INTERVAL_MS);
  }

  stop(finalMessage?: string): void {
    if (this.intervalId !== undefined) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }
    if (this.drawnWidth > 0) {
      this.output.write(`\r${' '.repeat(this.drawnWidth)}\r`);
      this.drawnWidth = 0;
    }
    if (finalMessage) {
      this.output.write(`${finalMessage}\n`);
    }
  }

  update(message: string): void {
    this.message = message;
  }

  private draw(): void {
    const glyph = FRAMES[this.frame] ?? FRAMES[0];
    this.frame = (this.frame + 1) % FRAMES.length;
    this.output.write(`\r${chalk.cyan(glyph)} ${this.message}`);
    this.drawnWidth = Math.max(this.drawnWidth, this.message.length + 2);
  }
}
