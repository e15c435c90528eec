/**
 * Console output for the shell: levelled messages plus the few layout
 * helpers the tabs draw with.
 *
 * LogManager is a singleton holding the level and the output stream.
 * Tests swap the stream through `setOutput`.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_PRIORITIES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.blue(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

export interface ConsoleOutput {
  write(chunk: string): unknown;
}

export class LogManager {
  private static instance: LogManager | null = null;
  private currentLogLevel: LogLevel = 'info';
  private output: ConsoleOutput = process.stdout;

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  static resetInstance(): void {
    LogManager.instance = null;
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
  }

  setOutput(output: ConsoleOutput): void {
    this.output = output;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_PRIORITIES[level] >= LOG_PRIORITIES[this.currentLogLevel];
  }

  /** Write one line per message line, styled for its level */
  log(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) {
      return;
    }
    for (const line of message.split('\n')) {
      this.line(LEVEL_STYLES[level](line));
    }
  }

  line(text = ''): void {
    this.output.write(`${text}\n`);
  }
}

export function setLogLevel(level: LogLevel): void {
  LogManager.getInstance().setLogLevel(level);
}

export function blankLine(): void {
  LogManager.getInstance().line();
}

export function debug(message: string): void {
  LogManager.getInstance().log('debug', message);
}

export function info(message: string): void {
  LogManager.getInstance().log('info', message);
}

export function warn(message: string): void {
  LogManager.getInstance().log('warn', message);
}

export function error(message: string): void {
  LogManager.getInstance().log('error', message);
}

/** Always shown, whatever the level */
export function success(message: string): void {
  LogManager.getInstance().line(chalk.green(message));
}

/** Tab title, framed by blank lines */
export function header(title: string): void {
  const manager = LogManager.getInstance();
  manager.line();
  manager.line(chalk.bold.cyan(title));
  manager.line(chalk.cyan('═'.repeat(title.length)));
}

/** `label: value` with the label dimmed */
export function status(label: string, value: string, color?: 'green' | 'yellow' | 'red'): void {
  const paint = color ? chalk[color] : chalk.white;
  LogManager.getInstance().line(`${chalk.gray(label)}: ${paint(value)}`);
}

export function divider(char = '─', length = 40): void {
  LogManager.getInstance().line(chalk.gray(char.repeat(length)));
}
