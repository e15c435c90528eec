/**
 * Debug logging for vpush.
 * Writes debug logs to a file when enabled in config.
 * When verbose console is enabled, also outputs to stderr.
 * Values under credential-like keys never reach either sink.
 */

import { existsSync, appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';

const REDACTED = '[redacted]';
const SECRET_KEY_PATTERN = /token|password|secret|authorization/i;

/** JSON.stringify replacer masking credential-like keys at any depth */
export function redactSecrets(key: string, value: unknown): unknown {
  if (key && SECRET_KEY_PATTERN.test(key) && typeof value === 'string' && value !== '') {
    return REDACTED;
  }
  return value;
}

/** Scoped logger handed out by createLogger */
export interface ComponentLogger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

/**
 * Debug logger singleton.
 * Manages file-based debug logging and verbose console output.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private debugEnabled = false;
  private debugLogFile: string | null = null;
  private initialized = false;
  private verboseConsoleEnabled = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    DebugLogger.instance = null;
  }

  private static getDefaultLogFile(logsDir: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    return join(logsDir, `debug-${timestamp}.log`);
  }

  /** Initialize debug logger from config. Subsequent calls are ignored. */
  init(config?: DebugConfig, logsDir?: string): void {
    if (this.initialized) {
      return;
    }

    this.debugEnabled = config?.enabled ?? false;

    if (this.debugEnabled) {
      if (config?.logFile) {
        this.debugLogFile = config.logFile;
      } else if (logsDir) {
        this.debugLogFile = DebugLogger.getDefaultLogFile(logsDir);
      }

      if (this.debugLogFile) {
        const logDir = dirname(this.debugLogFile);
        if (!existsSync(logDir)) {
          mkdirSync(logDir, { recursive: true });
        }

        const header = [
          '='.repeat(60),
          'vpush Debug Log',
          `Started: ${new Date().toISOString()}`,
          `Working directory: ${process.cwd()}`,
          '='.repeat(60),
          '',
        ].join('\n');

        writeFileSync(this.debugLogFile, header, 'utf-8');
      }
    }

    this.initialized = true;
  }

  /** Reset state (for testing) */
  reset(): void {
    this.debugEnabled = false;
    this.debugLogFile = null;
    this.initialized = false;
    this.verboseConsoleEnabled = false;
  }

  setVerboseConsole(enabled: boolean): void {
    this.verboseConsoleEnabled = enabled;
  }

  isVerboseConsole(): boolean {
    return this.verboseConsoleEnabled;
  }

  isEnabled(): boolean {
    return this.debugEnabled;
  }

  getLogFile(): string | null {
    return this.debugLogFile;
  }

  private static formatLogMessage(level: string, component: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level}] [${component}] ${message}`;

    if (data !== undefined) {
      try {
        const dataStr = typeof data === 'string' ? data : JSON.stringify(data, redactSecrets, 2);
        logLine += `\n${dataStr}`;
      } catch {
        logLine += '\n[Unable to serialize data]';
      }
    }

    return logLine;
  }

  private static formatConsoleMessage(level: string, component: string, message: string): string {
    const timestamp = new Date().toISOString().slice(11, 23);
    return `[${timestamp}] [${level}] [${component}] ${message}`;
  }

  /** Write a log entry to verbose console (stderr) and/or file */
  writeLog(level: string, component: string, message: string, data?: unknown): void {
    if (this.verboseConsoleEnabled) {
      process.stderr.write(DebugLogger.formatConsoleMessage(level, component, message) + '\n');
    }

    if (!this.debugEnabled || !this.debugLogFile) {
      return;
    }

    const logLine = DebugLogger.formatLogMessage(level, component, message, data);

    try {
      appendFileSync(this.debugLogFile, logLine + '\n', 'utf-8');
    } catch (err) {
      // Log file gone: disable file logging for the rest of the run.
      this.debugLogFile = null;
      process.stderr.write(`vpush: debug log disabled (${err instanceof Error ? err.message : String(err)})\n`);
    }
  }

  createLogger(component: string): ComponentLogger {
    return {
      debug: (message, data) => this.writeLog('DEBUG', component, message, data),
      info: (message, data) => this.writeLog('INFO', component, message, data),
      warn: (message, data) => this.writeLog('WARN', component, message, data),
      error: (message, data) => this.writeLog('ERROR', component, message, data),
    };
  }
}

export function initDebugLogger(config?: DebugConfig, logsDir?: string): void {
  DebugLogger.getInstance().init(config, logsDir);
}

export function resetDebugLogger(): void {
  DebugLogger.getInstance().reset();
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerboseConsole(enabled);
}

export function isVerboseConsole(): boolean {
  return DebugLogger.getInstance().isVerboseConsole();
}

export function isDebugEnabled(): boolean {
  return DebugLogger.getInstance().isEnabled();
}

export function getDebugLogFile(): string | null {
  return DebugLogger.getInstance().getLogFile();
}

export function createLogger(component: string): ComponentLogger {
  return DebugLogger.getInstance().createLogger(component);
}
