/**
 * Logger for vmlease
 *
 * Supports human-readable, JSON-lines and silent output modes.
 */

import type { VmleaseError } from '../core/errors.js';

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json' | 'silent';

/**
 * Log level for messages
 */
export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

/**
 * A single emitted log entry.
 *
 * In JSON mode each entry is written as one line; in silent mode entries
 * are only kept in memory (see {@link Logger.getEntries}).
 */
export interface LogEntry {
  time: string;
  level: LogLevel;
  scope?: string;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
}

/**
 * Options for constructing a Logger
 */
export interface LoggerOptions {
  mode?: OutputMode;
  /** Emit debug entries (default: false) */
  verbose?: boolean;
  /** Prefix attached to every entry, usually a VM id */
  scope?: string;
}

const SYMBOLS: Record<LogLevel, string> = {
  debug: '·',
  info: '',
  success: '✓ ',
  warning: '⚠ ',
  error: '✗ ',
};

/**
 * Logger class supporting human-readable and JSON output modes.
 *
 * Human mode outputs text with symbols, JSON mode writes one object per line
 * so a long-running workflow can be followed from a log collector.
 * Child loggers share the parent's entry buffer.
 */
export class Logger {
  private mode: OutputMode;
  private verbose: boolean;
  private readonly scope: string | undefined;
  private readonly entries: LogEntry[];

  constructor(options: LoggerOptions = {}, entries: LogEntry[] = []) {
    this.mode = options.mode ?? 'human';
    this.verbose = options.verbose ?? false;
    this.scope = options.scope;
    this.entries = entries;
  }

  /**
   * Set the output mode.
   */
  setMode(mode: OutputMode): void {
    this.mode = mode;
  }

  /**
   * Get the current output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  /**
   * Create a logger that tags every entry with a scope.
   *
   * Nested scopes are joined with a colon: `vm-7:guest`.
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger({ mode: this.mode, verbose: this.verbose, scope: nested }, this.entries);
  }

  debug(message: string, details?: Record<string, unknown>): void {
    if (!this.verbose) return;
    this.emit({ level: 'debug', message, details });
  }

  info(message: string, details?: Record<string, unknown>): void {
    this.emit({ level: 'info', message, details });
  }

  success(message: string, details?: Record<string, unknown>): void {
    this.emit({ level: 'success', message, details });
  }

  warning(message: string, details?: Record<string, unknown>): void {
    this.emit({ level: 'warning', message, details });
  }

  /**
   * Log an error message.
   *
   * When a VmleaseError is given, its code is attached and its suggestion
   * is printed on a second line in human mode.
   */
  error(message: string, error?: VmleaseError, details?: Record<string, unknown>): void {
    this.emit({ level: 'error', message, code: error?.code, details });
    if (this.mode === 'human' && error?.suggestion) {
      console.error(`${this.prefix()}  Fix: ${error.suggestion}`);
    }
  }

  /**
   * Get every entry emitted through this logger and its children.
   */
  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  private prefix(): string {
    return this.scope ? `[${this.scope}] ` : '';
  }

  private emit(partial: Omit<LogEntry, 'time' | 'scope'>): void {
    const entry: LogEntry = {
      time: new Date().toISOString(),
      level: partial.level,
      message: partial.message,
    };
    if (this.scope) entry.scope = this.scope;
    if (partial.code) entry.code = partial.code;
    if (partial.details) entry.details = partial.details;

    this.entries.push(entry);

    switch (this.mode) {
      case 'silent':
        return;
      case 'json':
        console.log(JSON.stringify(entry));
        return;
      case 'human': {
        const line = `${this.prefix()}${SYMBOLS[entry.level]}${entry.message}`;
        if (entry.level === 'error') {
          console.error(line);
        } else if (entry.level === 'warning') {
          console.warn(line);
        } else {
          console.log(line);
        }
      }
    }
  }
}

/**
 * Global logger instance.
 *
 * Can be replaced with a configured instance for different output modes.
 */
export let logger = new Logger();

/**
 * Create and set a new logger with the specified options.
 */
export function configureLogger(options: LoggerOptions): Logger {
  logger = new Logger(options);
  return logger;
}
