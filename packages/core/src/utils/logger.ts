/**
 * Line-oriented logger shared by every log task
 *
 * Many subprocesses report through one logger concurrently. Each call is a
 * single write() of one complete line, so lines from different tasks can
 * interleave but never split.
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Anything with a write(), e.g. process.stdout
 */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface Logger {
  readonly level: LogLevel;
  /** chalk instance honoring the color setting, for callers styling their own text */
  readonly colors: ChalkInstance;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerOptions {
  /** Most verbose level written (default: info) */
  level?: LogLevel;

  /** Enable ANSI colors (default: false) */
  color?: boolean;

  /** Destination for debug/info (default: process.stdout) */
  stdout?: LogSink;

  /** Destination for warn/error (default: process.stderr) */
  stderr?: LogSink;
}

class LineLogger implements Logger {
  readonly level: LogLevel;
  readonly colors: ChalkInstance;
  private stdout: LogSink;
  private stderr: LogSink;

  constructor(options: LoggerOptions) {
    this.level = options.level ?? 'info';
    this.colors = new Chalk({ level: options.color ? chalk.level || 1 : 0 });
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.isLevelEnabled('debug')) {
      this.stdout.write(`${this.colors.dim(message)}\n`);
    }
  }

  info(message: string): void {
    if (this.isLevelEnabled('info')) {
      this.stdout.write(`${message}\n`);
    }
  }

  warn(message: string): void {
    if (this.isLevelEnabled('warn')) {
      this.stderr.write(`${this.colors.yellow(message)}\n`);
    }
  }

  error(message: string): void {
    this.stderr.write(`${this.colors.red(message)}\n`);
  }
}

/**
 * Create a logger. Call once per run and pass it down explicitly.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new LineLogger(options);
}
