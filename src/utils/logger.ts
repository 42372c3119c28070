/**
 * Diagnostic logging
 *
 * NOTE: This logger is NOT for command results. Reports and answers are
 * written to stdout by the CLI commands; this logger writes to stderr only,
 * so piping `issue-scout analyze ... > report.md` stays clean.
 *
 * Level and timestamps come from LOG_LEVEL and LOG_TIMESTAMPS.
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99,
}

export interface LoggerConfig {
  level: LogLevel;
  useTimestamps: boolean;
  useColors: boolean;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  return LEVEL_NAMES[value.trim().toLowerCase()] ?? fallback;
}

type Colorize = (text: string) => string;

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  /**
   * @param config shared by reference with every child, so setLevel on the
   *   root reaches all scopes
   * @param scope printed as `[scope]` before each message
   */
  constructor(
    private readonly config: LoggerConfig,
    private readonly scope?: string,
    private readonly sink: LogSink = stderrSink
  ) {}

  /** A logger that tags its lines with `scope` */
  child(scope: string): Logger {
    return new Logger(this.config, scope, this.sink);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  debug(message: string): void {
    this.emit(LogLevel.DEBUG, message, chalk.gray);
  }

  info(message: string): void {
    this.emit(LogLevel.INFO, message, chalk.white);
  }

  success(message: string): void {
    this.emit(LogLevel.INFO, message, chalk.green);
  }

  warn(message: string): void {
    this.emit(LogLevel.WARN, message, chalk.yellow);
  }

  error(message: string): void {
    this.emit(LogLevel.ERROR, message, chalk.red);
  }

  newline(): void {
    if (this.isEnabled(LogLevel.INFO)) this.sink('');
  }

  private emit(level: LogLevel, message: string, color: Colorize): void {
    if (!this.isEnabled(level)) return;

    const prefix = this.scope ? `[${this.scope}] ` : '';
    const body = this.config.useColors ? color(prefix + message) : prefix + message;
    const stamp = this.config.useTimestamps ? `${chalk.dim(new Date().toISOString())} ` : '';
    this.sink(stamp + body);
  }
}

export const logger = new Logger({
  level: parseLogLevel(process.env.LOG_LEVEL),
  useTimestamps: process.env.LOG_TIMESTAMPS === '1' || process.env.LOG_TIMESTAMPS === 'true',
  useColors: true,
});

/**
 * Shorthand for CLI commands. Writes to stderr, not stdout.
 */
export const log = {
  debug: (message: string) => logger.debug(message),
  info: (message: string) => logger.info(message),
  success: (message: string) => logger.success(message),
  warn: (message: string) => logger.warn(message),
  error: (message: string) => logger.error(message),
  newline: () => logger.newline(),
};
