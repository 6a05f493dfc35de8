/**
 * Diagnostics for `spl`, always on stderr: stdout carries command output only.
 * Lines are JSON when stderr is not a terminal.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const LogLevelSchema = z.enum(LOG_LEVELS);

type LogContext = Record<string, unknown>;

const ANSI: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const ANSI_RESET = '\x1b[0m';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  level?: LogLevel;
  forceJson?: boolean;
  forcePretty?: boolean;
}

abstract class LogMethods {
  protected abstract write(level: LogLevel, message: string, context?: LogContext): void;

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }
}

class Logger extends LogMethods {
  private level: LogLevel = 'warn';
  private format: 'auto' | 'json' | 'pretty' = 'auto';

  configure({ level, forceJson, forcePretty }: LoggerOptions): void {
    if (level) this.level = level;
    if (forceJson) this.format = 'json';
    else if (forcePretty) this.format = 'pretty';
    else if (forceJson === false || forcePretty === false) this.format = 'auto';
  }

  getLevel(): LogLevel {
    return this.level;
  }

  child(prefix: string, context: LogContext = {}): ChildLogger {
    return new ChildLogger(this, prefix, context);
  }

  emit(level: LogLevel, message: string, context?: LogContext): void {
    this.write(level, message, context);
  }

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (context && Object.keys(context).length > 0) entry.context = context;

    const json = this.format === 'json' || (this.format === 'auto' && !process.stderr.isTTY);
    if (json) {
      console.error(JSON.stringify(entry));
      return;
    }
    const time = entry.timestamp.slice(11, 23);
    const tag = `[${level.toUpperCase().padEnd(5)}]`;
    const extra = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    console.error(`${time} ${ANSI[level]}${tag}${ANSI_RESET} ${message}${extra}`);
  }
}

/** Prefixes messages with `[prefix]` and merges a fixed context into every entry. */
class ChildLogger extends LogMethods {
  constructor(
    private readonly parent: Logger,
    private readonly prefix: string,
    private readonly context: LogContext,
  ) {
    super();
  }

  protected write(level: LogLevel, message: string, context?: LogContext): void {
    this.parent.emit(level, `[${this.prefix}] ${message}`, { ...this.context, ...context });
  }
}

export const logger = new Logger();

export { Logger, ChildLogger };
