/**
 * Structured JSON Logger
 */

import fs from 'node:fs';
import path from 'node:path';
import { nanoid } from 'nanoid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LogContext {
  run_id?: string;
  command?: string;
  component?: string;
  strategy?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  run_id?: string;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Every entry is also appended to this file as one JSON line */
  file?: string;
  silent?: boolean;
}

function renderField(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && !Number.isInteger(value)) return value.toFixed(3);
  return JSON.stringify(value);
}

export class Logger {
  private level: LogLevel = 'info';
  private format: LogFormat = 'json';
  private logFile?: string;
  private silent = false;

  constructor(options: LoggerOptions = {}, private context: LogContext = {}) {
    this.configure(options);
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.format) this.format = options.format;
    if (options.silent !== undefined) this.silent = options.silent;
    if (options.file) {
      this.logFile = options.file;
      fs.mkdirSync(path.dirname(options.file), { recursive: true });
    }
  }

  setContext(ctx: LogContext): void {
    this.context = { ...this.context, ...ctx };
  }

  /** Same sinks and level, extra context on every entry */
  child(ctx: LogContext): Logger {
    return new Logger(
      { level: this.level, format: this.format, file: this.logFile, silent: this.silent },
      { ...this.context, ...ctx }
    );
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Pretty lines put the context after the message as key=value pairs, so
   * fact bindings and strategy ids stay readable in a terminal.
   */
  private formatEntry(entry: LogEntry): string {
    if (this.format === 'json') {
      return JSON.stringify(entry);
    }

    const runId = entry.run_id ? ` [${entry.run_id.slice(0, 8)}]` : '';
    const fields = Object.entries(entry.context ?? {})
      .filter(([key, value]) => key !== 'run_id' && key !== 'command' && value !== undefined)
      .map(([key, value]) => `${key}=${renderField(value)}`);
    const suffix = fields.length > 0 ? ` ${fields.join(' ')}` : '';

    return `${LEVEL_COLORS[entry.level]}[${entry.level.toUpperCase()}]${RESET}${runId} ${entry.message}${suffix}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      run_id: this.context.run_id || context?.run_id,
      context: { ...this.context, ...context },
    };

    // stdout carries command output, so diagnostics go to stderr
    console.error(this.formatEntry(entry));

    if (this.logFile) {
      fs.appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export const logger = new Logger();

export function createRunId(): string {
  return nanoid();
}

export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
}
