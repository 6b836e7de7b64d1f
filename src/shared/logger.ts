/**
 * Logger
 *
 * The screen owns stdout (and stderr would tear the layout), so log lines go
 * to an append-only JSON Lines file instead: one object per line with
 * `time`, `level`, `msg` and any extra fields.
 *
 * Writes are synchronous, same as the rest of the program. A failed append
 * throws; the log file is treated like the terminal, reliable or fatal.
 */

import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { LogLevel } from './types.js';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Target file. No file means a silent logger. */
  file?: string;
  /** Clock override for tests */
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

/**
 * Format one log line (without the trailing newline).
 * Caller fields never overwrite time/level/msg.
 */
export function formatLogLine(
  time: Date,
  level: LogLevel,
  msg: string,
  fields?: LogFields
): string {
  return JSON.stringify({ ...fields, time: time.toISOString(), level, msg });
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Create a logger for the given options. The log directory is created here,
 * before the first line is written.
 */
export function createLogger(options: LoggerOptions): Logger {
  const { file, level: threshold } = options;
  if (!file) return silentLogger;

  const dir = dirname(file);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const now = options.now ?? (() => new Date());
  const write = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (!shouldLog(level, threshold)) return;
    appendFileSync(file, formatLogLine(now(), level, msg, fields) + '\n', 'utf-8');
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
  };
}
