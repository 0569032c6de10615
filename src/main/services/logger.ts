/**
 * Logger Service for the Backup Generator
 *
 * Entries go to up to three places: an in-memory list (so a run can report
 * its warnings in aggregate when it finishes), an optional console sink with
 * chalk colours, and optional daily log files that rotate at a size limit.
 *
 * Log levels: ERROR (fatal failures), WARN (skipped files, cache problems),
 * INFO (progress), DEBUG (per-file matching detail)
 *
 * Log files: <config dir>/cloudbeats-backup/logs/YYYY-MM-DD.log, rotated to
 * YYYY-MM-DD.1.log, YYYY-MM-DD.2.log, ...
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { PipelineError, isPipelineError, ErrorCategory } from './errors';
import { getDefaultConfigDir } from './settingsManager';
import type { LogLevelName } from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels, most severe first */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/** A recorded log line */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  category: ErrorCategory | null;
  filePath: string | null;
  step: string | null;
  /** Message of the underlying error */
  cause: string | null;
}

/** Optional context attached to a log call */
export interface LogContext {
  category?: ErrorCategory;
  filePath?: string;
  step?: string;
  cause?: string;
}

/** Writable stream the console sink prints to */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LogFileOptions {
  /** Defaults to <config dir>/cloudbeats-backup/logs */
  dir?: string;
  /** Size at which the day's file is rotated. Defaults to 10 MB */
  rotateAtBytes?: number;
}

export interface LoggerOptions {
  /** Least severe level recorded. Defaults to INFO */
  minLevel?: LogLevel;
  /** e.g. process.stderr */
  console?: LogSink;
  /** Enables log files */
  file?: LogFileOptions;
  /** Clock used for timestamps and file names */
  now?: () => Date;
}

export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
}

// ─── Constants ───────────────────────────────────────────────────────────

const LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

const DEFAULT_ROTATE_AT_BYTES = 10 * 1024 * 1024;

const LEVEL_COLOURS: Record<LogLevel, (text: string) => string> = {
  ERROR: chalk.red,
  WARN: chalk.yellow,
  INFO: chalk.cyan,
  DEBUG: chalk.gray,
};

// ─── Helper Functions ────────────────────────────────────────────────────

export function getDefaultLogDir(): string {
  return path.join(getDefaultConfigDir(), 'logs');
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
};

/** Maps a command-line level name to a LogLevel */
export function toLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_BY_NAME[name];
}

/** Whether `level` passes a `minLevel` threshold */
export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVELS.indexOf(level) <= LEVELS.indexOf(minLevel);
}

function twoDigits(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Name of the log file for a local calendar day: YYYY-MM-DD.log
 */
export function logFileName(date: Date): string {
  return `${date.getFullYear()}-${twoDigits(date.getMonth() + 1)}-${twoDigits(date.getDate())}.log`;
}

/**
 * Builds an entry from a message and its context.
 */
export function buildEntry(
  level: LogLevel,
  message: string,
  context: LogContext = {},
  now: Date = new Date(),
): LogEntry {
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: context.category ?? null,
    filePath: context.filePath ?? null,
    step: context.step ?? null,
    cause: context.cause ?? null,
  };
}

/**
 * Context carried by a PipelineError.
 */
export function errorContext(error: PipelineError): LogContext {
  return {
    category: error.category,
    filePath: error.filePath ?? undefined,
    step: error.step,
    cause: error.cause?.message,
  };
}

/**
 * Formats an entry as one log-file line:
 * `<timestamp> <LEVEL> [<category>: ]<message>[ file="..."][ step="..."][ cause="..."]`
 */
export function formatFileLine(entry: LogEntry): string {
  const fields: Array<[string, string | null]> = [
    ['file', entry.filePath],
    ['step', entry.step],
    ['cause', entry.cause],
  ];
  const head = entry.category ? `${entry.category}: ${entry.message}` : entry.message;
  const tail = fields
    .flatMap(([key, value]) => (value === null ? [] : [`${key}=${JSON.stringify(value)}`]))
    .join(' ');
  return `${entry.timestamp} ${entry.level.padEnd(5)} ${head}${tail ? ` ${tail}` : ''}`;
}

/**
 * Formats an entry for the console: coloured level, message, and the file
 * path and cause when present. Timestamps are left to the log file.
 */
export function formatConsoleLine(entry: LogEntry): string {
  const level = LEVEL_COLOURS[entry.level](entry.level.padEnd(5));
  let line = `${level} ${entry.message}`;
  if (entry.filePath) {
    line += chalk.gray(` (${entry.filePath})`);
  }
  if (entry.cause && entry.cause !== entry.message) {
    line += chalk.gray(`: ${entry.cause}`);
  }
  return line;
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * ```typescript
 * const logger = new Logger({ console: process.stderr, minLevel: 'DEBUG', file: {} });
 * await logger.initialize();
 * logger.warn('Skipped 2 malformed tag cache entries', { category: 'CacheError' });
 * logger.logPipelineError(new ScanError('permission denied', { filePath: '/music' }));
 * ```
 */
export class Logger {
  private readonly minLevel: LogLevel;
  private readonly consoleSink: LogSink | null;
  private readonly logDir: string | null;
  private readonly rotateAtBytes: number;
  private readonly now: () => Date;
  private readonly entries: LogEntry[] = [];

  /** Set once the log directory exists; cleared after a failed write */
  private fileReady = false;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'INFO';
    this.consoleSink = options.console ?? null;
    this.logDir = options.file ? (options.file.dir ?? getDefaultLogDir()) : null;
    this.rotateAtBytes = options.file?.rotateAtBytes ?? DEFAULT_ROTATE_AT_BYTES;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Creates the log directory when file output is enabled. A directory that
   * cannot be created disables file output only.
   */
  async initialize(): Promise<void> {
    if (this.logDir === null) return;

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      this.fileReady = true;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.warn(`Failed to create log directory "${this.logDir}": ${message}. File logging disabled.`);
    }
  }

  /** Today's log file, or null when file output is off */
  getLogFilePath(): string | null {
    return this.logDir === null ? null : path.join(this.logDir, logFileName(this.now()));
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  /**
   * Logs a PipelineError with its category, file, step and cause.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    this.log(level, error.message, errorContext(error));
  }

  /**
   * Logs any thrown value at ERROR, keeping PipelineError context when available.
   */
  logError(error: unknown, context?: LogContext): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error);
    } else {
      this.error(error instanceof Error ? error.message : String(error), context);
    }
  }

  /**
   * Returns the recorded entries, optionally filtered by level and category.
   */
  getEntries(filter: LogFilter = {}): LogEntry[] {
    return this.entries.filter(
      (e) =>
        (!filter.level || e.level === filter.level) &&
        (!filter.category || e.category === filter.category),
    );
  }

  getWarnings(): LogEntry[] {
    return this.getEntries({ level: 'WARN' });
  }

  // ─── Output ────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!isLevelEnabled(level, this.minLevel)) return;

    const entry = buildEntry(level, message, context, this.now());
    this.entries.push(entry);
    this.consoleSink?.write(formatConsoleLine(entry) + '\n');
    if (this.fileReady) {
      this.appendToFile(entry);
    }
  }

  /**
   * Appends to today's file, rotating it first once it has reached
   * rotateAtBytes. The first failed write turns file output off.
   */
  private appendToFile(entry: LogEntry): void {
    const filePath = this.getLogFilePath();
    if (filePath === null) return;

    try {
      if (fs.existsSync(filePath) && fs.statSync(filePath).size >= this.rotateAtBytes) {
        fs.renameSync(filePath, nextRotatedPath(filePath));
      }
      fs.appendFileSync(filePath, formatFileLine(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.fileReady = false;
      const message = error instanceof Error ? error.message : String(error);
      this.consoleSink?.write(`Log file write failed: ${message}. File logging disabled.\n`);
    }
  }
}

/** First unused `<base>.<n>.log` beside a full log file */
function nextRotatedPath(filePath: string): string {
  const base = filePath.slice(0, -'.log'.length);
  let n = 1;
  while (fs.existsSync(`${base}.${n}.log`)) n++;
  return `${base}.${n}.log`;
}
