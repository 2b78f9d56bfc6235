/**
 * logger.ts
 * Structured logger for a bldrun run.
 *
 * Use ConsoleLogger in the CLI; SilentLogger in tests or when callers
 * do not care about output. Pipeline classes accept an optional Logger
 * and default to SilentLogger.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export const LOG_PREFIX = 'bldrun';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/** `HH:MM:SS.mmm [prefix] [LEVEL] message  {"context":...}` */
export function formatLogLine(
  level: Exclude<LogLevel, 'silent'>,
  prefix: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const ts = now.toISOString().slice(11, 23);
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${LEVEL_LABEL[level]}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// LevelFilteredLogger: shared level gate
// ---------------------------------------------------------------------------

abstract class LevelFilteredLogger implements Logger {
  private readonly _minLevel: number;
  protected readonly _prefix: string;

  constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract _emit(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void;

  private _log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this._emit(level, message, context);
  }
}

// ---------------------------------------------------------------------------
// ConsoleLogger
// ---------------------------------------------------------------------------

/**
 * Writes debug/info to stdout and warn/error to stderr.
 * `plain` drops the timestamp/level prefix so messages read like CLI output.
 */
export class ConsoleLogger extends LevelFilteredLogger {
  private readonly _plain: boolean;

  constructor(level: LogLevel = 'info', prefix = LOG_PREFIX, plain = false) {
    super(level, prefix);
    this._plain = plain;
  }

  protected _emit(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    const line = this._plain
      ? message
      : formatLogLine(level, this._prefix, message, context);
    const stream = level === 'warn' || level === 'error' ? process.stderr : process.stdout;
    stream.write(line + '\n');
  }
}

// ---------------------------------------------------------------------------
// FileLogger: buffers log lines for a --debug audit file
// ---------------------------------------------------------------------------

export class FileLogger extends LevelFilteredLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = LOG_PREFIX) {
    super(level, prefix);
  }

  get lines(): readonly string[] {
    return this._lines;
  }

  /** Flush accumulated log lines to a file. */
  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected _emit(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    this._lines.push(formatLogLine(level, this._prefix, message, context));
  }
}

// ---------------------------------------------------------------------------
// TeeLogger: writes to both console and file
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _file: FileLogger;

  constructor(level: LogLevel = 'debug', prefix = LOG_PREFIX) {
    this._console = new ConsoleLogger(level, prefix);
    this._file = new FileLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._file.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._file.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._file.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._file.error(message, context);
  }

  flush(filePath: string): void {
    this._file.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// SilentLogger: used as default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
