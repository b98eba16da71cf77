import * as fs from 'node:fs';
import * as path from 'node:path';

import { errorMessage } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Marker carried by every line so external collectors can grep the stream by state.
 */
export type LogMarker =
  | 'START'
  | 'CONFIG'
  | 'GRACE'
  | 'ACTIVE'
  | 'IDLE'
  | 'SHUTDOWN'
  | 'SKIP'
  | 'STOP'
  | 'DEBUG'
  | 'WARN'
  | 'FATAL';

export type LogFieldValue = string | number | boolean | undefined;
export type LogFields = Record<string, LogFieldValue>;

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  marker: LogMarker;
  message: string;
  fields?: LogFields;
}

export interface LogSink {
  write(line: string, level: LogLevel): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const formatValue = (value: string | number | boolean): string => {
  if (typeof value !== 'string') {
    return String(value);
  }
  return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
};

export const formatFields = (fields: LogFields = {}): string =>
  Object.entries(fields)
    .flatMap(([key, value]) => (value === undefined ? [] : [`${key}=${formatValue(value)}`]))
    .join(' ');

export const formatLogLine = (entry: LogEntry): string => {
  const fields = formatFields(entry.fields);
  const message = fields ? `${entry.message} ${fields}` : entry.message;
  return `${entry.timestamp.toISOString()} | [${entry.marker}] ${message}`.trim();
};

export const consoleSink: LogSink = {
  write(line, level) {
    const stream = LEVEL_ORDER[level] >= LEVEL_ORDER.warn ? process.stderr : process.stdout;
    stream.write(`${line}\n`);
  },
};

/**
 * Appends lines to a file. A failing write is reported once on stderr and the
 * sink keeps trying on later lines, so a full disk never stops the monitor.
 */
export class FileSink implements LogSink {
  private reportedFailure = false;

  constructor(private readonly filePath: string) {}

  write(line: string): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, `${line}\n`, 'utf8');
      this.reportedFailure = false;
    } catch (error) {
      if (!this.reportedFailure) {
        this.reportedFailure = true;
        process.stderr.write(`Failed to append to log file ${this.filePath}: ${errorMessage(error)}\n`);
      }
    }
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  sinks?: LogSink[];
  now?: () => Date;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly sinks: LogSink[];
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sinks = options.sinks ?? [consoleSink];
    this.now = options.now ?? (() => new Date());
  }

  event(marker: LogMarker, message: string, fields?: LogFields, level: LogLevel = 'info'): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const line = formatLogLine({ timestamp: this.now(), level, marker, message, fields });
    for (const sink of this.sinks) {
      sink.write(line, level);
    }
  }

  debug(message: string, fields?: LogFields): void {
    this.event('DEBUG', message, fields, 'debug');
  }

  warn(message: string, error?: unknown, fields?: LogFields): void {
    const text = error === undefined ? message : `${message}: ${errorMessage(error)}`;
    this.event('WARN', text, fields, 'warn');
  }

  fatal(message: string, error?: unknown, fields?: LogFields): void {
    const text = error === undefined ? message : `${message}: ${errorMessage(error)}`;
    this.event('FATAL', text, fields, 'error');
  }
}

export const createLogger = (options: { level: LogLevel; logFile?: string; now?: () => Date }): Logger => {
  const sinks: LogSink[] = [consoleSink];
  if (options.logFile) {
    sinks.push(new FileSink(options.logFile));
  }
  return new Logger({ level: options.level, sinks, now: options.now });
};
