import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { Clock } from '../lib/clock';
import { Host } from '../lib/host';
import { LogLevel, LogSink, Logger } from '../lib/logger';
import { ActivitySignal, SignalKind, SignalResult } from '../lib/signals/types';

export const START_MS = 1_000_000_000_000;

export class ManualClock implements Clock {
  sleeps = 0;

  constructor(private current: number = START_MS) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    this.sleeps += 1;
    this.current += ms;
  }
}

export class MemorySink implements LogSink {
  readonly lines: string[] = [];
  readonly levels: LogLevel[] = [];

  write(line: string, level: LogLevel): void {
    this.lines.push(line);
    this.levels.push(level);
  }

  withMarker(marker: string): string[] {
    return this.lines.filter(line => line.includes(`| [${marker}] `));
  }
}

export const memoryLogger = (clock?: Clock, level: LogLevel = 'debug'): { logger: Logger; sink: MemorySink } => {
  const sink = new MemorySink();
  const now = clock ? () => new Date(clock.now()) : () => new Date(START_MS);
  return { logger: new Logger({ level, sinks: [sink], now }), sink };
};

/**
 * Signal whose verdict for the n-th call (1-based) comes from `activeOn`.
 */
export class ScriptedSignal implements ActivitySignal {
  calls = 0;

  constructor(
    private readonly activeOn: (call: number) => boolean = () => false,
    readonly kind: SignalKind = 'access-log-scan',
  ) {}

  async sample(): Promise<SignalResult> {
    this.calls += 1;
    const active = this.activeOn(this.calls);
    return { kind: this.kind, active, reason: active ? 'scripted activity' : 'scripted idle' };
  }
}

export class FakeHost implements Host {
  readonly shutdowns: string[] = [];
  failWith?: Error;

  constructor(public uptime = 86_400) {}

  async uptimeSeconds(): Promise<number> {
    return this.uptime;
  }

  async shutdown(reason: string): Promise<void> {
    this.shutdowns.push(reason);
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export const makeTempDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'idle-monitor-'));

export const removeDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const pad = (value: number): string => String(value).padStart(2, '0');

/** Formats epoch milliseconds as an nginx `$time_local` value in UTC. */
export const formatLogTime = (ms: number): string => {
  const date = new Date(ms);
  return (
    `${pad(date.getUTCDate())}/${MONTHS[date.getUTCMonth()]}/${date.getUTCFullYear()}:` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} +0000`
  );
};

export const accessLine = (
  ms: number,
  options: { client?: string; path?: string; userAgent?: string } = {},
): string => {
  const client = options.client ?? '10.0.1.25';
  const requestPath = options.path ?? '/';
  const userAgent = options.userAgent ?? 'Mozilla/5.0 (X11; Linux x86_64)';
  return `${client} - - [${formatLogTime(ms)}] "GET ${requestPath} HTTP/1.1" 200 512 "-" "${userAgent}"`;
};
