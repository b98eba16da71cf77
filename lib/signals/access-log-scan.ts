import { classifyInfrastructure, InfrastructureFilter, parseAccessLogLine, readLastLines } from '../access-log';
import { isMissingFile } from '../errors';
import { ActivitySignal, SignalResult } from './types';

export interface AccessLogScanOptions extends InfrastructureFilter {
  accessLogPath: string;
  scanLines: number;
  windowSeconds: number;
}

/**
 * Scans the tail of the access log for requests that are recent and not
 * infrastructure traffic.
 */
export class AccessLogScanSignal implements ActivitySignal {
  readonly kind = 'access-log-scan' as const;

  constructor(private readonly options: AccessLogScanOptions) {}

  async sample(nowMs: number): Promise<SignalResult> {
    let lines: string[];
    try {
      lines = await readLastLines(this.options.accessLogPath, this.options.scanLines);
    } catch (error) {
      if (isMissingFile(error)) {
        return { kind: this.kind, active: false, reason: 'access log missing' };
      }
      throw error;
    }

    const cutoffMs = nowMs - this.options.windowSeconds * 1000;
    let recent = 0;
    let filtered = 0;
    let latestMs: number | undefined;

    for (const line of lines) {
      const entry = parseAccessLogLine(line);
      if (!entry || entry.timestampMs < cutoffMs) {
        continue;
      }
      if (classifyInfrastructure(entry, this.options)) {
        filtered += 1;
        continue;
      }
      recent += 1;
      latestMs = Math.max(latestMs ?? entry.timestampMs, entry.timestampMs);
    }

    if (latestMs === undefined) {
      return {
        kind: this.kind,
        active: false,
        reason: `no user requests in last ${this.options.windowSeconds}s (${filtered} filtered)`,
      };
    }

    const ageSeconds = Math.max(0, Math.floor((nowMs - latestMs) / 1000));
    return {
      kind: this.kind,
      active: true,
      reason: `${recent} user requests, latest ${ageSeconds}s ago`,
    };
  }
}
