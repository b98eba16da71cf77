import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { isMissingFile } from '../errors';
import { ActivitySignal, SignalResult } from './types';

export interface CpuTimes {
  total: number;
  idle: number;
}

/**
 * Reads the aggregate `cpu` line of `/proc/stat`. iowait counts as idle.
 */
export const parseCpuTimes = (text: string): CpuTimes | undefined => {
  const line = text.split('\n').find(candidate => /^cpu\s/.test(candidate));
  if (!line) {
    return undefined;
  }
  const [user, nice, system, idle, iowait = 0, irq = 0, softirq = 0, steal = 0] = line
    .trim()
    .split(/\s+/)
    .slice(1)
    .map(Number);
  if ([user, nice, system, idle].some(value => value === undefined || Number.isNaN(value))) {
    return undefined;
  }
  return {
    total: user + nice + system + idle + iowait + irq + softirq + steal,
    idle: idle + iowait,
  };
};

export interface CpuUsageOptions {
  procRoot: string;
  busyThresholdPercent: number;
}

export class CpuUsageSignal implements ActivitySignal {
  readonly kind = 'cpu-usage' as const;
  private previous?: CpuTimes;

  constructor(private readonly options: CpuUsageOptions) {}

  async sample(): Promise<SignalResult> {
    let text: string;
    try {
      text = await fs.readFile(path.join(this.options.procRoot, 'stat'), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { kind: this.kind, active: false, reason: 'cpu counters unavailable' };
      }
      throw error;
    }

    const current = parseCpuTimes(text);
    const previous = this.previous;
    this.previous = current;

    if (!current) {
      return { kind: this.kind, active: false, reason: 'cpu counters unreadable' };
    }
    if (!previous || current.total <= previous.total) {
      return { kind: this.kind, active: false, reason: 'baseline recorded' };
    }

    const totalDelta = current.total - previous.total;
    const idleDelta = current.idle - previous.idle;
    const busyPercent = Math.round(((totalDelta - idleDelta) / totalDelta) * 1000) / 10;
    return {
      kind: this.kind,
      active: busyPercent >= this.options.busyThresholdPercent,
      reason: `cpu ${busyPercent}% busy`,
    };
  }
}
