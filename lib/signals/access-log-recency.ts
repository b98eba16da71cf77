import { promises as fs } from 'node:fs';

import { isMissingFile } from '../errors';
import { ActivitySignal, SignalResult } from './types';

export interface AccessLogRecencyOptions {
  accessLogPath: string;
  windowSeconds: number;
}

/**
 * Active when the access log was written within the window. Coarse: any write
 * counts, health checks included.
 */
export class AccessLogRecencySignal implements ActivitySignal {
  readonly kind = 'access-log-recency' as const;

  constructor(private readonly options: AccessLogRecencyOptions) {}

  async sample(nowMs: number): Promise<SignalResult> {
    let mtimeMs: number;
    try {
      ({ mtimeMs } = await fs.stat(this.options.accessLogPath));
    } catch (error) {
      if (isMissingFile(error)) {
        return { kind: this.kind, active: false, reason: 'access log missing' };
      }
      throw error;
    }

    const ageSeconds = Math.max(0, Math.floor((nowMs - mtimeMs) / 1000));
    return {
      kind: this.kind,
      active: ageSeconds < this.options.windowSeconds,
      reason: `log written ${ageSeconds}s ago`,
    };
  }
}
