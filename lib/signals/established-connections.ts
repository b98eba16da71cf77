import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { isMissingFile } from '../errors';
import { ActivitySignal, SignalResult } from './types';

const TCP_ESTABLISHED = '01';

export interface EstablishedConnectionsOptions {
  procRoot: string;
  ports: readonly number[];
}

/**
 * Counts ESTABLISHED rows of a `/proc/net/tcp`-style table whose local port is
 * one of `ports`.
 */
export const countEstablished = (table: string, ports: readonly number[]): number => {
  let count = 0;
  for (const line of table.split('\n').slice(1)) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 4 || fields[3] !== TCP_ESTABLISHED) {
      continue;
    }
    const localPort = Number.parseInt(fields[1].split(':').pop() ?? '', 16);
    if (ports.includes(localPort)) {
      count += 1;
    }
  }
  return count;
};

/**
 * Weak corroborating signal: a lingering websocket looks the same as a user
 * who is actively clicking.
 */
export class EstablishedConnectionsSignal implements ActivitySignal {
  readonly kind = 'established-connections' as const;

  constructor(private readonly options: EstablishedConnectionsOptions) {}

  async sample(): Promise<SignalResult> {
    const tables = ['tcp', 'tcp6'].map(name => path.join(this.options.procRoot, 'net', name));
    let available = 0;
    let count = 0;

    for (const table of tables) {
      try {
        count += countEstablished(await fs.readFile(table, 'utf8'), this.options.ports);
        available += 1;
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }

    if (available === 0) {
      return { kind: this.kind, active: false, reason: 'socket tables unavailable' };
    }
    return {
      kind: this.kind,
      active: count > 0,
      reason: `${count} established on port ${this.options.ports.join(',')}`,
    };
  }
}
