import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { isMissingFile } from '../errors';
import { ActivitySignal, SignalResult } from './types';

export interface InterfaceCounters {
  rxBytes: number;
  txBytes: number;
}

const VIRTUAL_INTERFACE = /^(lo$|docker|br-|veth)/;

/**
 * Parses `/proc/net/dev` into per-interface byte counters.
 */
export const parseNetDev = (text: string): Map<string, InterfaceCounters> => {
  const counters = new Map<string, InterfaceCounters>();
  for (const line of text.split('\n')) {
    const separator = line.indexOf(':');
    if (separator < 0) {
      continue;
    }
    const name = line.slice(0, separator).trim();
    const fields = line.slice(separator + 1).trim().split(/\s+/).map(Number);
    if (!name || fields.length < 9 || Number.isNaN(fields[0]) || Number.isNaN(fields[8])) {
      continue;
    }
    counters.set(name, { rxBytes: fields[0], txBytes: fields[8] });
  }
  return counters;
};

export interface NetworkBytesOptions {
  procRoot: string;
  thresholdBytes: number;
  /** Single interface to watch; otherwise every non-virtual interface is summed. */
  networkInterface?: string;
}

/**
 * RX+TX byte delta between consecutive samples. Noisy, so only a fallback for
 * hosts without an application access log.
 */
export class NetworkBytesSignal implements ActivitySignal {
  readonly kind = 'network-bytes' as const;
  private previousTotal?: number;

  constructor(private readonly options: NetworkBytesOptions) {}

  async sample(): Promise<SignalResult> {
    const total = await this.readTotal();
    if (total === undefined) {
      this.previousTotal = undefined;
      const target = this.options.networkInterface ?? 'non-loopback interfaces';
      return { kind: this.kind, active: false, reason: `${target} unavailable` };
    }

    const previous = this.previousTotal;
    this.previousTotal = total;

    if (previous === undefined) {
      return { kind: this.kind, active: false, reason: 'baseline recorded' };
    }
    const delta = total - previous;
    if (delta < 0) {
      return { kind: this.kind, active: false, reason: 'counters reset, baseline recorded' };
    }
    return {
      kind: this.kind,
      active: delta > this.options.thresholdBytes,
      reason: `${delta} bytes since last sample`,
    };
  }

  private async readTotal(): Promise<number | undefined> {
    let text: string;
    try {
      text = await fs.readFile(path.join(this.options.procRoot, 'net', 'dev'), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const counters = parseNetDev(text);
    const selected = this.options.networkInterface
      ? [counters.get(this.options.networkInterface)]
      : [...counters.entries()].filter(([name]) => !VIRTUAL_INTERFACE.test(name)).map(([, value]) => value);

    const present = selected.filter((value): value is InterfaceCounters => value !== undefined);
    if (present.length === 0) {
      return undefined;
    }
    return present.reduce((sum, { rxBytes, txBytes }) => sum + rxBytes + txBytes, 0);
  }
}
