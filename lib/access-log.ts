import { promises as fs } from 'node:fs';

/**
 * One reverse-proxy request in nginx "combined" (or "main") log format:
 *
 *   203.0.113.7 - - [19/Oct/2026:07:29:01 +0000] "GET / HTTP/1.1" 200 612 "-" "Mozilla/5.0"
 */
export interface AccessLogEntry {
  client: string;
  timestampMs: number;
  path?: string;
  userAgent?: string;
  /** `X-Forwarded-For` as logged by the "main" format. */
  forwardedFor?: string;
}

export interface InfrastructureFilter {
  /**
   * Exact origin addresses, or prefixes when the pattern ends in `*`. Matched
   * against the request's origin (see `originOf`).
   */
  ignoredClients: readonly string[];
  /** Case-insensitive substrings of the user agent. */
  ignoredUserAgents: readonly string[];
  /** Request path prefixes. */
  ignoredPaths: readonly string[];
}

const LINE_PATTERN =
  /^(\S+) \S+ \S+ \[([^\]]+)\] "([^"]*)" (\d{3}|-) \S+(?: "([^"]*)" "([^"]*)")?(?: "([^"]*)")?/;

const TIMESTAMP_PATTERN = /^(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value === '' || value === '-' ? undefined : value;

/**
 * Parses `dd/Mon/yyyy:HH:MM:SS +ZZZZ` into epoch milliseconds.
 */
export const parseLogTimestamp = (value: string): number | undefined => {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, day, monthName, year, hours, minutes, secs, sign, offsetHours, offsetMinutes] = match;
  const month = MONTHS.indexOf(monthName.toLowerCase());
  if (month < 0) {
    return undefined;
  }

  const local = Date.UTC(Number(year), month, Number(day), Number(hours), Number(minutes), Number(secs));
  const offsetMs = (Number(offsetHours) * 60 + Number(offsetMinutes)) * 60_000;
  return sign === '+' ? local - offsetMs : local + offsetMs;
};

export const parseAccessLogLine = (line: string): AccessLogEntry | undefined => {
  const match = LINE_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }
  const [, client, rawTimestamp, request, , , userAgent, forwardedFor] = match;
  const timestampMs = parseLogTimestamp(rawTimestamp);
  if (timestampMs === undefined) {
    return undefined;
  }

  const path = request.split(' ')[1];
  return {
    client,
    timestampMs,
    path: emptyToUndefined(path),
    userAgent: emptyToUndefined(userAgent),
    forwardedFor: emptyToUndefined(forwardedFor),
  };
};

const matchesClient = (client: string, pattern: string): boolean =>
  pattern.endsWith('*') ? client.startsWith(pattern.slice(0, -1)) : client === pattern;

/**
 * Address the request came from: the first `X-Forwarded-For` hop when a load
 * balancer logged one, otherwise the connecting client.
 */
export const originOf = (entry: AccessLogEntry): string => {
  const firstHop = entry.forwardedFor?.split(',')[0]?.trim();
  return firstHop || entry.client;
};

/**
 * Returns why an entry is infrastructure noise (health checks, CDN fetches,
 * loopback probes), or `undefined` when it looks like real usage.
 */
export const classifyInfrastructure = (entry: AccessLogEntry, filter: InfrastructureFilter): string | undefined => {
  const origin = originOf(entry);
  if (filter.ignoredClients.some(pattern => matchesClient(origin, pattern))) {
    return `client ${origin}`;
  }

  const userAgent = entry.userAgent?.toLowerCase();
  if (userAgent) {
    const agent = filter.ignoredUserAgents.find(pattern => pattern && userAgent.includes(pattern.toLowerCase()));
    if (agent) {
      return `user agent ${agent}`;
    }
  }

  const path = entry.path;
  if (path) {
    const prefix = filter.ignoredPaths.find(pattern => pattern && path.startsWith(pattern));
    if (prefix) {
      return `path ${prefix}`;
    }
  }

  return undefined;
};

/**
 * Reads up to `maxLines` non-empty lines from the end of a file without loading
 * the whole file. Throws the underlying error when the file cannot be opened.
 */
export const readLastLines = async (filePath: string, maxLines: number, chunkSize = 64 * 1024): Promise<string[]> => {
  if (maxLines <= 0) {
    return [];
  }

  const handle = await fs.open(filePath, 'r');
  try {
    const { size } = await handle.stat();
    const chunks: Buffer[] = [];
    let position = size;
    let newlines = 0;

    while (position > 0 && newlines <= maxLines) {
      const length = Math.min(chunkSize, position);
      position -= length;
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      const chunk = buffer.subarray(0, bytesRead);
      chunks.unshift(chunk);
      for (const byte of chunk) {
        if (byte === 0x0a) {
          newlines += 1;
        }
      }
    }

    const segments = Buffer.concat(chunks).toString('utf8').split('\n');
    // The first segment is a partial line unless we reached the start of the file.
    if (position > 0) {
      segments.shift();
    }
    return segments.filter(segment => segment.trim() !== '').slice(-maxLines);
  } finally {
    await handle.close();
  }
};
