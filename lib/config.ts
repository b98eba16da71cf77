import * as fs from 'node:fs';
import { z } from 'zod';

import { ErrorCode, MonitorError, errorMessage, isMissingFile } from './errors';
import { SIGNAL_KINDS } from './signals/types';

// ============================================================
// Schema
// ============================================================
const seconds = z.number().int().positive();
const port = z.number().int().min(1).max(65535);

export const MonitorConfigSchema = z
  .object({
    idleThresholdSeconds: seconds.default(3600),
    sampleIntervalSeconds: seconds.default(60),
    bootGraceSeconds: z.number().int().nonnegative().default(600),

    // Signal selection, combined by logical OR
    signals: z
      .array(z.enum(SIGNAL_KINDS))
      .min(1)
      .default(['access-log-scan', 'login-sessions'])
      .transform(kinds => Array.from(new Set(kinds))),

    // Reverse-proxy access log
    accessLogPath: z.string().min(1).default('/var/log/nginx/access.log'),
    logScanLines: z.number().int().positive().default(500),
    logScanWindowSeconds: seconds.optional(),
    logRecencyWindowSeconds: seconds.default(300),
    ignoredClients: z.array(z.string()).default(['127.0.0.1', '::1']),
    ignoredUserAgents: z.array(z.string()).default(['ELB-HealthChecker', 'Amazon CloudFront', 'kube-probe']),
    ignoredPaths: z.array(z.string()).default(['/_stcore/health', '/healthz']),

    // Socket table, network and CPU counters
    applicationPorts: z.array(port).default([8501]),
    networkInterface: z.string().min(1).optional(),
    networkActivityThresholdBytes: z.number().int().nonnegative().default(1024),
    cpuBusyThresholdPercent: z.number().min(0).max(100).default(5),
    procRoot: z.string().min(1).default('/proc'),

    // Local files
    stateFile: z.string().min(1).default('/var/lib/idle-monitor/state.json'),
    lockFile: z.string().min(1).default('/run/idle-monitor.lock'),
    logFile: z.string().min(1).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Shutdown
    shutdownCommand: z.array(z.string().min(1)).min(1).default(['/sbin/shutdown', '-h', 'now']),
    dryRun: z.boolean().default(false),
  })
  .strict()
  .transform(config => ({
    ...config,
    logScanWindowSeconds: config.logScanWindowSeconds ?? config.idleThresholdSeconds,
  }));

export type MonitorConfig = z.output<typeof MonitorConfigSchema>;
export type MonitorConfigInput = z.input<typeof MonitorConfigSchema>;

// ============================================================
// Environment variables
// ============================================================
type EnvKind = 'number' | 'numberList' | 'string' | 'list' | 'boolean';

const ENV_PREFIX = 'IDLE_MONITOR_';

const ENV_KEYS: Record<string, { key: keyof MonitorConfigInput; kind: EnvKind }> = {
  IDLE_THRESHOLD_SECONDS: { key: 'idleThresholdSeconds', kind: 'number' },
  SAMPLE_INTERVAL_SECONDS: { key: 'sampleIntervalSeconds', kind: 'number' },
  BOOT_GRACE_SECONDS: { key: 'bootGraceSeconds', kind: 'number' },
  SIGNALS: { key: 'signals', kind: 'list' },
  ACCESS_LOG_PATH: { key: 'accessLogPath', kind: 'string' },
  LOG_SCAN_LINES: { key: 'logScanLines', kind: 'number' },
  LOG_SCAN_WINDOW_SECONDS: { key: 'logScanWindowSeconds', kind: 'number' },
  LOG_RECENCY_WINDOW_SECONDS: { key: 'logRecencyWindowSeconds', kind: 'number' },
  IGNORED_CLIENTS: { key: 'ignoredClients', kind: 'list' },
  IGNORED_USER_AGENTS: { key: 'ignoredUserAgents', kind: 'list' },
  IGNORED_PATHS: { key: 'ignoredPaths', kind: 'list' },
  APPLICATION_PORTS: { key: 'applicationPorts', kind: 'numberList' },
  NETWORK_INTERFACE: { key: 'networkInterface', kind: 'string' },
  NETWORK_ACTIVITY_THRESHOLD_BYTES: { key: 'networkActivityThresholdBytes', kind: 'number' },
  CPU_BUSY_THRESHOLD_PERCENT: { key: 'cpuBusyThresholdPercent', kind: 'number' },
  PROC_ROOT: { key: 'procRoot', kind: 'string' },
  STATE_FILE: { key: 'stateFile', kind: 'string' },
  LOCK_FILE: { key: 'lockFile', kind: 'string' },
  LOG_FILE: { key: 'logFile', kind: 'string' },
  LOG_LEVEL: { key: 'logLevel', kind: 'string' },
  SHUTDOWN_COMMAND: { key: 'shutdownCommand', kind: 'list' },
  DRY_RUN: { key: 'dryRun', kind: 'boolean' },
};

const splitList = (value: string): string[] =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);

const parseEnvValue = (value: string, kind: EnvKind): unknown => {
  switch (kind) {
    case 'number':
      return value.trim() === '' ? Number.NaN : Number(value);
    case 'numberList':
      return splitList(value).map(Number);
    case 'list':
      return splitList(value);
    case 'boolean':
      return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
    case 'string':
      return value;
  }
};

/**
 * Picks `IDLE_MONITOR_*` variables out of an environment. Values are converted
 * to the shape the schema expects but not validated here.
 */
export const readEnvOverrides = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
  const overrides: Record<string, unknown> = {};
  for (const [suffix, { key, kind }] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value !== undefined) {
      overrides[key] = parseEnvValue(value, kind);
    }
  }
  return overrides;
};

// ============================================================
// Loading
// ============================================================
export const readConfigFile = (filePath: string): Record<string, unknown> => {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const reason = isMissingFile(error) ? 'file not found' : errorMessage(error);
    throw new MonitorError(`Cannot read config file ${filePath}: ${reason}`, ErrorCode.ConfigInvalid, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MonitorError(`Config file ${filePath} is not valid JSON`, ErrorCode.ConfigInvalid, error);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MonitorError(`Config file ${filePath} must contain a JSON object`, ErrorCode.ConfigInvalid);
  }
  return { ...parsed };
};

export const parseConfig = (raw: unknown): MonitorConfig => {
  const result = MonitorConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MonitorError(`Invalid configuration: ${details}`, ErrorCode.ConfigInvalid, result.error);
  }
  return result.data;
};

export interface LoadConfigOptions {
  /** Explicit config file; falls back to `IDLE_MONITOR_CONFIG`. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, typically from command-line flags. */
  overrides?: Partial<MonitorConfigInput>;
}

/**
 * Resolves the effective configuration: defaults, then the JSON file, then
 * `IDLE_MONITOR_*` environment variables, then explicit overrides.
 */
export const loadConfig = (options: LoadConfigOptions = {}): MonitorConfig => {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env[`${ENV_PREFIX}CONFIG`];
  const fromFile = configPath ? readConfigFile(configPath) : {};

  return parseConfig({
    ...fromFile,
    ...readEnvOverrides(env),
    ...options.overrides,
  });
};
