export const SIGNAL_KINDS = [
  'access-log-recency',
  'access-log-scan',
  'established-connections',
  'login-sessions',
  'network-bytes',
  'cpu-usage',
] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

export interface SignalResult {
  kind: SignalKind;
  active: boolean;
  /** Short human-readable explanation, written to the log line of the sample. */
  reason: string;
}

/**
 * One independent source of evidence about whether the workspace is in use.
 *
 * Implementations report `active: false` when their source does not exist;
 * they may throw on unexpected read failures, which the sampler absorbs.
 */
export interface ActivitySignal {
  readonly kind: SignalKind;
  sample(nowMs: number): Promise<SignalResult>;
}
