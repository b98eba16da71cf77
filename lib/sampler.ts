import { ErrorCode, toMonitorError } from './errors';
import { Logger } from './logger';
import { ActivitySignal, SignalResult } from './signals/types';

export interface SampleResult {
  /** Logical OR across every signal. */
  active: boolean;
  results: SignalResult[];
}

/**
 * Runs every configured signal once. A signal that throws counts as inactive
 * for this sample; the rest still run.
 */
export class ActivitySampler {
  constructor(
    private readonly signals: readonly ActivitySignal[],
    private readonly logger: Logger,
  ) {}

  async sample(nowMs: number): Promise<SampleResult> {
    const results: SignalResult[] = [];
    for (const signal of this.signals) {
      results.push(await this.sampleOne(signal, nowMs));
    }
    return { active: results.some(result => result.active), results };
  }

  private async sampleOne(signal: ActivitySignal, nowMs: number): Promise<SignalResult> {
    try {
      const result = await signal.sample(nowMs);
      this.logger.debug(`Signal ${signal.kind}: ${result.reason}`, { active: result.active });
      return result;
    } catch (error) {
      const failure = toMonitorError(error, ErrorCode.SignalReadFailed);
      this.logger.warn(`Signal ${signal.kind} failed, treating as inactive`, failure, { code: failure.code });
      return { kind: signal.kind, active: false, reason: `error: ${failure.message}` };
    }
  }
}
