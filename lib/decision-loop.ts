import { Clock, toEpochSeconds } from './clock';
import { ErrorCode, MonitorError, errorMessage } from './errors';
import { Host } from './host';
import { IdleStatus, IdleTimer } from './idle-timer';
import { Logger } from './logger';
import { ActivitySampler, SampleResult } from './sampler';

export enum MonitorState {
  Active = 'ACTIVE',
  IdlePending = 'IDLE_PENDING',
  ShutdownTriggered = 'SHUTDOWN_TRIGGERED',
}

export type LoopOutcome =
  | { kind: 'shutdown'; status: IdleStatus }
  | { kind: 'shutdown-failed'; error: MonitorError }
  | { kind: 'stopped'; state: MonitorState }
  | { kind: 'completed'; state: MonitorState };

export interface DecisionLoopOptions {
  sampleIntervalSeconds: number;
  bootGraceSeconds: number;
}

export interface DecisionLoopDeps {
  sampler: ActivitySampler;
  timer: IdleTimer;
  host: Host;
  clock: Clock;
  logger: Logger;
}

export interface RunOptions {
  /** Run a single iteration, for timer-driven invocation. */
  once?: boolean;
  /** Ends the loop at the next iteration boundary. */
  signal?: AbortSignal;
}

const seconds = (value: number): string => `${value}s`;

const describeActive = (sample: SampleResult): string =>
  sample.results
    .filter(result => result.active)
    .map(result => `${result.kind}: ${result.reason}`)
    .join('; ');

/**
 * ACTIVE -> IDLE_PENDING -> SHUTDOWN_TRIGGERED state machine driven by
 * periodic activity samples.
 *
 * Once SHUTDOWN_TRIGGERED is reached the power-off request is issued within
 * the same iteration and the loop never samples again.
 */
export class DecisionLoop {
  private state = MonitorState.Active;
  private terminal?: LoopOutcome;

  constructor(
    private readonly options: DecisionLoopOptions,
    private readonly deps: DecisionLoopDeps,
  ) {}

  get currentState(): MonitorState {
    return this.state;
  }

  async run(options: RunOptions = {}): Promise<LoopOutcome> {
    const { clock } = this.deps;

    for (;;) {
      if (options.signal?.aborted) {
        return this.stop();
      }

      const outcome = await this.iterate();
      if (outcome) {
        return outcome;
      }
      if (options.once) {
        return { kind: 'completed', state: this.state };
      }

      await clock.sleep(this.options.sampleIntervalSeconds * 1000, options.signal);
    }
  }

  /**
   * One sample-observe-decide pass. Returns an outcome only when the loop has
   * reached its terminal state.
   */
  async iterate(): Promise<LoopOutcome | undefined> {
    if (this.terminal) {
      return this.terminal;
    }

    const { sampler, timer, clock, logger } = this.deps;
    const nowMs = clock.now();
    const nowSeconds = toEpochSeconds(nowMs);

    const uptime = await this.readUptime();
    if (uptime !== undefined && uptime < this.options.bootGraceSeconds) {
      await timer.reset();
      this.state = MonitorState.Active;
      logger.event('GRACE', 'Boot grace period, idle clock held', {
        state: this.state,
        elapsed: seconds(0),
        remaining: seconds(timer.thresholdSeconds),
        uptime: seconds(uptime),
        grace_remaining: seconds(this.options.bootGraceSeconds - uptime),
      });
      return undefined;
    }

    const sample = await sampler.sample(nowMs);
    const bootedAt = uptime === undefined ? undefined : nowSeconds - uptime;
    const status = await timer.observe(sample.active, nowSeconds, bootedAt);
    const previous = this.state;

    if (status.triggered) {
      this.state = MonitorState.ShutdownTriggered;
      return this.shutdown(status);
    }

    const fields = {
      elapsed: seconds(status.elapsedSeconds),
      remaining: seconds(status.remainingSeconds),
    };

    if (sample.active) {
      this.state = MonitorState.Active;
      const message = previous === MonitorState.IdlePending ? 'Activity observed, idle clock reset' : 'Activity observed';
      logger.event('ACTIVE', message, { state: this.state, ...fields, by: describeActive(sample) });
    } else {
      this.state = MonitorState.IdlePending;
      const message = previous === MonitorState.IdlePending ? 'No activity' : 'No activity, idle clock running';
      logger.event('IDLE', message, { state: this.state, ...fields });
    }
    return undefined;
  }

  private async shutdown(status: IdleStatus): Promise<LoopOutcome> {
    const { host, logger, timer } = this.deps;
    const reason = `Idle shutdown: no activity for ${status.elapsedSeconds}s (limit ${timer.thresholdSeconds}s)`;

    logger.event('SHUTDOWN', 'Idle limit reached, powering off', {
      state: this.state,
      elapsed: seconds(status.elapsedSeconds),
      remaining: seconds(0),
    });

    let outcome: LoopOutcome;
    try {
      await host.shutdown(reason);
      outcome = { kind: 'shutdown', status };
      // The next boot starts a fresh streak.
      await timer.reset();
    } catch (error) {
      const failure =
        error instanceof MonitorError
          ? error
          : new MonitorError(errorMessage(error), ErrorCode.ShutdownFailed, error);
      logger.fatal('Shutdown request failed', failure, { code: failure.code });
      outcome = { kind: 'shutdown-failed', error: failure };
    }
    this.terminal = outcome;
    return outcome;
  }

  private stop(): LoopOutcome {
    this.deps.logger.event('STOP', 'Monitor stopped', { state: this.state });
    return { kind: 'stopped', state: this.state };
  }

  private async readUptime(): Promise<number | undefined> {
    try {
      return await this.deps.host.uptimeSeconds();
    } catch (error) {
      this.deps.logger.warn('Cannot read host uptime, skipping boot grace check', error);
      return undefined;
    }
  }
}
