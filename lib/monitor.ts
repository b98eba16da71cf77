import { Clock, systemClock } from './clock';
import { CommandRunner } from './command';
import { MonitorConfig } from './config';
import { DecisionLoop, LoopOutcome } from './decision-loop';
import { DryRunHost, Host, LinuxHost } from './host';
import { IdleStateStore } from './idle-state-store';
import { IdleTimer } from './idle-timer';
import { Logger, createLogger } from './logger';
import { ActivitySampler } from './sampler';
import { ActivitySignal, createSignals } from './signals';
import { ProcessProbe, SingletonGuard } from './singleton-guard';

export const EXIT_OK = 0;
export const EXIT_SHUTDOWN_FAILED = 1;
export const EXIT_STARTUP_FAILED = 2;

export type MonitorResult =
  | { kind: 'skipped'; holderPid: number; exitCode: number }
  | { kind: 'ran'; outcome: LoopOutcome; exitCode: number };

/**
 * Collaborators a caller may swap out; everything defaults to the real host.
 */
export interface MonitorOverrides {
  logger?: Logger;
  clock?: Clock;
  host?: Host;
  signals?: ActivitySignal[];
  run?: CommandRunner;
  pid?: number;
  isAlive?: ProcessProbe;
}

export interface MonitorRunOptions {
  once?: boolean;
  signal?: AbortSignal;
  overrides?: MonitorOverrides;
}

export const exitCodeFor = (outcome: LoopOutcome): number =>
  outcome.kind === 'shutdown-failed' ? EXIT_SHUTDOWN_FAILED : EXIT_OK;

/**
 * Runs the monitor under the host-wide singleton lock.
 *
 * When another live process holds the lock this is a successful no-op. The
 * lock is released when the loop ends, and by an `exit` hook if the process
 * dies some other way while the loop is running.
 */
export const runMonitor = async (config: MonitorConfig, options: MonitorRunOptions = {}): Promise<MonitorResult> => {
  const overrides = options.overrides ?? {};
  const clock = overrides.clock ?? systemClock;
  const logger =
    overrides.logger ?? createLogger({ level: config.logLevel, logFile: config.logFile, now: () => new Date(clock.now()) });

  const guard = new SingletonGuard({
    lockFile: config.lockFile,
    logger,
    pid: overrides.pid,
    isAlive: overrides.isAlive,
  });

  const lock = guard.acquire();
  if (!lock.acquired) {
    logger.event('SKIP', 'Another monitor holds the lock, exiting', { holder: lock.holderPid, lock: config.lockFile });
    return { kind: 'skipped', holderPid: lock.holderPid, exitCode: EXIT_OK };
  }

  const releaseOnExit = (): void => guard.release();
  process.once('exit', releaseOnExit);

  try {
    logger.event('START', 'Idle monitor started', {
      pid: overrides.pid ?? process.pid,
      mode: options.once ? 'once' : 'loop',
      dry_run: config.dryRun,
    });
    logger.event('CONFIG', 'Effective configuration', {
      idle_limit: `${config.idleThresholdSeconds}s`,
      interval: `${config.sampleIntervalSeconds}s`,
      boot_grace: `${config.bootGraceSeconds}s`,
      signals: config.signals.join(','),
      state_file: config.stateFile,
    });

    const baseHost =
      overrides.host ??
      new LinuxHost({
        procRoot: config.procRoot,
        shutdownCommand: config.shutdownCommand,
        logger,
        run: overrides.run,
      });
    const host = config.dryRun ? new DryRunHost(baseHost, logger) : baseHost;

    const sampler = new ActivitySampler(overrides.signals ?? createSignals(config, overrides.run), logger);
    const timer = new IdleTimer(new IdleStateStore(config.stateFile, logger), config.idleThresholdSeconds, logger);
    const loop = new DecisionLoop(
      { sampleIntervalSeconds: config.sampleIntervalSeconds, bootGraceSeconds: config.bootGraceSeconds },
      { sampler, timer, host, clock, logger },
    );

    const outcome = await loop.run({ once: options.once, signal: options.signal });
    return { kind: 'ran', outcome, exitCode: exitCodeFor(outcome) };
  } finally {
    process.removeListener('exit', releaseOnExit);
    guard.release();
  }
};
