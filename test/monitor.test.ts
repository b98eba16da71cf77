import * as fs from 'node:fs';
import * as path from 'node:path';

import { MonitorConfig, parseConfig } from '../lib/config';
import { EXIT_OK, EXIT_SHUTDOWN_FAILED, runMonitor } from '../lib/monitor';
import { FakeHost, ManualClock, START_MS, ScriptedSignal, makeTempDir, memoryLogger, removeDir } from './helpers';

describe('runMonitor', () => {
  let dir: string;
  let config: MonitorConfig;

  beforeEach(() => {
    dir = makeTempDir();
    config = parseConfig({
      idleThresholdSeconds: 120,
      sampleIntervalSeconds: 60,
      bootGraceSeconds: 600,
      stateFile: path.join(dir, 'state.json'),
      lockFile: path.join(dir, 'idle-monitor.lock'),
    });
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('is a successful no-op while another live monitor holds the lock', async () => {
    fs.writeFileSync(config.lockFile, '4242\n');
    const { logger, sink } = memoryLogger();
    const host = new FakeHost();
    const signal = new ScriptedSignal();

    const result = await runMonitor(config, {
      overrides: { logger, host, signals: [signal], pid: 5000, isAlive: pid => pid === 4242 },
    });

    expect(result).toEqual({ kind: 'skipped', holderPid: 4242, exitCode: EXIT_OK });
    expect(signal.calls).toBe(0);
    expect(fs.readFileSync(config.lockFile, 'utf8')).toBe('4242\n');
    expect(sink.lines).toEqual([
      `2001-09-09T01:46:40.000Z | [SKIP] Another monitor holds the lock, exiting holder=4242 lock=${config.lockFile}`,
    ]);
  });

  test('runs to shutdown, then releases the lock', async () => {
    const clock = new ManualClock();
    const { logger, sink } = memoryLogger(clock, 'info');
    const host = new FakeHost();

    const result = await runMonitor(config, {
      overrides: { logger, clock, host, signals: [new ScriptedSignal()], pid: 5000, isAlive: () => false },
    });

    expect(result).toMatchObject({ kind: 'ran', outcome: { kind: 'shutdown' }, exitCode: EXIT_OK });
    expect(host.shutdowns).toEqual(['Idle shutdown: no activity for 120s (limit 120s)']);
    expect(fs.existsSync(config.lockFile)).toBe(false);
    expect(sink.lines.slice(0, 2)).toEqual([
      '2001-09-09T01:46:40.000Z | [START] Idle monitor started pid=5000 mode=loop dry_run=false',
      `2001-09-09T01:46:40.000Z | [CONFIG] Effective configuration idle_limit=120s interval=60s boot_grace=600s signals=access-log-scan,login-sessions state_file=${config.stateFile}`,
    ]);
  });

  test('exits non-zero when the shutdown request fails', async () => {
    const { logger } = memoryLogger(undefined, 'info');
    const host = new FakeHost();
    host.failWith = new Error('shutdown: command not permitted');

    const result = await runMonitor(config, {
      overrides: { logger, clock: new ManualClock(), host, signals: [new ScriptedSignal()], pid: 5000 },
    });

    expect(result).toMatchObject({ kind: 'ran', outcome: { kind: 'shutdown-failed' }, exitCode: EXIT_SHUTDOWN_FAILED });
    expect(host.shutdowns).toHaveLength(1);
    expect(fs.existsSync(config.lockFile)).toBe(false);
  });

  test('dry run logs the shutdown instead of issuing it', async () => {
    const { logger, sink } = memoryLogger(undefined, 'info');
    const host = new FakeHost();

    const result = await runMonitor(
      { ...config, dryRun: true },
      { overrides: { logger, clock: new ManualClock(), host, signals: [new ScriptedSignal()], pid: 5000 } },
    );

    expect(result.exitCode).toBe(EXIT_OK);
    expect(host.shutdowns).toEqual([]);
    expect(sink.withMarker('SHUTDOWN')).toEqual([
      '2001-09-09T01:46:40.000Z | [SHUTDOWN] Idle limit reached, powering off state=SHUTDOWN_TRIGGERED elapsed=120s remaining=0s',
      '2001-09-09T01:46:40.000Z | [SHUTDOWN] Dry run, not powering off reason="Idle shutdown: no activity for 120s (limit 120s)"',
    ]);
  });

  test('a freshly booted host is not powered off by an idle streak from before the reboot', async () => {
    fs.writeFileSync(
      config.stateFile,
      JSON.stringify({ firstIdleTimestamp: START_MS / 1000 - 172_800, updatedAt: START_MS / 1000 - 172_000 }),
    );
    const host = new FakeHost(601);

    const result = await runMonitor(config, {
      once: true,
      overrides: {
        logger: memoryLogger().logger,
        clock: new ManualClock(),
        host,
        signals: [new ScriptedSignal()],
        pid: 5000,
      },
    });

    expect(result).toMatchObject({ kind: 'ran', outcome: { kind: 'completed', state: 'IDLE_PENDING' } });
    expect(host.shutdowns).toEqual([]);
  });

  test('once-mode invocations share the idle clock through the state file', async () => {
    const host = new FakeHost();
    const invoke = (atMs: number) =>
      runMonitor(config, {
        once: true,
        overrides: {
          logger: memoryLogger().logger,
          clock: new ManualClock(atMs),
          host,
          signals: [new ScriptedSignal()],
          pid: 5000,
        },
      });

    await expect(invoke(START_MS)).resolves.toMatchObject({ outcome: { kind: 'completed', state: 'IDLE_PENDING' } });
    await expect(invoke(START_MS + 60_000)).resolves.toMatchObject({ outcome: { kind: 'completed' } });
    expect(host.shutdowns).toEqual([]);

    await expect(invoke(START_MS + 120_000)).resolves.toMatchObject({ outcome: { kind: 'shutdown' } });
    expect(host.shutdowns).toHaveLength(1);
  });
});
