import * as fs from 'node:fs';
import * as path from 'node:path';

import { CommandRunner } from '../lib/command';
import { ErrorCode } from '../lib/errors';
import { DryRunHost, LinuxHost, expandShutdownArgs } from '../lib/host';
import { FakeHost, makeTempDir, memoryLogger, removeDir } from './helpers';

describe('LinuxHost', () => {
  let procRoot: string;
  let calls: Array<{ command: string; args: readonly string[] }>;
  let failing: Set<string>;

  const recordingRunner: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    if (failing.has(command)) {
      throw new Error(`${command} exited with code 1`);
    }
    return '';
  };

  beforeEach(() => {
    procRoot = makeTempDir();
    calls = [];
    failing = new Set();
  });

  afterEach(() => {
    removeDir(procRoot);
  });

  const createHost = (shutdownCommand: string[] = ['/sbin/shutdown', '-h', 'now']) => {
    const { logger, sink } = memoryLogger();
    const host = new LinuxHost({ procRoot, shutdownCommand, logger, run: recordingRunner });
    return { host, sink };
  };

  test('reads whole seconds of uptime from the proc table', async () => {
    fs.writeFileSync(path.join(procRoot, 'uptime'), '12345.67 45678.90\n');
    const { host } = createHost();

    await expect(host.uptimeSeconds()).resolves.toBe(12345);
  });

  test('syncs, then runs the shutdown command as configured', async () => {
    const { host } = createHost(['systemctl', 'poweroff']);

    await host.shutdown('Idle shutdown: no activity for 3600s (limit 3600s)');

    expect(calls).toEqual([
      { command: 'sync', args: [] },
      { command: 'systemctl', args: ['poweroff'] },
    ]);
  });

  test('substitutes the reason where the command asks for it', async () => {
    const { host } = createHost(['/sbin/shutdown', '-h', 'now', '{reason}']);

    await host.shutdown('Idle shutdown: no activity for 3600s (limit 3600s)');

    expect(calls[1]).toEqual({
      command: '/sbin/shutdown',
      args: ['-h', 'now', 'Idle shutdown: no activity for 3600s (limit 3600s)'],
    });
  });

  test('expandShutdownArgs replaces the placeholder inside a longer argument', () => {
    expect(expandShutdownArgs(['--message=idle: {reason}', '-r'], 'no activity')).toEqual([
      '--message=idle: no activity',
      '-r',
    ]);
  });

  test('a failing sync is logged and the shutdown still goes ahead', async () => {
    failing.add('sync');
    const { host, sink } = createHost();

    await host.shutdown('idle');

    expect(calls.map(call => call.command)).toEqual(['sync', '/sbin/shutdown']);
    expect(sink.lines).toEqual([
      '2001-09-09T01:46:40.000Z | [WARN] sync before shutdown failed: sync exited with code 1',
    ]);
  });

  test('a failing shutdown command raises SHUTDOWN_FAILED', async () => {
    failing.add('/sbin/shutdown');
    const { host } = createHost();

    await expect(host.shutdown('idle')).rejects.toMatchObject({
      code: ErrorCode.ShutdownFailed,
      message: 'Shutdown command /sbin/shutdown failed: /sbin/shutdown exited with code 1',
    });
  });
});

describe('DryRunHost', () => {
  test('logs the reason and leaves the wrapped host alone', async () => {
    const inner = new FakeHost(4321);
    const { logger, sink } = memoryLogger();
    const host = new DryRunHost(inner, logger);

    await host.shutdown('Idle shutdown: no activity for 60s (limit 60s)');

    expect(inner.shutdowns).toEqual([]);
    await expect(host.uptimeSeconds()).resolves.toBe(4321);
    expect(sink.lines).toEqual([
      '2001-09-09T01:46:40.000Z | [SHUTDOWN] Dry run, not powering off reason="Idle shutdown: no activity for 60s (limit 60s)"',
    ]);
  });
});
