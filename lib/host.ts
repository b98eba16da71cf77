import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { CommandRunner, runCommand } from './command';
import { ErrorCode, MonitorError, isMissingFile } from './errors';
import { Logger } from './logger';

/**
 * The parts of the operating system the decision loop acts on.
 */
export interface Host {
  uptimeSeconds(): Promise<number>;
  /**
   * Requests power-off and resolves once the request has been accepted. It
   * does not wait for the machine to go down.
   */
  shutdown(reason: string): Promise<void>;
}

export interface LinuxHostOptions {
  procRoot: string;
  shutdownCommand: readonly string[];
  logger: Logger;
  run?: CommandRunner;
}

const SHUTDOWN_TIMEOUT_MS = 30_000;

/** Argument token in `shutdownCommand` replaced by the shutdown reason. */
export const REASON_PLACEHOLDER = '{reason}';

export const expandShutdownArgs = (args: readonly string[], reason: string): string[] =>
  args.map(arg => arg.split(REASON_PLACEHOLDER).join(reason));

export class LinuxHost implements Host {
  private readonly run: CommandRunner;

  constructor(private readonly options: LinuxHostOptions) {
    this.run = options.run ?? runCommand;
  }

  async uptimeSeconds(): Promise<number> {
    try {
      const text = await fs.readFile(path.join(this.options.procRoot, 'uptime'), 'utf8');
      const uptime = Number.parseFloat(text.trim().split(/\s+/)[0] ?? '');
      if (Number.isFinite(uptime)) {
        return Math.floor(uptime);
      }
      this.options.logger.warn(`Unreadable uptime "${text.trim()}", using os.uptime()`);
    } catch (error) {
      if (!isMissingFile(error)) {
        this.options.logger.warn('Failed to read uptime, using os.uptime()', error);
      }
    }
    return Math.floor(os.uptime());
  }

  /**
   * Runs `shutdownCommand`. The reason is passed only where an argument
   * contains `{reason}`, since commands such as `systemctl poweroff` reject
   * extra arguments.
   */
  async shutdown(reason: string): Promise<void> {
    const [command, ...args] = this.options.shutdownCommand;
    if (!command) {
      throw new MonitorError('Shutdown command is empty', ErrorCode.ShutdownFailed);
    }

    try {
      await this.run('sync', [], SHUTDOWN_TIMEOUT_MS);
    } catch (error) {
      this.options.logger.warn('sync before shutdown failed', error);
    }

    try {
      await this.run(command, expandShutdownArgs(args, reason), SHUTDOWN_TIMEOUT_MS);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new MonitorError(`Shutdown command ${command} failed: ${detail}`, ErrorCode.ShutdownFailed, error);
    }
  }
}

/**
 * Reports the shutdown it would issue instead of issuing it.
 */
export class DryRunHost implements Host {
  constructor(
    private readonly inner: Host,
    private readonly logger: Logger,
  ) {}

  uptimeSeconds(): Promise<number> {
    return this.inner.uptimeSeconds();
  }

  async shutdown(reason: string): Promise<void> {
    this.logger.event('SHUTDOWN', 'Dry run, not powering off', { reason });
  }
}
