import * as fs from 'node:fs';
import * as path from 'node:path';

import { ErrorCode, MonitorError, errnoCode } from './errors';
import { Logger } from './logger';

export type ProcessProbe = (pid: number) => boolean;

/**
 * `kill(pid, 0)` delivers nothing but reports whether the process exists.
 * EPERM means it exists under another user.
 */
export const isProcessAlive: ProcessProbe = pid => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === 'EPERM';
  }
};

export type AcquireResult = { acquired: true } | { acquired: false; holderPid: number };

export interface SingletonGuardOptions {
  lockFile: string;
  logger: Logger;
  pid?: number;
  isAlive?: ProcessProbe;
}

const parsePid = (text: string): number | undefined => {
  const pid = Number.parseInt(text.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : undefined;
};

/**
 * Host-wide mutual exclusion through a PID lock file.
 *
 * The file is created with O_EXCL, so two invocations racing for a free lock
 * cannot both win. A lock whose recorded process is gone is reclaimed.
 */
export class SingletonGuard {
  private readonly pid: number;
  private readonly isAlive: ProcessProbe;
  private held = false;

  constructor(private readonly options: SingletonGuardOptions) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
  }

  get isHeld(): boolean {
    return this.held;
  }

  acquire(): AcquireResult {
    if (this.held) {
      return { acquired: true };
    }
    fs.mkdirSync(path.dirname(this.options.lockFile), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt += 1) {
      if (this.tryCreate()) {
        this.held = true;
        return { acquired: true };
      }

      const holderPid = this.readHolder();
      if (holderPid !== undefined && holderPid !== this.pid && this.isAlive(holderPid)) {
        return { acquired: false, holderPid };
      }

      this.options.logger.warn(`Reclaiming stale lock ${this.options.lockFile}`, undefined, {
        holder: holderPid ?? 'unreadable',
      });
      this.reclaim(holderPid);
    }

    throw new MonitorError(`Could not acquire lock ${this.options.lockFile}`, ErrorCode.LockFailed);
  }

  /**
   * Removes the lock file if it still records this process. Safe to call more
   * than once and from an `exit` handler.
   */
  release(): void {
    if (!this.held) {
      return;
    }
    this.held = false;
    if (this.readHolder() === this.pid) {
      this.removeFile(this.options.lockFile);
    }
  }

  private tryCreate(): boolean {
    try {
      fs.writeFileSync(this.options.lockFile, `${this.pid}\n`, { flag: 'wx', mode: 0o644 });
      return true;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        return false;
      }
      throw new MonitorError(`Cannot create lock ${this.options.lockFile}`, ErrorCode.LockFailed, error);
    }
  }

  /**
   * Moves the stale lock aside before deleting it, so a lock another process
   * created after the holder was read is never removed. If the moved file no
   * longer records the stale holder it is put back.
   */
  private reclaim(staleHolder: number | undefined): void {
    const { lockFile } = this.options;
    const claimPath = `${lockFile}.${this.pid}.stale`;
    try {
      fs.renameSync(lockFile, claimPath);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return;
      }
      throw new MonitorError(`Cannot reclaim lock ${lockFile}`, ErrorCode.LockFailed, error);
    }

    const moved = this.readHolder(claimPath);
    if (moved !== staleHolder) {
      try {
        fs.linkSync(claimPath, lockFile);
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw new MonitorError(`Cannot restore lock ${lockFile}`, ErrorCode.LockFailed, error);
        }
        this.options.logger.warn(`Lock ${lockFile} was taken again while restoring it`, undefined, { holder: moved });
      }
    }
    this.removeFile(claimPath);
  }

  private readHolder(file: string = this.options.lockFile): number | undefined {
    try {
      return parsePid(fs.readFileSync(file, 'utf8'));
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.options.logger.warn(`Cannot read lock ${file}`, error);
      }
      return undefined;
    }
  }

  private removeFile(file: string): void {
    try {
      fs.rmSync(file, { force: true });
    } catch (error) {
      this.options.logger.warn(`Cannot remove lock ${file}`, error);
    }
  }
}
