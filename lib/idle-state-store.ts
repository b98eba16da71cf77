import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

import { ErrorCode, MonitorError, errorMessage, isMissingFile } from './errors';
import { Logger } from './logger';

const IdleStateSchema = z.object({
  firstIdleTimestamp: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
});

/** Persisted idle streak; timestamps are epoch seconds. */
export type IdleState = z.infer<typeof IdleStateSchema>;

/**
 * Durable home of the idle streak, one JSON document at a fixed path. Absence
 * of the file means no idle streak is running.
 */
export class IdleStateStore {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  /**
   * Returns the stored state, or `null` when there is none. A corrupt file is
   * logged and treated as absent.
   */
  async load(): Promise<IdleState | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new MonitorError(`Cannot read idle state ${this.filePath}`, ErrorCode.StateIo, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.logger.warn(`Ignoring unparseable idle state ${this.filePath}`, error);
      return null;
    }

    const parsed = IdleStateSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(`Ignoring invalid idle state ${this.filePath}`, parsed.error.issues[0]?.message);
      return null;
    }
    return parsed.data;
  }

  /**
   * Writes to a sibling temp file and renames it over the target so a reader
   * never sees a half-written document.
   */
  async save(state: IdleState): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(state)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch(cleanupError => {
        this.logger.debug(`Leaving temp file ${tempPath}: ${errorMessage(cleanupError)}`);
      });
      throw new MonitorError(`Cannot write idle state ${this.filePath}`, ErrorCode.StateIo, error);
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new MonitorError(`Cannot remove idle state ${this.filePath}`, ErrorCode.StateIo, error);
    }
  }
}
