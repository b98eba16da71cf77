import { IdleStateStore } from './idle-state-store';
import { Logger } from './logger';

export interface IdleStatus {
  elapsedSeconds: number;
  remainingSeconds: number;
  triggered: boolean;
  /** Epoch seconds when the current idle streak began; `null` while active. */
  firstIdleTimestamp: number | null;
}

/** Uptime is read in whole seconds, so the derived boot time can drift slightly. */
const BOOT_TIME_SLACK_SECONDS = 5;

/**
 * Tracks the current idle streak on top of the persisted state.
 *
 * The state file is read once, on the first observation of the process, and
 * is a write-through mirror afterwards. A state file that becomes unreadable
 * or unwritable mid-run therefore cannot keep resetting the clock. A stored
 * streak that began before the host last booted is discarded on that read.
 */
export class IdleTimer {
  private remembered: number | null = null;
  private loaded = false;

  constructor(
    private readonly store: IdleStateStore,
    readonly thresholdSeconds: number,
    private readonly logger: Logger,
  ) {}

  /**
   * @param bootedAtSeconds epoch seconds of the last boot, when known
   */
  async observe(active: boolean, nowSeconds: number, bootedAtSeconds?: number): Promise<IdleStatus> {
    if (active) {
      await this.reset();
      return this.status(null, nowSeconds);
    }

    let first = await this.loadFirstIdle(bootedAtSeconds);
    if (first === null || first > nowSeconds) {
      first = nowSeconds;
      this.remembered = first;
      await this.persist(first, nowSeconds);
    }
    return this.status(first, nowSeconds);
  }

  /** Drops the idle streak, in memory and on disk. */
  async reset(): Promise<void> {
    this.remembered = null;
    this.loaded = true;
    try {
      await this.store.clear();
    } catch (error) {
      this.logger.warn('Failed to clear idle state', error);
    }
  }

  private status(first: number | null, nowSeconds: number): IdleStatus {
    const elapsedSeconds = first === null ? 0 : Math.max(0, nowSeconds - first);
    return {
      elapsedSeconds,
      remainingSeconds: Math.max(0, this.thresholdSeconds - elapsedSeconds),
      triggered: first !== null && elapsedSeconds >= this.thresholdSeconds,
      firstIdleTimestamp: first,
    };
  }

  private async loadFirstIdle(bootedAtSeconds: number | undefined): Promise<number | null> {
    if (this.loaded) {
      return this.remembered;
    }
    this.loaded = true;

    let first: number | null = null;
    try {
      first = (await this.store.load())?.firstIdleTimestamp ?? null;
    } catch (error) {
      this.logger.warn('Failed to load idle state, starting a new idle clock', error);
    }

    if (first !== null && bootedAtSeconds !== undefined && first < bootedAtSeconds - BOOT_TIME_SLACK_SECONDS) {
      this.logger.warn('Discarding idle state from before the last boot', undefined, {
        first_idle: first,
        booted_at: bootedAtSeconds,
      });
      first = null;
    }
    this.remembered = first;
    return first;
  }

  private async persist(first: number, nowSeconds: number): Promise<void> {
    try {
      await this.store.save({ firstIdleTimestamp: first, updatedAt: nowSeconds });
    } catch (error) {
      this.logger.warn('Failed to persist idle state, idle clock kept in memory only', error);
    }
  }
}
