import logger from '../utils/logger.js';

export const DEFAULT_AUTO_SAVE_DELAY_MS = 1000;

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_AUTO_SAVE_DELAY_MS = 2_147_483_647;

/**
 * Work run when the scheduler fires. Resolving to `false` reports a failed
 * save the same way a thrown error does.
 */
export type SaveCallback = () => void | boolean | Promise<void | boolean>;

export type SchedulerState = 'idle' | 'pending';

function assertDelay(delayMs: number): void {
  if (!Number.isFinite(delayMs) || delayMs < 0 || delayMs > MAX_AUTO_SAVE_DELAY_MS) {
    throw new RangeError(
      `Auto-save delay must be between 0 and ${MAX_AUTO_SAVE_DELAY_MS} ms, got ${delayMs}`
    );
  }
}

/**
 * Debounces "content changed" signals into save calls.
 *
 * Each trigger restarts the countdown, so a burst of edits produces one save
 * once the editor has been quiet for `delayMs`. The callback reads whatever
 * content is current when it runs.
 */
export class AutoSaveScheduler {
  private delay: number;
  private enabled = true;
  private disposed = false;
  private timer?: NodeJS.Timeout;
  private readonly saveCallback: SaveCallback;

  constructor(saveCallback: SaveCallback, delayMs: number = DEFAULT_AUTO_SAVE_DELAY_MS) {
    assertDelay(delayMs);
    this.saveCallback = saveCallback;
    this.delay = delayMs;
    logger.info({ delayMs }, 'Auto-save initialized');
  }

  get state(): SchedulerState {
    return this.timer ? 'pending' : 'idle';
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  get delayMs(): number {
    return this.delay;
  }

  /**
   * Restart the countdown. Ignored while disabled.
   */
  trigger(): void {
    if (!this.enabled || this.disposed) {
      return;
    }

    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.fire('timer').catch((err) => {
        logger.error({ err }, 'Auto-save fire failed');
      });
    }, this.delay);
    logger.debug({ delayMs: this.delay }, 'Auto-save triggered');
  }

  /**
   * Cancel any pending countdown and save immediately. Honoured while
   * disabled; resolves to whether the save succeeded.
   */
  async saveNow(): Promise<boolean> {
    if (this.disposed) {
      return false;
    }
    this.clearTimer();
    return this.fire('explicit');
  }

  /**
   * Drop a pending save without running it.
   */
  cancel(): void {
    if (this.timer) {
      this.clearTimer();
      logger.debug('Pending auto-save cancelled');
    }
  }

  enable(): void {
    this.enabled = true;
    logger.info('Auto-save enabled');
  }

  /**
   * Cancel pending saves and ignore triggers until re-enabled. Does not
   * flush; call {@link saveNow} first when unsaved edits must survive.
   */
  disable(): void {
    this.enabled = false;
    this.clearTimer();
    logger.info('Auto-save disabled');
  }

  /**
   * Applies to the next trigger; an already pending deadline keeps its delay.
   */
  setDelay(delayMs: number): void {
    assertDelay(delayMs);
    this.delay = delayMs;
    logger.info({ delayMs }, 'Auto-save delay changed');
  }

  dispose(): void {
    this.clearTimer();
    this.disposed = true;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private async fire(reason: 'timer' | 'explicit'): Promise<boolean> {
    try {
      logger.debug({ reason }, 'Executing auto-save');
      const result = await this.saveCallback();
      if (result === false) {
        logger.warn({ reason }, 'Auto-save callback reported failure');
        return false;
      }
      return true;
    } catch (err) {
      logger.error({ err, reason }, 'Auto-save failed');
      return false;
    }
  }
}
