import { ModerationLogger } from './logger';

export interface SweepTarget {
  runExpirySweep(nowTs?: number): number;
}

/** Periodically deactivates due sanctions until stopped. */
export class ExpirySweeper {
  private timer: NodeJS.Timeout | null = null;
  private runInProgress = false;

  constructor(
    private readonly target: SweepTarget,
    private readonly intervalMs: number,
    private readonly logger: ModerationLogger,
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce();
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Returns the number of expired sanctions, or null when a run was already in progress. */
  runOnce(nowTs: number = Date.now()): number | null {
    if (this.runInProgress) {
      return null;
    }

    this.runInProgress = true;
    try {
      const expired = this.target.runExpirySweep(nowTs);
      if (expired > 0) {
        void this.logger.info('Expiry sweep finished', { expired });
      }
      return expired;
    } catch (error) {
      void this.logger.error('Expiry sweep cycle failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return 0;
    } finally {
      this.runInProgress = false;
    }
  }
}
