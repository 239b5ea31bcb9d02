import { ModerationLogger } from './logger';

/**
 * Runs outbound deliveries without blocking the caller. Failures end up in
 * the log at warn level; `drain` waits for everything still in flight.
 */
export class DeliveryQueue {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly logger: ModerationLogger) {}

  dispatch(label: string, task: () => Promise<unknown>, meta: Record<string, unknown> = {}): void {
    const run = this.execute(label, task, meta);
    this.pending.add(run);
    void run.finally(() => {
      this.pending.delete(run);
    });
  }

  get size(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async execute(label: string, task: () => Promise<unknown>, meta: Record<string, unknown>): Promise<void> {
    try {
      await task();
    } catch (error) {
      await this.logger.warn(`Delivery failed: ${label}`, {
        ...meta,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
