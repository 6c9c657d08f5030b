import { Logger } from '@shared/ports/Logger';

/**
 * Keeps fire-and-forget publications observable: failures are logged,
 * and shutdown can wait for everything still in flight.
 */
export class PromiseTracker {
  private readonly pending = new Set<Promise<unknown>>();

  constructor(
    private readonly category: string,
    private readonly highWaterMark: number,
    private readonly logger: Logger,
  ) {}

  track(promise: Promise<unknown>, label: string): void {
    const settled = promise
      .catch((err: unknown) => {
        this.logger.error(`[PromiseTracker] ${label} failed`, {
          category: this.category,
          error: err instanceof Error ? err.message : String(err),
        });
      })
      .finally(() => {
        this.pending.delete(settled);
      });
    this.pending.add(settled);

    if (this.pending.size > this.highWaterMark) {
      this.logger.warn(
        `[PromiseTracker] High water mark exceeded for "${this.category}"`,
        {
          category: this.category,
          pending: this.pending.size,
          highWaterMark: this.highWaterMark,
        },
      );
    }
  }

  get size(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }
}
