/**
 * Background Tasks
 *
 * Registry for detached async work (background refreshes). Failures are
 * logged, never rethrown. whenIdle() lets callers and tests wait for
 * quiescence instead of racing timers.
 */

import type { Logger } from '../logging/logger';

export class BackgroundTasks {
  private readonly pending = new Map<number, Promise<void>>();
  private nextId = 0;

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.pending.size;
  }

  /**
   * Start `work` without awaiting it.
   */
  run(name: string, work: () => Promise<unknown>): void {
    const id = ++this.nextId;
    this.logger.debug(`Starting background task ${name}#${id}`);

    const task = Promise.resolve()
      .then(work)
      .then(
        () => {
          this.logger.debug(`Background task ${name}#${id} finished`);
        },
        (error: unknown) => {
          this.logger.warn(`Background task ${name}#${id} failed:`, error);
        }
      )
      .finally(() => {
        this.pending.delete(id);
      });

    this.pending.set(id, task);
  }

  /**
   * Resolves once nothing is pending, including tasks started while waiting.
   */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending.values());
    }
  }
}
