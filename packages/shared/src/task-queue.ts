import { errorMessage, type TaskScheduler } from '@appraise/domain';
import { type SafeLogger } from './logger';

/**
 * Runs tasks on the next turn of the event loop, off the request path. Failures are logged,
 * never rethrown. Work does not survive a restart; the worker recovers rows left behind.
 */
export class InProcessTaskQueue implements TaskScheduler {
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly logger: SafeLogger) {}

  schedule(name: string, task: () => Promise<unknown>): void {
    const run: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(task)
      .then(
        () => {
          this.logger.debug({ task: name }, 'Background task finished');
        },
        (err: unknown) => {
          this.logger.error({ task: name, err: errorMessage(err) }, 'Background task failed');
        },
      )
      .finally(() => {
        this.pending.delete(run);
      });
    this.pending.add(run);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Resolves once every scheduled task, including ones scheduled meanwhile, has settled. */
  async onIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }
}
