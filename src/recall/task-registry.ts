import { errorMessage, type RecallLogger } from '../services/logger';
import { isAbortedError } from '../utils/time';

interface TrackedTask {
  label: string;
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Deferred recalls owned by one coordinator. Each task removes itself once it
 * settles; `cancelAll` aborts whatever is left and waits for it to drain.
 */
export class TaskRegistry {
  private readonly tasks = new Set<TrackedTask>();

  constructor(private readonly logger: RecallLogger) {}

  get size(): number {
    return this.tasks.size;
  }

  spawn(label: string, run: (signal: AbortSignal) => Promise<void>): void {
    const controller = new AbortController();
    const task: TrackedTask = {
      label,
      controller,
      done: Promise.resolve(),
    };

    task.done = run(controller.signal)
      .catch(async (error: unknown) => {
        if (isAbortedError(error)) {
          await this.logger.debug('Deferred task cancelled', { label });
          return;
        }

        await this.logger.error('Deferred task failed', { label, error: errorMessage(error) });
      })
      .finally(() => {
        this.tasks.delete(task);
      });

    this.tasks.add(task);
  }

  async cancelAll(): Promise<void> {
    const pending = [...this.tasks];
    for (const task of pending) {
      task.controller.abort();
    }

    await Promise.allSettled(pending.map((task) => task.done));
    this.tasks.clear();
  }
}
