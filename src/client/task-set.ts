import { setMaxListeners } from 'node:events';
import { errorMessage } from '../errors';
import { logger } from '../utils/logger';

export type TaskOutcome = { ok: true } | { ok: false; error: unknown };

interface RunningTask {
  id: string;
  done: Promise<void>;
}

/**
 * Registry of detached tunnel tasks. Tasks run unawaited, but stay
 * enumerable and share one abort signal so the owning session can cancel
 * them all when it ends. A task's failure only reaches its `onSettled`.
 */
export class TaskSet {
  private controller = new AbortController();
  private tasks = new Map<number, RunningTask>();
  private nextKey = 0;

  constructor() {
    // Every running tunnel listens on the shared signal; their number is unbounded.
    setMaxListeners(0, this.controller.signal);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get size(): number {
    return this.tasks.size;
  }

  /** Ids of the running tasks, in spawn order. An id the server repeated appears once per task. */
  ids(): string[] {
    return [...this.tasks.values()].map((task) => task.id);
  }

  spawn(id: string, task: (signal: AbortSignal) => Promise<void>, onSettled: (outcome: TaskOutcome) => void): void {
    const key = this.nextKey++;
    const signal = this.controller.signal;
    const done = Promise.resolve()
      .then(() => task(signal))
      .then(
        (): TaskOutcome => ({ ok: true }),
        (error: unknown): TaskOutcome => ({ ok: false, error })
      )
      .then((outcome) => {
        this.tasks.delete(key);
        try {
          onSettled(outcome);
        } catch (err) {
          logger.error(`${id} settle handler failed: ${errorMessage(err)}`);
        }
      });
    this.tasks.set(key, { id, done });
  }

  abortAll(reason?: unknown): void {
    this.controller.abort(reason);
  }

  /** Resolves once every task spawned so far has settled. */
  async settled(): Promise<void> {
    await Promise.all([...this.tasks.values()].map((task) => task.done));
  }
}
