import { errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('tagkv:pool');

type Task = () => Promise<void>;

interface Pending {
  task: Task;
  resolve: () => void;
}

/**
 * Runs at most `maxClients` connection tasks at once. Tasks spawned past the
 * limit wait in arrival order for a slot. A task failure is logged and frees
 * its slot like a normal exit.
 */
export class ConnectionPool {
  private running = 0;
  private queue: Pending[] = [];

  constructor(readonly maxClients: number) {
    if (!Number.isInteger(maxClients) || maxClients < 1) {
      throw new RangeError(`maxClients must be a positive integer, got ${maxClients}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /** Resolves when the task has run to completion. */
  spawn(task: Task): Promise<void> {
    return new Promise<void>((resolve) => {
      const pending = { task, resolve };
      if (this.running < this.maxClients) {
        this.start(pending);
      } else {
        log.debug(`pool full (${this.running}), queueing connection`);
        this.queue.push(pending);
      }
    });
  }

  private start({ task, resolve }: Pending): void {
    this.running++;
    task()
      .catch((e: unknown) => {
        log.error(`connection task failed: ${errorMessage(e)}`);
      })
      .finally(() => {
        this.running--;
        const next = this.queue.shift();
        if (next) {
          this.start(next);
        }
        resolve();
      });
  }
}
