/**
 * Application Task Queue
 *
 * The device's single application thread: jobs run one at a time, in the
 * order they were scheduled, never inline with the caller. There is no
 * timeout or cancellation - a slow job holds every job queued behind it.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { componentLogger } from '../services/logger';

const log = componentLogger('TaskQueue');

export type Task = () => void | Promise<void>;

interface QueuedTask {
  id: string;
  label: string;
  run: Task;
}

export class TaskQueue extends EventEmitter {
  private queue: QueuedTask[] = [];
  private running = false;

  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.running;
  }

  /**
   * Append a job. Returns its id.
   */
  schedule(run: Task, label = 'task'): string {
    const id = uuidv4();
    this.queue.push({ id, label, run });
    log.debug('Scheduled', { id, label, pending: this.queue.length });

    if (!this.running) {
      this.running = true;
      setImmediate(() => {
        void this.drain();
      });
    }
    return id;
  }

  /**
   * Resolves once every queued job has finished.
   */
  idle(): Promise<void> {
    if (!this.running && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.once('drain', resolve));
  }

  private async drain(): Promise<void> {
    let next = this.queue.shift();
    while (next) {
      const startedAt = Date.now();
      try {
        await next.run();
      } catch (error) {
        log.error('Task failed', {
          id: next.id,
          label: next.label,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      log.debug('Task finished', { id: next.id, label: next.label, durationMs: Date.now() - startedAt });
      next = this.queue.shift();
    }

    this.running = false;
    this.emit('drain');
  }
}
