/**
 * Task Runner
 *
 * Runs each submitted unit of work as its own short-lived task. A task
 * starts on a later event-loop turn than the submit call, runs exactly one
 * unit, reports completion as an event and through its handle, then ends.
 * There is no pool and no queue. Units keep CPU-bound work off this thread
 * by handing it to a dedicated worker thread (see WorkerNormalizer).
 */

import { EventEmitter } from 'events';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger, withRunContext } from '../../utils/logger.js';

export type TaskOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'failed'; error: Error };

export interface TaskHandle<T> {
  id: number;
  name: string;
  /** Resolves once the worker ends; never rejects */
  result: Promise<TaskOutcome<T>>;
}

export interface TaskCompletedEvent<T = unknown> {
  id: number;
  name: string;
  result: T;
}

export interface TaskFailedEvent {
  id: number;
  name: string;
  error: Error;
}

const log = createChildLogger({ component: 'TaskRunner' });

export class TaskRunner extends EventEmitter {
  private readonly active = new Set<number>();
  private nextId = 0;

  /**
   * Workers started and not yet finished
   */
  get activeCount(): number {
    return this.active.size;
  }

  submit<T>(name: string, work: () => Promise<T> | T): TaskHandle<T> {
    const id = ++this.nextId;
    this.active.add(id);
    log.debug({ id, name }, 'Task submitted');

    const result = new Promise<TaskOutcome<T>>((resolve) => {
      setImmediate(() => {
        void withRunContext({ taskId: id, task: name }, () => this.execute(id, name, work)).then(resolve);
      });
    });

    return { id, name, result };
  }

  private async execute<T>(id: number, name: string, work: () => Promise<T> | T): Promise<TaskOutcome<T>> {
    const startTime = Date.now();
    let outcome: TaskOutcome<T>;
    try {
      outcome = { status: 'completed', value: await work() };
    } catch (error) {
      outcome = { status: 'failed', error: error instanceof Error ? error : new Error(String(error)) };
    }
    this.active.delete(id);

    if (outcome.status === 'completed') {
      log.debug({ id, name, durationMs: Date.now() - startTime }, 'Task completed');
      this.notify('completed', { id, name, result: outcome.value });
    } else {
      log.error({ id, name, error: outcome.error.message }, 'Task failed');
      this.notify('failed', { id, name, error: outcome.error });
    }
    return outcome;
  }

  private notify(event: 'completed' | 'failed', payload: TaskCompletedEvent | TaskFailedEvent): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      log.warn({ event, error: getErrorMessage(error) }, 'Task listener threw');
    }
  }
}
