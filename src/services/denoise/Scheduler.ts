import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'Scheduler' });

export type BackgroundTask = (signal: AbortSignal) => Promise<void>;

export interface TaskHandle {
  readonly name: string;

  /**
   * Settles when the task has finished, normally or by cancellation
   */
  readonly done: Promise<void>;

  /**
   * Request cancellation and wait until the task has observed it.
   * Repeated calls are no-ops.
   */
  cancel(): Promise<void>;
}

export interface Scheduler {
  spawn(name: string, task: BackgroundTask): TaskHandle;
}

/**
 * Runs background tasks on the event loop, cancelled through an AbortSignal.
 * A task failing after cancellation is expected and is not reported.
 */
export class AsyncTaskScheduler implements Scheduler {
  private running = new Set<TaskHandle>();

  get activeTasks(): number {
    return this.running.size;
  }

  spawn(name: string, task: BackgroundTask): TaskHandle {
    const controller = new AbortController();

    const done = Promise.resolve()
      .then(() => task(controller.signal))
      .catch((error: unknown) => {
        if (controller.signal.aborted) {
          return;
        }
        logger.error({ task: name, error: error instanceof Error ? error.message : error }, 'Background task failed');
      })
      .finally(() => {
        this.running.delete(handle);
      });

    const handle: TaskHandle = {
      name,
      done,
      cancel: async () => {
        controller.abort();
        await done;
      }
    };

    this.running.add(handle);
    logger.debug({ task: name }, 'Background task spawned');
    return handle;
  }
}
