import { AsyncAutoResetEvent, AsyncEventWaitHandle, AsyncManualResetEvent, AsyncTimerEvent } from './coordination';
import { ExecutorConfig, normalizeTimeout } from './ExecutorConfig';
import { RejectedExecutionError } from './ExecutorError';
import { AsyncTask, ExecutorState, ITaskExecutor, Task } from './ITaskExecutor';
import { createExecutorLogger, Logger } from './Logger';
import { Queue } from './Queue';
import { TaskHandle } from './TaskHandle';

/**
 * Executor backed by a fixed number of async worker loops. Tasks are queued FIFO and start in submission order;
 * `submit()` returns before the task runs.
 *
 * Task failures never reach the workers. They are logged and recorded on the task's handle.
 */
export class PooledExecutor implements ITaskExecutor {
  /**
   * Constructor
   * @param config Optional configuration settings. With the default value of undefined, all default values are used.
   */
  public constructor(config?: ExecutorConfig) {
    this._config = config ? config : new ExecutorConfig();
    const maxWorkers = this._config.maxWorkers;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError('maxWorkers must be a positive integer, got ' + maxWorkers);
    }

    this._logger = createExecutorLogger(this._config.executorName, this._config.logger);
    this._queue = new Queue<WorkItem>();
    this._workAvailableEvent = new AsyncAutoResetEvent();
    this._terminatedEvent = new AsyncManualResetEvent();

    // Each loop runs until it parks on the first wait, so every worker is waiting before the constructor returns
    for (let n = 0; n < maxWorkers; n++) {
      this._loopExceptionWrapper(this._workerLoop());
    }
  }

  public submit(task: Task): TaskHandle {
    return this._enqueue(task);
  }

  /**
   * Queues a task that finishes when its promise settles. The worker running it stays busy until then, so at most
   * `maxWorkers` async tasks are in flight.
   * @param task Task to run
   * @returns Handle to observe the task's completion
   */
  public submitAsync(task: AsyncTask): TaskHandle {
    return this._enqueue(task);
  }

  public shutdown(): void {
    if (this.isShutdown()) {
      return;
    }

    this._setState(ExecutorState.ShuttingDown);

    // One signal per worker wakes every idle one so it can exit. Busy workers check the state before waiting again.
    for (let n = 0; n < this._config.maxWorkers; n++) {
      this._workAvailableEvent.set();
    }

    // An idle pool terminates right away. Otherwise the last worker to go idle completes the shutdown.
    this._tryTerminate();
  }

  public isShutdown(): boolean {
    return this._state !== ExecutorState.Running;
  }

  public isTerminated(): boolean {
    return this._state === ExecutorState.Terminated;
  }

  public async awaitTermination(timeoutMs: number): Promise<boolean> {
    const timeout = normalizeTimeout(timeoutMs);
    if (this.isTerminated()) {
      return true;
    }

    const timer = new AsyncTimerEvent(timeout);
    try {
      await AsyncEventWaitHandle.whenAny([this._terminatedEvent, timer]);
    } finally {
      timer.cancel();
    }

    return this.isTerminated();
  }

  public getState(): ExecutorState {
    return this._state;
  }

  /** Number of tasks currently running on a worker */
  public getActiveCount(): number {
    return this._activeCount;
  }

  /** Number of tasks waiting for a worker */
  public getQueuedCount(): number {
    return this._queue.getCount();
  }

  private _enqueue(run: Task | AsyncTask): TaskHandle {
    if (this.isShutdown()) {
      this._logger.warn('Task rejected after shutdown');
      throw new RejectedExecutionError(this._config.executorName);
    }

    const handle = new TaskHandle(this._taskCount++);
    this._queue.enqueue({ handle, run });
    this._workAvailableEvent.set();
    return handle;
  }

  private async _workerLoop(): Promise<void> {
    while (true) {
      const item = this._queue.dequeue();
      if (item) {
        await this._runWorkItem(item);
        continue;
      }

      if (this.isShutdown()) {
        // The queue is drained. Exit, and complete the shutdown if this was the last busy worker.
        this._tryTerminate();
        return;
      }

      await this._workAvailableEvent.waitAsync();
    }
  }

  private async _runWorkItem(item: WorkItem): Promise<void> {
    this._activeCount++;
    try {
      await item.run();
      item.handle._setCompleted();
    } catch (err) {
      this._logger.warn({ err, taskNumber: item.handle.taskNumber }, 'Task failed');
      item.handle._setFailed(err);
    } finally {
      this._activeCount--;
    }
  }

  private _tryTerminate(): void {
    if (this._state === ExecutorState.ShuttingDown && this._activeCount === 0 && this._queue.getCount() === 0) {
      this._setState(ExecutorState.Terminated);
      this._terminatedEvent.set();
    }
  }

  private _setState(state: ExecutorState): void {
    this._logger.debug({ from: this._state, to: state }, 'State change');
    this._state = state;
  }

  /**
   * Wrapper around a worker loop to catch any unhandled exceptions, log them, and shut the executor down. Task
   * errors are caught per task, so anything reaching here is a fault in the loop itself.
   * @param promise Promise returned by a worker loop
   */
  private _loopExceptionWrapper(promise: Promise<void>): void {
    promise.catch((err: unknown) => {
      this._logger.error({ err }, 'Worker loop failed');
      this.shutdown();
    });
  }

  private readonly _config: ExecutorConfig;
  private readonly _logger: Logger;
  private _state = ExecutorState.Running;

  /** Tasks waiting for a worker, in submission order */
  private readonly _queue: Queue<WorkItem>;

  /** Signalled once per submitted task to wake one idle worker, and once per worker on shutdown */
  private readonly _workAvailableEvent: AsyncAutoResetEvent;

  private readonly _terminatedEvent: AsyncManualResetEvent;
  private _activeCount = 0;
  private _taskCount = 0;
}

interface WorkItem {
  handle: TaskHandle;
  run: Task | AsyncTask;
}
