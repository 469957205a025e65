import { ExecutorConfig, normalizeTimeout } from './ExecutorConfig';
import { RejectedExecutionError } from './ExecutorError';
import { ExecutorState, ITaskExecutor, Task } from './ITaskExecutor';
import { createExecutorLogger, Logger } from './Logger';
import { TaskHandle } from './TaskHandle';

/**
 * Executor that runs every task inline, on the caller's stack, before `submit()` returns. Meant for unit tests: a
 * component given this executor finishes its "asynchronous" work before the test's next line, so the test never has
 * to sleep or poll.
 *
 * A task that throws propagates the error straight to the caller of `submit()`.
 */
export class SynchronousExecutor implements ITaskExecutor {
  /**
   * Constructor
   * @param config Optional configuration. Only `executorName` and `logger` apply here.
   */
  public constructor(config?: ExecutorConfig) {
    this._config = config ? config : new ExecutorConfig();
    this._logger = createExecutorLogger(this._config.executorName, this._config.logger);
  }

  public submit(task: Task): TaskHandle {
    if (this.isShutdown()) {
      this._logger.warn('Task rejected after shutdown');
      throw new RejectedExecutionError(this._config.executorName);
    }

    const handle = new TaskHandle(this._taskCount++);

    // Tasks may submit more tasks. Those run nested, before the outer task continues.
    this._depth++;
    try {
      task();
    } catch (err) {
      handle._setFailed(err);
      throw err;
    } finally {
      this._depth--;
      if (this._depth === 0 && this._state === ExecutorState.ShuttingDown) {
        // shutdown() was called from inside a task
        this._setState(ExecutorState.Terminated);
      }
    }

    handle._setCompleted();
    return handle;
  }

  public shutdown(): void {
    if (this.isShutdown()) {
      return;
    }

    this._setState(ExecutorState.ShuttingDown);

    // Nothing is ever queued. Unless a task is on the stack right now, there is nothing left to finish.
    if (this._depth === 0) {
      this._setState(ExecutorState.Terminated);
    }
  }

  public isShutdown(): boolean {
    return this._state !== ExecutorState.Running;
  }

  public isTerminated(): boolean {
    return this._state === ExecutorState.Terminated;
  }

  /**
   * Resolves immediately, whatever the timeout. Nothing can make progress towards termination while the caller
   * waits, so the answer is whatever the state is now.
   */
  public async awaitTermination(timeoutMs: number): Promise<boolean> {
    normalizeTimeout(timeoutMs);
    return this.isTerminated();
  }

  public getState(): ExecutorState {
    return this._state;
  }

  private _setState(state: ExecutorState): void {
    this._logger.debug({ from: this._state, to: state }, 'State change');
    this._state = state;
  }

  private readonly _config: ExecutorConfig;
  private readonly _logger: Logger;
  private _state = ExecutorState.Running;

  /** Number of tasks currently on the stack */
  private _depth = 0;

  private _taskCount = 0;
}
