import { TaskHandle } from './TaskHandle';

/** Unit of work. No arguments, no result; any effect happens through its closure. */
export type Task = () => void;

/** Unit of work that finishes when its promise settles. Accepted by `PooledExecutor.submitAsync()`. */
export type AsyncTask = () => Promise<void>;

/**
 * Lifecycle of an executor. States only move forward: an executor never returns to Running.
 */
export const enum ExecutorState {
  /** Accepting and running tasks */
  Running = 0,

  /** Shutdown was requested. Queued tasks still run, new ones are rejected. */
  ShuttingDown = 1,

  /** Shutdown is complete and no task is running */
  Terminated = 2
}

/**
 * Accepts tasks and decides when and where they run. Components that need asynchronous work take an ITaskExecutor
 * in their constructor instead of creating one, so tests can pass a `SynchronousExecutor` and production code a
 * `PooledExecutor` without changing the component.
 */
export interface ITaskExecutor {
  /**
   * Runs a task under the executor's policy
   * @param task Task to run
   * @returns Handle to observe the task's completion
   * @throws RejectedExecutionError if the executor is shut down. The task does not run.
   */
  submit(task: Task): TaskHandle;

  /**
   * Requests shutdown. Tasks submitted afterwards are rejected. Calling it again has no effect.
   */
  shutdown(): void;

  /** True once shutdown has been requested */
  isShutdown(): boolean;

  /** True once shutdown is complete and no task is running */
  isTerminated(): boolean;

  /**
   * Waits for the executor to terminate
   * @param timeoutMs Maximum time to wait, in milliseconds. Negative values count as 0, Infinity waits forever.
   * @returns True if the executor terminated, false if the timeout elapsed first
   */
  awaitTermination(timeoutMs: number): Promise<boolean>;

  getState(): ExecutorState;
}
