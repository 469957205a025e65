/** Base class for errors raised by the executors */
export class ExecutorError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Thrown by `submit()` once an executor is shut down. The task is not run.
 */
export class RejectedExecutionError extends ExecutorError {
  public constructor(executorName: string) {
    super(executorName + ' is shut down and no longer accepts tasks');
    this.executorName = executorName;
  }

  /** Name of the executor that rejected the task */
  public readonly executorName: string;
}
