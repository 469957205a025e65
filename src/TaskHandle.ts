import { AsyncManualResetEvent } from './coordination';

export const enum TaskStatus {
  /** Queued or running */
  Pending = 0,

  /** Ran to completion */
  Completed = 1,

  /** Threw, or its promise rejected */
  Failed = 2
}

/**
 * Returned by `ITaskExecutor.submit()` as a way to observe a task's outcome.
 *
 * A failure is only turned into a rejected promise when someone calls `waitAsync()`, so an unobserved failure never
 * surfaces as an unhandled rejection.
 */
export class TaskHandle {
  public constructor(taskNumber: number) {
    this.taskNumber = taskNumber;
  }

  /** Sequence number assigned by the executor, starting at 0 */
  public readonly taskNumber: number;

  public getStatus(): TaskStatus {
    return this._status;
  }

  public isDone(): boolean {
    return this._status !== TaskStatus.Pending;
  }

  /** The value the task threw or rejected with. Undefined unless the status is Failed. */
  public getError(): unknown {
    return this._error;
  }

  /**
   * Waits for the task to finish. Rejects with the task's error if it failed.
   */
  public async waitAsync(): Promise<void> {
    await this._doneEvent.waitAsync();
    if (this._status === TaskStatus.Failed) {
      throw this._error;
    }
  }

  /** Internal. Do not call outside the executors. */
  public _setCompleted(): void {
    this._status = TaskStatus.Completed;
    this._doneEvent.set();
  }

  /** Internal. Do not call outside the executors. */
  public _setFailed(error: unknown): void {
    this._status = TaskStatus.Failed;
    this._error = error;
    this._doneEvent.set();
  }

  private _status = TaskStatus.Pending;
  private _error: unknown;
  private readonly _doneEvent = new AsyncManualResetEvent();
}
