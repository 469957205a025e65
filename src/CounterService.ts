import { ITaskExecutor } from './ITaskExecutor';
import { TaskHandle } from './TaskHandle';

/**
 * Integer counter whose increments run on an injected executor.
 *
 * The executor belongs to whoever constructed the service. `start()` and `stop()` only track the service's own
 * lifecycle; shutting the executor down is the owner's job.
 */
export class CounterService {
  /**
   * Constructor
   * @param executor Runs the increments. A `SynchronousExecutor` makes every increment visible as soon as
   *    `increment()` returns; with a `PooledExecutor`, wait on the returned handle first.
   */
  public constructor(executor: ITaskExecutor) {
    this._executor = executor;
  }

  public start(): void {
    this._isStarted = true;
  }

  public stop(): void {
    this._isStarted = false;
  }

  public isStarted(): boolean {
    return this._isStarted;
  }

  /**
   * Submits a task that adds one to the counter
   * @returns Handle of the submitted task
   * @throws RejectedExecutionError if the executor is shut down. The counter is left unchanged.
   */
  public increment(): TaskHandle {
    return this._executor.submit(() => {
      this._value++;
    });
  }

  /** Current counter value. Increments still queued on an asynchronous executor are not included. */
  public get(): number {
    return this._value;
  }

  private readonly _executor: ITaskExecutor;
  private _value = 0;
  private _isStarted = false;
}
